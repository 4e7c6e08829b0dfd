import type { SessionRecorder } from "./session";
import type { AnalysisMode } from "./session-types";

export type TrackedSession = {
  recorder: SessionRecorder;
  controller: AbortController;
  mode: AnalysisMode;
  usesLocalBackend: boolean;
};

/**
 * Live and recently finished sessions. Finished ones are evicted oldest first
 * once more than `maxFinished` are retained.
 */
export class InMemorySessionStore {
  private readonly sessions = new Map<string, TrackedSession>();

  constructor(private readonly maxFinished = 500) {}

  add(session: TrackedSession): void {
    this.sessions.set(session.recorder.sessionId, session);
    this.evict();
  }

  get(sessionId: string): TrackedSession | undefined {
    return this.sessions.get(sessionId);
  }

  active(): TrackedSession[] {
    return Array.from(this.sessions.values()).filter((session) => !session.recorder.finalized);
  }

  evict(): void {
    const finished = Array.from(this.sessions.values()).filter((session) => session.recorder.finalized);
    const excess = finished.length - this.maxFinished;
    // Map iteration follows insertion order, so the first entries are the oldest
    finished.slice(0, Math.max(0, excess)).forEach((session) => this.sessions.delete(session.recorder.sessionId));
  }
}
