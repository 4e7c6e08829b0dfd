import { USER_MESSAGES, type AnalysisErrorKind } from "../backends/errors";
import type { FusedHazard } from "../fusion/types";
import type { TagRecommendation } from "../recommendation/engine";
import {
  isTerminal,
  type AnalysisMode,
  type AnalysisSession,
  type BackendAttempt,
  type SessionState,
  type SessionTransition
} from "./session-types";

const STATE_ORDER: Record<SessionState, number> = {
  IDLE: 0,
  SELECTING_BACKENDS: 1,
  ANALYZING: 2,
  FUSING: 3,
  RECOMMENDING: 4,
  COMPLETE: 5,
  FAILED: 5
};

export class SessionTransitionError extends Error {
  constructor(
    public readonly sessionId: string,
    public readonly from: SessionState,
    public readonly to: SessionState
  ) {
    super(`Session ${sessionId} cannot move from ${from} to ${to}`);
    this.name = "SessionTransitionError";
  }
}

export function canTransition(from: SessionState, to: SessionState): boolean {
  if (isTerminal(from)) {
    return false;
  }
  if (to === "FAILED") {
    return true;
  }
  if (to === "COMPLETE") {
    return from === "RECOMMENDING";
  }
  return STATE_ORDER[to] === STATE_ORDER[from] + 1;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => deepFreeze(child));
  }
  return value;
}

export type SessionOutcome = {
  fusedHazards: FusedHazard[];
  recommendations: TagRecommendation[];
  autoSelectTags: string[];
  degradedCapability: boolean;
};

/**
 * Owns one session's mutable record until it reaches a terminal state; after
 * that the record is frozen and every further change is rejected.
 */
export class SessionRecorder {
  private session: AnalysisSession;

  constructor(
    sessionId: string,
    traceId: string,
    mode: AnalysisMode,
    private readonly now: () => number = () => Date.now()
  ) {
    this.session = {
      sessionId,
      traceId,
      mode,
      state: "IDLE",
      fusedHazards: [],
      recommendations: [],
      autoSelectTags: [],
      degradedCapability: false,
      backendChain: [],
      backendsUsed: [],
      attempts: [],
      totalLatencyMs: 0,
      startedAt: now(),
      completedAt: null,
      transitions: []
    };
  }

  get state(): SessionState {
    return this.session.state;
  }

  get sessionId(): string {
    return this.session.sessionId;
  }

  get finalized(): boolean {
    return isTerminal(this.session.state);
  }

  transition(to: SessionState): void {
    const from = this.session.state;
    if (!canTransition(from, to)) {
      throw new SessionTransitionError(this.session.sessionId, from, to);
    }
    const entry: SessionTransition = { from, to, at: this.now() };
    this.session.transitions.push(entry);
    this.session.state = to;
  }

  setBackendChain(backendIds: string[]): void {
    this.assertOpen();
    this.session.backendChain = [...backendIds];
  }

  recordAttempt(attempt: BackendAttempt): void {
    this.assertOpen();
    this.session.attempts.push({ ...attempt });
    if (attempt.outcome === "SUCCESS" && !this.session.backendsUsed.includes(attempt.backendId)) {
      this.session.backendsUsed.push(attempt.backendId);
    }
  }

  complete(outcome: SessionOutcome): AnalysisSession {
    this.transition("COMPLETE");
    this.session.fusedHazards = outcome.fusedHazards;
    this.session.recommendations = outcome.recommendations;
    this.session.autoSelectTags = Array.from(new Set(outcome.autoSelectTags));
    this.session.degradedCapability = outcome.degradedCapability;
    return this.seal();
  }

  fail(kind: AnalysisErrorKind, message: string): AnalysisSession {
    this.transition("FAILED");
    this.session.error = {
      kind,
      message,
      userMessage: USER_MESSAGES[kind] ?? "Analysis failed. Please tag this photo manually."
    };
    return this.seal();
  }

  snapshot(): AnalysisSession {
    if (this.finalized) {
      return this.session;
    }
    return structuredClone(this.session);
  }

  private seal(): AnalysisSession {
    const completedAt = this.now();
    this.session.completedAt = completedAt;
    this.session.totalLatencyMs = completedAt - this.session.startedAt;
    return deepFreeze(this.session);
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new SessionTransitionError(this.session.sessionId, this.session.state, this.session.state);
    }
  }
}
