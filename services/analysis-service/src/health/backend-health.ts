import { config } from "../config";

export type HealthSettings = {
  windowSize: number;
  minSuccessRate: number;
  deprioritizeMs: number;
};

type CallOutcome = {
  success: boolean;
  latencyMs: number | null;
};

type BackendHealthState = {
  window: readonly CallOutcome[];
  lastFailureAt: number | null;
  deprioritizedUntil: number | null;
};

export type BackendHealthSnapshot = {
  backendId: string;
  samples: number;
  successRate: number;
  averageLatencyMs: number | null;
  lastFailureAt: number | null;
  deprioritizedUntil: number | null;
  deprioritized: boolean;
};

export type HealthRecord = {
  backendId: string;
  rollingSuccessRate: number;
  lastFailureAtMillis: number | null;
};

export type HealthListener = (record: HealthRecord) => void;

const EMPTY_STATE: BackendHealthState = { window: [], lastFailureAt: null, deprioritizedUntil: null };

function successRateOf(window: readonly CallOutcome[]): number {
  if (window.length === 0) {
    return 1;
  }
  return window.filter((outcome) => outcome.success).length / window.length;
}

function averageLatencyOf(window: readonly CallOutcome[]): number | null {
  const latencies = window
    .filter((outcome) => outcome.success && outcome.latencyMs !== null)
    .map((outcome) => outcome.latencyMs ?? 0);
  if (latencies.length === 0) {
    return null;
  }
  return latencies.reduce((sum, value) => sum + value, 0) / latencies.length;
}

/**
 * Rolling per-backend reliability. The only state shared between sessions; every
 * mutation goes through `update`, which swaps in a new immutable entry in one step.
 */
export class BackendHealthRegistry {
  private states = new Map<string, BackendHealthState>();
  private readonly listeners = new Set<HealthListener>();

  constructor(
    private readonly settings: HealthSettings = config.health,
    private readonly now: () => number = () => Date.now()
  ) {}

  private update(backendId: string, change: (current: BackendHealthState) => BackendHealthState): BackendHealthState {
    const next = Object.freeze(change(this.states.get(backendId) ?? EMPTY_STATE));
    this.states.set(backendId, next);
    const record = this.toRecord(backendId, next);
    this.listeners.forEach((listener) => listener(record));
    return next;
  }

  recordSuccess(backendId: string, latencyMs: number): BackendHealthSnapshot {
    this.update(backendId, (current) => ({
      ...current,
      window: [...current.window, { success: true, latencyMs }].slice(-this.settings.windowSize)
    }));
    return this.snapshot(backendId);
  }

  recordFailure(backendId: string, latencyMs: number): BackendHealthSnapshot {
    const at = this.now();
    this.update(backendId, (current) => {
      const window = [...current.window, { success: false, latencyMs }].slice(-this.settings.windowSize);
      const unhealthy = successRateOf(window) < this.settings.minSuccessRate;
      return {
        window,
        lastFailureAt: at,
        deprioritizedUntil: unhealthy ? at + this.settings.deprioritizeMs : current.deprioritizedUntil
      };
    });
    return this.snapshot(backendId);
  }

  deprioritize(backendId: string): void {
    const until = this.now() + this.settings.deprioritizeMs;
    this.update(backendId, (current) => ({ ...current, deprioritizedUntil: until }));
  }

  isDeprioritized(backendId: string): boolean {
    const until = this.states.get(backendId)?.deprioritizedUntil;
    return until !== null && until !== undefined && until > this.now();
  }

  snapshot(backendId: string): BackendHealthSnapshot {
    const state = this.states.get(backendId) ?? EMPTY_STATE;
    return {
      backendId,
      samples: state.window.length,
      successRate: successRateOf(state.window),
      averageLatencyMs: averageLatencyOf(state.window),
      lastFailureAt: state.lastFailureAt,
      deprioritizedUntil: state.deprioritizedUntil,
      deprioritized: this.isDeprioritized(backendId)
    };
  }

  snapshots(): BackendHealthSnapshot[] {
    return Array.from(this.states.keys())
      .sort((a, b) => a.localeCompare(b))
      .map((backendId) => this.snapshot(backendId));
  }

  /**
   * Seeds windows from persisted records. Only the rate survives a restart, so the
   * window is rebuilt with the same proportion of successes.
   */
  hydrate(records: HealthRecord[]): void {
    for (const record of records) {
      const size = this.settings.windowSize;
      const successes = Math.round(Math.min(1, Math.max(0, record.rollingSuccessRate)) * size);
      const window: CallOutcome[] = [
        ...Array.from({ length: size - successes }, () => ({ success: false, latencyMs: null })),
        ...Array.from({ length: successes }, () => ({ success: true, latencyMs: null }))
      ];
      this.states.set(
        record.backendId,
        Object.freeze({ window, lastFailureAt: record.lastFailureAtMillis, deprioritizedUntil: null })
      );
    }
  }

  subscribe(listener: HealthListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  reset(): void {
    this.states = new Map();
  }

  private toRecord(backendId: string, state: BackendHealthState): HealthRecord {
    return {
      backendId,
      rollingSuccessRate: successRateOf(state.window),
      lastFailureAtMillis: state.lastFailureAt
    };
  }
}

let shared: BackendHealthRegistry | null = null;

export function getBackendHealth(): BackendHealthRegistry {
  if (!shared) {
    shared = new BackendHealthRegistry();
  }
  return shared;
}

export function resetBackendHealth(): void {
  shared?.reset();
}
