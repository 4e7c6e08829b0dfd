import type { BackendFailureKind, AnalysisErrorKind } from "../backends/errors";
import type { BackendTier } from "../backends/types";
import type { FusedHazard } from "../fusion/types";
import type { TagRecommendation } from "../recommendation/engine";

export type SessionState =
  | "IDLE"
  | "SELECTING_BACKENDS"
  | "ANALYZING"
  | "FUSING"
  | "RECOMMENDING"
  | "COMPLETE"
  | "FAILED";

export type AnalysisMode = "capture" | "stream";

export type SessionTransition = {
  from: SessionState;
  to: SessionState;
  at: number;
};

export type BackendAttempt = {
  backendId: string;
  tier: BackendTier;
  outcome: "SUCCESS" | BackendFailureKind;
  latencyMs: number;
  detectionCount: number;
  retry: boolean;
};

export type SessionError = {
  kind: AnalysisErrorKind;
  message: string;
  userMessage: string;
};

export type AnalysisSession = {
  sessionId: string;
  traceId: string;
  mode: AnalysisMode;
  state: SessionState;
  fusedHazards: FusedHazard[];
  recommendations: TagRecommendation[];
  autoSelectTags: string[];
  degradedCapability: boolean;
  backendChain: string[];
  backendsUsed: string[];
  attempts: BackendAttempt[];
  totalLatencyMs: number;
  startedAt: number;
  completedAt: number | null;
  transitions: SessionTransition[];
  error?: SessionError;
};

export const TERMINAL_STATES: readonly SessionState[] = ["COMPLETE", "FAILED"];

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.includes(state);
}
