export type BackendFailureKind =
  | "MODEL_NOT_LOADED"
  | "TIMEOUT"
  | "MALFORMED_INPUT"
  | "REMOTE_UNAUTHORIZED"
  | "REMOTE_RATE_LIMITED"
  | "NETWORK"
  | "INVALID_RESPONSE"
  | "CANCELLED";

export type AnalysisErrorKind =
  | "BackendUnavailable"
  | "BackendTimeout"
  | "BackendRateLimited"
  | "MalformedInput"
  | "NoBackendAvailable"
  | "PartialFusionFailure"
  | "Cancelled";

export class BackendError extends Error {
  constructor(
    public readonly kind: BackendFailureKind,
    message: string,
    public readonly backendId?: string,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = "BackendError";
  }
}

const FAILURE_TO_ANALYSIS: Record<BackendFailureKind, AnalysisErrorKind> = {
  MODEL_NOT_LOADED: "BackendUnavailable",
  TIMEOUT: "BackendTimeout",
  MALFORMED_INPUT: "MalformedInput",
  REMOTE_UNAUTHORIZED: "BackendUnavailable",
  REMOTE_RATE_LIMITED: "BackendRateLimited",
  NETWORK: "BackendTimeout",
  INVALID_RESPONSE: "BackendUnavailable",
  CANCELLED: "Cancelled"
};

export function toAnalysisErrorKind(kind: BackendFailureKind): AnalysisErrorKind {
  return FAILURE_TO_ANALYSIS[kind];
}

export const USER_MESSAGES: Partial<Record<AnalysisErrorKind, string>> = {
  MalformedInput: "Could not analyze this image. Please retake the photo.",
  NoBackendAvailable: "Analysis is temporarily unavailable. Please tag this photo manually.",
  Cancelled: "Analysis was cancelled before it finished."
};

type ErrorCandidate = {
  name?: unknown;
  code?: unknown;
  status?: unknown;
  statusCode?: unknown;
  message?: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function asCandidate(value: unknown): ErrorCandidate | null {
  return isRecord(value) ? value : null;
}

function describe(error: unknown): string {
  const candidate = asCandidate(error);
  if (candidate && typeof candidate.message === "string" && candidate.message.length > 0) {
    return candidate.message;
  }
  return typeof error === "string" ? error : "Unknown backend failure";
}

export function classifyStatus(status: number): BackendFailureKind {
  if (status === 401 || status === 403) {
    return "REMOTE_UNAUTHORIZED";
  }
  if (status === 429) {
    return "REMOTE_RATE_LIMITED";
  }
  if (status === 400 || status === 413 || status === 415 || status === 422) {
    return "MALFORMED_INPUT";
  }
  return "NETWORK";
}

/**
 * Converts anything an adapter throws into a BackendError.
 */
export function classifyBackendError(error: unknown, backendId?: string): BackendError {
  if (error instanceof BackendError) {
    return error.backendId || !backendId ? error : new BackendError(error.kind, error.message, backendId, error.detail);
  }

  const candidate = asCandidate(error);
  const message = describe(error);

  if (candidate?.name === "AbortError") {
    return new BackendError("CANCELLED", message, backendId, error);
  }
  if (candidate?.name === "TimeoutError" || candidate?.code === "ETIMEDOUT") {
    return new BackendError("TIMEOUT", message, backendId, error);
  }

  const status = typeof candidate?.status === "number" ? candidate.status : candidate?.statusCode;
  if (typeof status === "number") {
    return new BackendError(classifyStatus(status), message, backendId, error);
  }

  if (
    candidate?.code === "ECONNREFUSED" ||
    candidate?.code === "ECONNRESET" ||
    candidate?.code === "ENOTFOUND" ||
    candidate?.code === "EAI_AGAIN" ||
    (error instanceof TypeError && message.includes("fetch failed"))
  ) {
    return new BackendError("NETWORK", message, backendId, error);
  }

  return new BackendError("INVALID_RESPONSE", message, backendId, error);
}
