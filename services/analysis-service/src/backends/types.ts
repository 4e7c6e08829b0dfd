import type { BackendError } from "./errors";

export type BackendTier = "ON_DEVICE_MULTIMODAL" | "REMOTE_VISION" | "LIGHTWEIGHT_DETECTOR";

export type CostClass = "LOCAL_FREE" | "LOCAL_COMPUTE" | "REMOTE_METERED";

export type BoundingBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export const FULL_FRAME: BoundingBox = { x: 0, y: 0, width: 1, height: 1 };

export type GeoLocation = {
  latitude: number;
  longitude: number;
  accuracyMeters?: number;
};

export type AnalysisImage = {
  data: Uint8Array;
  width: number;
  height: number;
  format?: "jpeg" | "png" | "rgba";
  capturedAt?: number;
  location?: GeoLocation;
};

export type AnalysisContext = {
  workType?: string;
  hybrid?: boolean;
  traceId?: string;
  signal?: AbortSignal;
};

export type HazardDetection = {
  hazardType: string;
  confidence: number;
  region: BoundingBox;
  backendId: string;
  detectedAt: number;
};

export interface AnalyzerBackend {
  readonly id: string;
  readonly tier: BackendTier;
  readonly costClass: CostClass;
  readonly capabilities: readonly string[];
  available(): boolean;
  analyze(image: AnalysisImage, context: AnalysisContext, signal: AbortSignal): Promise<HazardDetection[]>;
  reload?(): Promise<void>;
}

export type AnalyzerResult =
  | { ok: true; detections: HazardDetection[]; latencyMs: number }
  | { ok: false; error: BackendError; latencyMs: number };

export function isLocalTier(tier: BackendTier): boolean {
  return tier !== "REMOTE_VISION";
}
