import type { BackendTier, BoundingBox, HazardDetection } from "../backends/types";
import type { FusionSettings } from "../config";
import type { Severity } from "../taxonomy/types";

export type BackendDetections = {
  backendId: string;
  tier: BackendTier;
  detections: HazardDetection[];
};

export type FusedHazard = {
  id: string;
  hazardType: string;
  confidence: number;
  severity: Severity;
  region: BoundingBox;
  contributingBackends: string[];
  detectionCount: number;
};

export type FusionOptions = FusionSettings & {
  severityOf: (hazardType: string) => Severity;
  backendWeights?: Record<string, number>;
};
