import path from "node:path";
import pino from "pino";
import type { AnalysisImage, BackendTier, BoundingBox, HazardDetection } from "../src/backends/types";
import { FULL_FRAME } from "../src/backends/types";
import type { OrchestratorSettings } from "../src/orchestrator/orchestrator";
import { loadTaxonomyFromDisk } from "../src/taxonomy/loader";

export const TAXONOMY_PATH = path.resolve(__dirname, "..", "..", "..", "taxonomy", "hazard-taxonomy.v1.yaml");

export const taxonomy = loadTaxonomyFromDisk(TAXONOMY_PATH);

export const silentLogger = pino({ level: "silent" });

export const fusionSettings = {
  iouThreshold: 0.3,
  agreementBoost: 0.1,
  weights: { ON_DEVICE_MULTIMODAL: 1.0, REMOTE_VISION: 1.2, LIGHTWEIGHT_DETECTOR: 0.7 }
};

export const thresholds = { autoSelect: 0.8, display: 0.4 };

export const testSettings: OrchestratorSettings = {
  timeouts: { localMs: 200, remoteMs: 40, remoteRetryMs: 20 },
  remoteConcurrency: 3,
  hybridMode: false,
  batchConcurrency: 3,
  fusion: fusionSettings,
  recommendation: thresholds
};

export function makeImage(overrides: Partial<AnalysisImage> = {}): AnalysisImage {
  return {
    data: new Uint8Array([255, 216, 255, 224]),
    width: 640,
    height: 480,
    format: "jpeg",
    ...overrides
  };
}

export function detection(
  backendId: string,
  hazardType: string,
  confidence: number,
  region: BoundingBox = FULL_FRAME
): HazardDetection {
  return { backendId, hazardType, confidence, region, detectedAt: 0 };
}

export function backendResult(backendId: string, tier: BackendTier, detections: HazardDetection[]) {
  return { backendId, tier, detections };
}
