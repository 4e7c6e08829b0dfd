import { BackendError } from "./errors";
import type { AnalysisContext, AnalysisImage, AnalyzerBackend, BackendTier, CostClass, HazardDetection } from "./types";

export type PixelBox = { x1: number; y1: number; x2: number; y2: number };

export type RawObjectDetection = {
  label: string;
  score: number;
  box: PixelBox;
};

export type ObjectDetectorRuntime = {
  isLoaded: () => boolean;
  load: () => Promise<void>;
  detect: (image: AnalysisImage, signal: AbortSignal) => Promise<RawObjectDetection[]>;
};

// Detector class labels that indicate a hazard on their own.
export const DEFAULT_LABEL_MAP: Record<string, string> = {
  no_hardhat: "MISSING_HARD_HAT",
  no_safety_vest: "MISSING_SAFETY_VEST",
  no_goggles: "MISSING_EYE_PROTECTION",
  no_gloves: "MISSING_GLOVES",
  open_edge: "UNPROTECTED_EDGE",
  exposed_wire: "EXPOSED_WIRING",
  debris: "DEBRIS_TRIP_HAZARD",
  open_trench: "UNSHORED_EXCAVATION"
};

export const DETECTOR_CAPABILITIES = ["PPE", "FALL_PROTECTION", "ELECTRICAL_SAFETY", "HOUSEKEEPING", "EXCAVATION"];

export function normalizePixelBox(box: PixelBox, width: number, height: number) {
  const left = Math.min(box.x1, box.x2);
  const top = Math.min(box.y1, box.y2);
  return {
    x: left / width,
    y: top / height,
    width: Math.abs(box.x2 - box.x1) / width,
    height: Math.abs(box.y2 - box.y1) / height
  };
}

export class LightweightDetectorBackend implements AnalyzerBackend {
  readonly tier: BackendTier = "LIGHTWEIGHT_DETECTOR";
  readonly costClass: CostClass = "LOCAL_FREE";
  readonly capabilities: readonly string[] = DETECTOR_CAPABILITIES;

  constructor(
    private readonly runtime: ObjectDetectorRuntime,
    private readonly options: { labelMap?: Record<string, string>; minScore?: number } = {},
    readonly id = "local-detector"
  ) {}

  available(): boolean {
    return this.runtime.isLoaded();
  }

  async reload(): Promise<void> {
    await this.runtime.load();
  }

  async analyze(image: AnalysisImage, _context: AnalysisContext, signal: AbortSignal): Promise<HazardDetection[]> {
    if (!this.runtime.isLoaded()) {
      throw new BackendError("MODEL_NOT_LOADED", "Object detector model is not loaded", this.id);
    }
    const labelMap = this.options.labelMap ?? DEFAULT_LABEL_MAP;
    const minScore = this.options.minScore ?? 0.25;
    const raw = await this.runtime.detect(image, signal);
    const detectedAt = Date.now();

    const detections: HazardDetection[] = [];
    for (const item of raw) {
      if (!Object.hasOwn(labelMap, item.label) || item.score < minScore) {
        continue;
      }
      const hazardType = labelMap[item.label];
      detections.push({
        hazardType,
        confidence: item.score,
        region: normalizePixelBox(item.box, image.width, image.height),
        backendId: this.id,
        detectedAt
      });
    }
    return detections;
  }
}
