import { BackendError, type BackendFailureKind } from "./errors";
import type {
  AnalysisContext,
  AnalysisImage,
  AnalyzerBackend,
  BackendTier,
  BoundingBox,
  CostClass,
  HazardDetection
} from "./types";
import { FULL_FRAME } from "./types";

export type FakeDetection = {
  hazardType: string;
  confidence: number;
  region?: BoundingBox;
};

export type FakeStep =
  | { detections: FakeDetection[]; delayMs?: number }
  | { fail: BackendFailureKind; delayMs?: number }
  | { hang: true };

const COST_BY_TIER: Record<BackendTier, CostClass> = {
  ON_DEVICE_MULTIMODAL: "LOCAL_COMPUTE",
  REMOTE_VISION: "REMOTE_METERED",
  LIGHTWEIGHT_DETECTOR: "LOCAL_FREE"
};

function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Scripted backend for tests and local runs. Each call consumes the next step;
 * the last step repeats once the script is exhausted.
 */
export class FakeAnalyzerBackend implements AnalyzerBackend {
  readonly costClass: CostClass;
  readonly capabilities: readonly string[];
  calls = 0;
  reloads = 0;
  private isAvailable: boolean;

  constructor(
    readonly id: string,
    readonly tier: BackendTier,
    private readonly steps: FakeStep[],
    options: { available?: boolean; capabilities?: string[] } = {}
  ) {
    this.costClass = COST_BY_TIER[tier];
    this.isAvailable = options.available ?? true;
    this.capabilities = options.capabilities ?? ["PPE"];
  }

  available(): boolean {
    return this.isAvailable;
  }

  setAvailable(value: boolean): void {
    this.isAvailable = value;
  }

  async reload(): Promise<void> {
    this.reloads += 1;
  }

  async analyze(_image: AnalysisImage, _context: AnalysisContext, signal: AbortSignal): Promise<HazardDetection[]> {
    const step = this.steps[Math.min(this.calls, this.steps.length - 1)];
    this.calls += 1;
    if (!step) {
      return [];
    }
    if ("hang" in step) {
      await new Promise<void>((_, reject) => {
        signal.addEventListener("abort", () => reject(signal.reason), { once: true });
      });
      return [];
    }
    if (step.delayMs) {
      await waitFor(step.delayMs, signal);
    }
    if ("fail" in step) {
      throw new BackendError(step.fail, `${this.id} scripted failure ${step.fail}`, this.id);
    }
    return step.detections.map((detection) => ({
      hazardType: detection.hazardType,
      confidence: detection.confidence,
      region: detection.region ?? FULL_FRAME,
      backendId: this.id,
      detectedAt: 0
    }));
  }
}
