import { BackendError, classifyBackendError } from "./errors";
import type { AnalysisContext, AnalysisImage, AnalyzerBackend, AnalyzerResult, BoundingBox, HazardDetection } from "./types";

export type InvokeOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => number;
};

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function clampRegion(region: BoundingBox): BoundingBox {
  const x = clampUnit(region.x);
  const y = clampUnit(region.y);
  return {
    x,
    y,
    width: Math.min(1 - x, Math.max(0, region.width)),
    height: Math.min(1 - y, Math.max(0, region.height))
  };
}

function isFiniteRegion(region: BoundingBox): boolean {
  return [region.x, region.y, region.width, region.height].every((value) => Number.isFinite(value));
}

export function sanitizeDetections(detections: HazardDetection[], backendId: string, detectedAt: number): HazardDetection[] {
  return detections
    .filter((detection) => Number.isFinite(detection.confidence) && isFiniteRegion(detection.region))
    .filter((detection) => detection.hazardType.trim().length > 0)
    .map((detection) => ({
      hazardType: detection.hazardType,
      confidence: clampUnit(detection.confidence),
      region: clampRegion(detection.region),
      backendId,
      detectedAt: Number.isFinite(detection.detectedAt) ? detection.detectedAt : detectedAt
    }));
}

export type BackendCall = {
  result: Promise<AnalyzerResult>;
  // settles once the adapter's own analyze promise settles, which can be after a timeout
  settled: Promise<void>;
};

/**
 * Runs one backend call under a timeout and the caller's abort signal. The
 * result never rejects: every failure comes back as a classified BackendError.
 * An adapter that ignores its abort signal keeps running after a timeout or
 * cancel; `settled` tracks that work so a caller holding an exclusive slot can
 * keep it until the adapter is really done.
 */
export function startBackendCall(
  backend: AnalyzerBackend,
  image: AnalysisImage,
  context: AnalysisContext,
  options: InvokeOptions
): BackendCall {
  const now = options.now ?? (() => Date.now());
  const startedAt = now();

  if (options.signal?.aborted) {
    return {
      result: Promise.resolve({
        ok: false,
        error: new BackendError("CANCELLED", "Analysis cancelled before the call started", backend.id),
        latencyMs: 0
      }),
      settled: Promise.resolve()
    };
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new BackendError("TIMEOUT", `Backend ${backend.id} timed out after ${options.timeoutMs}ms`, backend.id);
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);
  });

  const cancelled = new Promise<never>((_, reject) => {
    onParentAbort = () => {
      const error = new BackendError("CANCELLED", `Backend ${backend.id} call cancelled`, backend.id);
      controller.abort(error);
      reject(error);
    };
    options.signal?.addEventListener("abort", onParentAbort, { once: true });
  });

  let analysis: Promise<HazardDetection[]>;
  try {
    analysis = backend.analyze(image, context, controller.signal);
  } catch (error) {
    analysis = Promise.reject(error);
  }
  const settled = analysis.then(
    () => undefined,
    () => undefined
  );

  const result = (async (): Promise<AnalyzerResult> => {
    try {
      const detections = await Promise.race([analysis, timeout, cancelled]);
      const finishedAt = now();
      return {
        ok: true,
        detections: sanitizeDetections(detections, backend.id, finishedAt),
        latencyMs: finishedAt - startedAt
      };
    } catch (error) {
      // an adapter may reject with its own abort error once we abort it; the abort reason wins
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      return { ok: false, error: classifyBackendError(reason, backend.id), latencyMs: now() - startedAt };
    } finally {
      clearTimeout(timer);
      if (onParentAbort) {
        options.signal?.removeEventListener("abort", onParentAbort);
      }
    }
  })();

  return { result, settled };
}

export function invokeBackend(
  backend: AnalyzerBackend,
  image: AnalysisImage,
  context: AnalysisContext,
  options: InvokeOptions
): Promise<AnalyzerResult> {
  return startBackendCall(backend, image, context, options).result;
}
