import { z } from "zod";
import { BackendError } from "./errors";
import type { AnalysisContext, AnalysisImage, AnalyzerBackend, BackendTier, CostClass, HazardDetection } from "./types";
import { FULL_FRAME } from "./types";

export type MultimodalRuntime = {
  isLoaded: () => boolean;
  load: () => Promise<void>;
  generate: (input: { image: AnalysisImage; prompt: string; signal: AbortSignal }) => Promise<string>;
};

const modelHazardSchema = z.object({
  type: z.string().min(1),
  confidence: z.number(),
  box: z
    .object({
      x: z.number(),
      y: z.number(),
      width: z.number(),
      height: z.number()
    })
    .optional()
});

const modelOutputSchema = z.object({
  hazards: z.array(modelHazardSchema)
});

export function buildMultimodalPrompt(workType: string | undefined, capabilities: readonly string[]): string {
  const scope = workType ? workType.replace(/_/g, " ").toLowerCase() : "general construction";
  return [
    `You are inspecting a ${scope} site photo for safety hazards.`,
    `Report only hazards in these categories: ${capabilities.join(", ")}.`,
    "Answer with JSON: {\"hazards\":[{\"type\":\"UPPER_SNAKE_CASE\",\"confidence\":0..1,\"box\":{\"x\":0..1,\"y\":0..1,\"width\":0..1,\"height\":0..1}}]}."
  ].join("\n");
}

function extractJson(raw: string): unknown {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new BackendError("INVALID_RESPONSE", "Model output did not contain a JSON object");
  }
  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    throw new BackendError("INVALID_RESPONSE", "Model output was not valid JSON", undefined, error);
  }
}

export class OnDeviceMultimodalBackend implements AnalyzerBackend {
  readonly tier: BackendTier = "ON_DEVICE_MULTIMODAL";
  readonly costClass: CostClass = "LOCAL_COMPUTE";

  constructor(
    private readonly runtime: MultimodalRuntime,
    readonly capabilities: readonly string[],
    readonly id = "on-device-multimodal"
  ) {}

  available(): boolean {
    return this.runtime.isLoaded();
  }

  async reload(): Promise<void> {
    await this.runtime.load();
  }

  async analyze(image: AnalysisImage, context: AnalysisContext, signal: AbortSignal): Promise<HazardDetection[]> {
    if (!this.runtime.isLoaded()) {
      throw new BackendError("MODEL_NOT_LOADED", "On-device multimodal model is not loaded", this.id);
    }
    const raw = await this.runtime.generate({
      image,
      prompt: buildMultimodalPrompt(context.workType, this.capabilities),
      signal
    });
    const parsed = modelOutputSchema.safeParse(extractJson(raw));
    if (!parsed.success) {
      throw new BackendError("INVALID_RESPONSE", "Model output did not match the hazard schema", this.id);
    }
    const detectedAt = Date.now();
    return parsed.data.hazards.map((hazard) => ({
      hazardType: hazard.type.toUpperCase(),
      confidence: hazard.confidence,
      region: hazard.box ?? FULL_FRAME,
      backendId: this.id,
      detectedAt
    }));
  }
}
