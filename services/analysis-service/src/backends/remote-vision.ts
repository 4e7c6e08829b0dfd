import { z } from "zod";
import { BackendError, classifyStatus } from "./errors";
import type { AnalysisContext, AnalysisImage, AnalyzerBackend, BackendTier, CostClass, HazardDetection } from "./types";
import { FULL_FRAME } from "./types";

export type RemoteVisionOptions = {
  baseUrl: string;
  apiKey: string;
  capabilities: readonly string[];
  isConnected?: () => boolean;
};

const remoteResponseSchema = z.object({
  hazards: z.array(
    z.object({
      type: z.string().min(1),
      confidence: z.number(),
      box: z
        .object({
          x: z.number(),
          y: z.number(),
          width: z.number(),
          height: z.number()
        })
        .nullish()
    })
  )
});

export class RemoteVisionBackend implements AnalyzerBackend {
  readonly tier: BackendTier = "REMOTE_VISION";
  readonly costClass: CostClass = "REMOTE_METERED";
  readonly capabilities: readonly string[];

  constructor(
    private readonly options: RemoteVisionOptions,
    readonly id = "remote-vision"
  ) {
    this.capabilities = options.capabilities;
  }

  available(): boolean {
    const configured = this.options.baseUrl.length > 0 && this.options.apiKey.length > 0;
    return configured && (this.options.isConnected?.() ?? true);
  }

  async analyze(image: AnalysisImage, context: AnalysisContext, signal: AbortSignal): Promise<HazardDetection[]> {
    const response = await fetch(`${this.options.baseUrl}/v1/vision/hazards`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.options.apiKey}`,
        "x-trace-id": context.traceId ?? ""
      },
      body: JSON.stringify({
        image: Buffer.from(image.data).toString("base64"),
        width: image.width,
        height: image.height,
        format: image.format ?? "jpeg",
        workType: context.workType ?? null
      }),
      signal
    });

    if (!response.ok) {
      throw new BackendError(
        classifyStatus(response.status),
        `Remote vision responded with HTTP ${response.status}`,
        this.id
      );
    }

    const parsed = remoteResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BackendError("INVALID_RESPONSE", "Remote vision response did not match the hazard schema", this.id);
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
