import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  if (value.toLowerCase() === "true") {
    return true;
  }
  if (value.toLowerCase() === "false") {
    return false;
  }
  return fallback;
}

const connectivityQualitySchema = z.enum(["OFFLINE", "POOR", "FAIR", "GOOD", "EXCELLENT"]);

function parseConnectivity(value: string | undefined): z.infer<typeof connectivityQualitySchema> {
  const parsed = connectivityQualitySchema.safeParse(value?.toUpperCase());
  return parsed.success ? parsed.data : "GOOD";
}

const unitInterval = z.number().min(0).max(1);

export const recommendationThresholdsSchema = z
  .object({
    autoSelect: unitInterval,
    display: unitInterval
  })
  .refine((value) => value.display <= value.autoSelect, {
    message: "display threshold must not exceed the auto-select threshold"
  });

export const fusionSettingsSchema = z.object({
  iouThreshold: unitInterval,
  agreementBoost: z.number().min(0),
  weights: z.object({
    ON_DEVICE_MULTIMODAL: z.number().positive(),
    REMOTE_VISION: z.number().positive(),
    LIGHTWEIGHT_DETECTOR: z.number().positive()
  })
});

export const config = {
  port: Number(process.env.PORT ?? 3010),
  serviceName: process.env.SERVICE_NAME ?? "analysis-service",
  logLevel: process.env.LOG_LEVEL ?? "info",
  useInMemoryStore: process.env.USE_INMEMORY_STORE === "true",
  brokerBrokers: (process.env.BROKER_BROKERS ?? "localhost:9092").split(","),
  eventsEnabled: parseBoolean(process.env.EVENTS_ENABLED, false),
  taxonomyPath: process.env.TAXONOMY_PATH,
  connectivity: parseConnectivity(process.env.CONNECTIVITY_QUALITY),
  remoteVision: {
    baseUrl: process.env.REMOTE_VISION_URL ?? "",
    apiKey: process.env.REMOTE_VISION_API_KEY ?? "",
    maxConcurrency: parseNumber(process.env.REMOTE_VISION_MAX_CONCURRENCY, 3)
  },
  timeouts: {
    localMs: parseNumber(process.env.LOCAL_TIMEOUT_MS, 2000),
    remoteMs: parseNumber(process.env.REMOTE_TIMEOUT_MS, 10000),
    remoteRetryMs: parseNumber(process.env.REMOTE_RETRY_TIMEOUT_MS, 5000)
  },
  throttle: {
    minIntervalMs: parseNumber(process.env.FRAME_MIN_INTERVAL_MS, 500)
  },
  hybridMode: parseBoolean(process.env.HYBRID_MODE, false),
  simulateLocalBackends: parseBoolean(process.env.SIMULATE_LOCAL_BACKENDS, false),
  batchConcurrency: parseNumber(process.env.BATCH_MAX_CONCURRENCY, 3),
  fusion: fusionSettingsSchema.parse({
    iouThreshold: parseNumber(process.env.FUSION_IOU_THRESHOLD, 0.3),
    agreementBoost: parseNumber(process.env.FUSION_AGREEMENT_BOOST, 0.1),
    weights: {
      ON_DEVICE_MULTIMODAL: parseNumber(process.env.FUSION_WEIGHT_MULTIMODAL, 1.0),
      REMOTE_VISION: parseNumber(process.env.FUSION_WEIGHT_REMOTE, 1.2),
      LIGHTWEIGHT_DETECTOR: parseNumber(process.env.FUSION_WEIGHT_LIGHTWEIGHT, 0.7)
    }
  }),
  recommendation: recommendationThresholdsSchema.parse({
    autoSelect: parseNumber(process.env.TAG_AUTO_SELECT_THRESHOLD, 0.8),
    display: parseNumber(process.env.TAG_DISPLAY_THRESHOLD, 0.4)
  }),
  health: {
    windowSize: parseNumber(process.env.HEALTH_WINDOW_SIZE, 20),
    minSuccessRate: parseNumber(process.env.HEALTH_MIN_SUCCESS_RATE, 0.5),
    deprioritizeMs: parseNumber(process.env.HEALTH_DEPRIORITIZE_MS, 5 * 60 * 1000)
  },
  db: {
    enabled: parseBoolean(process.env.DB_ENABLED, false),
    host: process.env.DB_HOST ?? "localhost",
    port: Number(process.env.DB_PORT ?? 5432),
    user: process.env.DB_USER ?? "analysis",
    password: process.env.DB_PASSWORD ?? "analysis",
    database: process.env.DB_NAME ?? "analysis"
  }
};

export type ConnectivityQuality = z.infer<typeof connectivityQualitySchema>;
export type FusionSettings = z.infer<typeof fusionSettingsSchema>;
export type RecommendationThresholds = z.infer<typeof recommendationThresholdsSchema>;
