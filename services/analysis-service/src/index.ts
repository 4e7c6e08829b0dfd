import { config } from "./config";
import { logger } from "./logger";
import { buildApp } from "./app";
import { createBackends } from "./backends/registry";
import { StaticConnectivityMonitor } from "./connectivity";
import { closeDb, migrate } from "./db";
import { getProducer, startProducer, stopProducer } from "./events/producer";
import { KafkaSessionEventPublisher, type SessionEventPublisher } from "./events/session-publisher";
import { getBackendHealth } from "./health/backend-health";
import { createHealthStore } from "./health/health-store";
import { SmartAnalysisOrchestrator } from "./orchestrator/orchestrator";
import { getTaxonomy } from "./taxonomy/loader";
import { startTelemetry, stopTelemetry } from "./telemetry";

const taxonomy = getTaxonomy();
const connectivity = new StaticConnectivityMonitor(config.connectivity);
const health = getBackendHealth();
const healthStore = createHealthStore();
const publisher: SessionEventPublisher | undefined = config.eventsEnabled
  ? new KafkaSessionEventPublisher(getProducer())
  : undefined;
const orchestrator = new SmartAnalysisOrchestrator({
  backends: createBackends(connectivity),
  taxonomy,
  health,
  connectivity,
  publisher
});
const appReady = buildApp({ orchestrator, taxonomy });

async function start(): Promise<void> {
  await startTelemetry();
  await migrate();
  health.hydrate(await healthStore.loadAll());
  health.subscribe((record) => {
    healthStore.save(record).catch((error: unknown) => {
      logger.warn({ error, backendId: record.backendId }, "Failed to persist backend health");
    });
  });
  if (config.eventsEnabled) {
    await startProducer();
  }

  const app = await appReady;
  await app.listen({ port: config.port, host: "0.0.0.0" });
  logger.info(
    { port: config.port, taxonomyVersion: taxonomy.info.version, connectivity: config.connectivity, traceId: "system" },
    "Analysis service listening"
  );
}

async function shutdown(): Promise<void> {
  logger.info({ traceId: "system" }, "Shutting down analysis service");
  const app = await appReady;
  await app.close();
  orchestrator.cancelAll();
  await orchestrator.drain();
  await stopProducer();
  await closeDb();
  await stopTelemetry();
}

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

start().catch((error) => {
  logger.error({ error, traceId: "system" }, "Failed to start analysis service");
  process.exit(1);
});
