import type { FastifyInstance } from "fastify";
import { Kafka } from "kafkajs";
import { config } from "./config";
import { getDb } from "./db";
import type { SmartAnalysisOrchestrator } from "./orchestrator/orchestrator";

export async function registerHealthRoutes(app: FastifyInstance, orchestrator: SmartAnalysisOrchestrator): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async (_request, reply) => {
    if (config.db.enabled && !config.useInMemoryStore) {
      await getDb().query("SELECT 1");
    }
    if (config.eventsEnabled) {
      const kafka = new Kafka({ clientId: config.serviceName, brokers: config.brokerBrokers });
      const admin = kafka.admin();
      await admin.connect();
      await admin.listTopics();
      await admin.disconnect();
    }
    const analysis = orchestrator.performHealthCheck();
    if (analysis.status === "unavailable") {
      reply.code(503);
      return { status: "unavailable", analysis: analysis.status };
    }
    return { status: "ready", analysis: analysis.status };
  });
}
