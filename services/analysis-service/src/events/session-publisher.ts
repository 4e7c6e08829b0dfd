import { v4 as uuidv4 } from "uuid";
import type { Producer } from "kafkajs";
import { config } from "../config";
import type { AnalysisSession } from "../orchestrator/session-types";
import type { EventEnvelope } from "./envelope";
import { topics } from "./topics";

export type SessionCompletedEvent = {
  sessionId: string;
  mode: AnalysisSession["mode"];
  state: AnalysisSession["state"];
  degradedCapability: boolean;
  autoSelectTags: string[];
  suggestedTags: string[];
  hazards: Array<{ hazardType: string; confidence: number; severity: string }>;
  backendsUsed: string[];
  totalLatencyMs: number;
  errorKind: string | null;
};

export interface SessionEventPublisher {
  publish(session: AnalysisSession): Promise<void>;
}

export function toSessionEnvelope(session: AnalysisSession): EventEnvelope<SessionCompletedEvent> {
  return {
    id: uuidv4(),
    type: topics.analysisSessionCompleted,
    source: config.serviceName,
    time: new Date(session.completedAt ?? session.startedAt).toISOString(),
    subject: session.sessionId,
    traceId: session.traceId,
    data: {
      sessionId: session.sessionId,
      mode: session.mode,
      state: session.state,
      degradedCapability: session.degradedCapability,
      autoSelectTags: [...session.autoSelectTags],
      suggestedTags: session.recommendations
        .filter((recommendation) => recommendation.reason === "SUGGESTED")
        .map((recommendation) => recommendation.tag.id),
      hazards: session.fusedHazards.map((hazard) => ({
        hazardType: hazard.hazardType,
        confidence: hazard.confidence,
        severity: hazard.severity
      })),
      backendsUsed: [...session.backendsUsed],
      totalLatencyMs: session.totalLatencyMs,
      errorKind: session.error?.kind ?? null
    }
  };
}

export class KafkaSessionEventPublisher implements SessionEventPublisher {
  constructor(private readonly producer: Pick<Producer, "send">) {}

  async publish(session: AnalysisSession): Promise<void> {
    const event = toSessionEnvelope(session);
    await this.producer.send({
      topic: topics.analysisSessionCompleted,
      messages: [{ key: session.sessionId, value: JSON.stringify(event) }]
    });
  }
}
