import type { FastifyInstance, FastifyReply } from "fastify";
import { z, type ZodError } from "zod";
import type { AnalysisContext, AnalysisImage } from "../backends/types";
import type { SmartAnalysisOrchestrator } from "../orchestrator/orchestrator";
import type { AnalysisSession } from "../orchestrator/session-types";
import { isTerminal } from "../orchestrator/session-types";
import type { HazardTaxonomy } from "../taxonomy/types";
import { getTraceIdFromRequest } from "../trace/trace";

const imageSchema = z.object({
  data: z.string().min(1),
  width: z.number().int(),
  height: z.number().int(),
  format: z.enum(["jpeg", "png", "rgba"]).optional(),
  capturedAt: z.number().optional(),
  location: z
    .object({
      latitude: z.number().min(-90).max(90),
      longitude: z.number().min(-180).max(180),
      accuracyMeters: z.number().nonnegative().optional()
    })
    .optional()
});

const contextSchema = z
  .object({
    workType: z.string().min(1).optional(),
    hybrid: z.boolean().optional()
  })
  .default({});

const analysisRequestSchema = z.object({
  image: imageSchema,
  context: contextSchema
});

const batchRequestSchema = z.object({
  items: z.array(analysisRequestSchema).min(1).max(20),
  maxConcurrency: z.number().int().min(1).max(3).optional()
});

const sessionParamsSchema = z.object({
  sessionId: z.string().min(1)
});

type AnalysisRequest = z.infer<typeof analysisRequestSchema>;

export type RouteDeps = {
  orchestrator: SmartAnalysisOrchestrator;
  taxonomy: HazardTaxonomy;
};

function toImage(input: AnalysisRequest["image"]): AnalysisImage {
  return {
    data: new Uint8Array(Buffer.from(input.data, "base64")),
    width: input.width,
    height: input.height,
    format: input.format,
    capturedAt: input.capturedAt,
    location: input.location
  };
}

function toContext(input: AnalysisRequest["context"], traceId: string): AnalysisContext {
  return { workType: input.workType, hybrid: input.hybrid, traceId };
}

export function statusForSession(session: AnalysisSession): number {
  if (session.state === "COMPLETE") {
    return 200;
  }
  switch (session.error?.kind) {
    case "MalformedInput":
      return 422;
    case "NoBackendAvailable":
      return 503;
    case "Cancelled":
      return 409;
    default:
      return 502;
  }
}

function badRequest(reply: FastifyReply, error: ZodError) {
  reply.code(400);
  return {
    message: "Invalid request",
    issues: error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
  };
}

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { orchestrator, taxonomy } = deps;

  app.post("/v1/analysis/photo", async (request, reply) => {
    const parsed = analysisRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    const traceId = getTraceIdFromRequest(request);
    const session = await orchestrator.submitPhoto(toImage(parsed.data.image), toContext(parsed.data.context, traceId));
    reply.code(statusForSession(session));
    return session;
  });

  app.post("/v1/analysis/frame", async (request, reply) => {
    const parsed = analysisRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    const traceId = getTraceIdFromRequest(request);
    const submission = orchestrator.submitFrame(toImage(parsed.data.image), toContext(parsed.data.context, traceId));
    if (!submission) {
      reply.code(429);
      return { throttled: true, retryAfterMs: orchestrator.msUntilNextFrame() };
    }
    reply.code(202);
    return { sessionId: submission.sessionId, traceId };
  });

  app.post("/v1/analysis/batch", async (request, reply) => {
    const parsed = batchRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return badRequest(reply, parsed.error);
    }
    const traceId = getTraceIdFromRequest(request);
    const sessions = await orchestrator.analyzeBatch(
      parsed.data.items.map((item) => ({ image: toImage(item.image), context: toContext(item.context, traceId) })),
      parsed.data.maxConcurrency
    );
    return {
      traceId,
      completed: sessions.filter((session) => session.state === "COMPLETE").length,
      failed: sessions.filter((session) => session.state === "FAILED").length,
      sessions
    };
  });

  app.get("/v1/analysis/sessions/:sessionId", async (request, reply) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const session = orchestrator.getSession(sessionId);
    if (!session) {
      reply.code(404);
      return { message: "Session not found", sessionId };
    }
    if (!isTerminal(session.state)) {
      reply.code(202);
      return { sessionId, state: session.state };
    }
    return session;
  });

  app.delete("/v1/analysis/sessions/:sessionId", async (request, reply) => {
    const { sessionId } = sessionParamsSchema.parse(request.params);
    const state = orchestrator.getSessionState(sessionId);
    if (!state) {
      reply.code(404);
      return { message: "Session not found", sessionId };
    }
    if (!orchestrator.cancelSession(sessionId)) {
      reply.code(409);
      return { message: "Session already finished", sessionId, state };
    }
    reply.code(202);
    return { sessionId, cancelled: true };
  });

  app.get("/v1/backends", async () => orchestrator.performHealthCheck());

  app.get("/v1/taxonomy", async () => ({
    version: taxonomy.info.version,
    hash: taxonomy.info.hash,
    tags: taxonomy.listTags(),
    hazards: taxonomy.listHazards()
  }));
}
