import Fastify, { type FastifyInstance } from "fastify";
import { registerRoutes, type RouteDeps } from "./api/routes";
import { registerHealthRoutes } from "./health";
import { getTraceIdFromRequest } from "./trace/trace";

export async function buildApp(deps: RouteDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: false, bodyLimit: 25 * 1024 * 1024 });
  app.addHook("onRequest", (request, reply, done) => {
    const traceId = getTraceIdFromRequest(request);
    reply.header("x-trace-id", traceId);
    request.headers["x-trace-id"] = traceId;
    done();
  });
  await registerHealthRoutes(app, deps.orchestrator);
  await registerRoutes(app, deps);
  return app;
}
