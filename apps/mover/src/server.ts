import Fastify, { type FastifyInstance } from "fastify";

import { registerHealthRoutes } from "./routes/health.js";
import { registerStatusRoutes, type StatusSources } from "./routes/status.js";

export interface BuildStatusContext extends StatusSources {
  logLevel: string | false;
}

export async function buildStatusServer(ctx: BuildStatusContext): Promise<FastifyInstance> {
  const app = Fastify({
    logger: ctx.logLevel === false ? false : { level: ctx.logLevel, name: "alist-mover-status" },
  });

  await registerHealthRoutes(app, ctx.loop);
  await registerStatusRoutes(app, ctx);

  app.setNotFoundHandler(async (_req, reply) => {
    return reply.code(404).send({ error: "not_found" });
  });

  return app;
}
