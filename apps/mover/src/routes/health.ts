import type { FastifyInstance } from "fastify";

import { MonitorState } from "@alist-mover/shared";

import type { MonitorLoop } from "../monitor/loop.js";

export async function registerHealthRoutes(app: FastifyInstance, loop: MonitorLoop): Promise<void> {
  app.get("/health", async (_req, reply) => {
    const state = loop.state;
    const ok = state !== MonitorState.Stopped;
    return reply.code(ok ? 200 : 503).send({ ok, state });
  });
}
