import type { FastifyInstance } from "fastify";

import type { LedgerRecordV1, LedgerStatsV1 } from "@alist-mover/shared";

import type { MonitorLoop } from "../monitor/loop.js";
import type { DispatcherStats } from "../notify/dispatcher.js";

export type StatusSources = {
  loop: MonitorLoop;
  ledger: {
    list(limit: number): LedgerRecordV1[];
    stats(): LedgerStatsV1;
  };
  notifications?: { stats(): DispatcherStats };
  configSummary: Record<string, unknown>;
};

function parseLimit(raw: unknown): number {
  const n = Number(raw ?? "50");
  if (!Number.isFinite(n)) return 50;
  return Math.max(1, Math.min(1000, Math.floor(n)));
}

export async function registerStatusRoutes(app: FastifyInstance, sources: StatusSources): Promise<void> {
  app.get("/v1/status", async (_req, reply) => {
    return reply.code(200).send({
      ...sources.loop.status(),
      config: sources.configSummary,
      ledger: sources.ledger.stats(),
      notifications: sources.notifications?.stats() ?? null,
    });
  });

  app.get<{
    Querystring: { limit?: string };
  }>("/v1/ledger", async (req, reply) => {
    const limit = parseLimit(req.query.limit);
    return reply.code(200).send({ records: sources.ledger.list(limit) });
  });
}
