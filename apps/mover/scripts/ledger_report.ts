import path from "node:path";

import { loadConfig } from "../src/config.js";
import { FileLedger } from "../src/monitor/ledger.js";

function parseLimit(raw: string | undefined): number {
  const n = Number(raw ?? "20");
  if (!Number.isFinite(n) || n <= 0) return 20;
  return Math.min(1000, Math.floor(n));
}

async function resolveLedgerPath(): Promise<string> {
  const explicit = process.env.MOVER_LEDGER_PATH?.trim();
  if (explicit) return path.resolve(explicit);
  const cfg = await loadConfig();
  return cfg.monitor.ledgerPath;
}

async function main(): Promise<void> {
  const ledgerPath = await resolveLedgerPath();
  const ledger = new FileLedger(ledgerPath);
  // read only: the running monitor may be appending to this file
  const stats = await ledger.load({ compact: false });
  const records = ledger.list(parseLimit(process.argv[2]));

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        ledger: ledgerPath,
        stats,
        recent: records.map((r) => ({
          path: r.path,
          size: r.size,
          outcome: r.outcome,
          transferred_at: r.transferred_at,
          ...(r.detail ? { detail: r.detail } : {}),
        })),
      },
      null,
      2,
    ),
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
