import type { FastifyInstance } from "fastify";

import { AlistClient } from "./alist/client.js";
import { describeConfig, loadConfig, type AppConfig } from "./config.js";
import { ConfigError, StartupError, toErrorMessage } from "./errors.js";
import { createLogger, type AppLogger } from "./logger.js";
import { CompletenessDetector, completenessPolicy, minSpacingForInterval } from "./monitor/completeness.js";
import { FileLedger } from "./monitor/ledger.js";
import { MonitorLoop, type MonitorExit } from "./monitor/loop.js";
import { TransferEngine } from "./monitor/transfer.js";
import { NotificationDispatcher } from "./notify/dispatcher.js";
import { retryPolicyFrom } from "./retry.js";
import { buildStatusServer } from "./server.js";

const NOTIFY_FLUSH_TIMEOUT_MS = 10_000;

async function startStatusServer(
  cfg: AppConfig,
  parts: { loop: MonitorLoop; ledger: FileLedger; dispatcher: NotificationDispatcher },
  logger: AppLogger,
): Promise<FastifyInstance | null> {
  if (cfg.server.port === undefined) return null;
  const app = await buildStatusServer({
    loop: parts.loop,
    ledger: parts.ledger,
    notifications: parts.dispatcher,
    configSummary: describeConfig(cfg),
    logLevel: cfg.logLevel === "debug" || cfg.logLevel === "trace" ? cfg.logLevel : "warn",
  });
  await app.listen({ port: cfg.server.port, host: cfg.server.host });
  logger.info({ event: "status.listening", host: cfg.server.host, port: cfg.server.port }, "status server listening");
  return app;
}

export async function runMover(cfg: AppConfig, logger: AppLogger): Promise<MonitorExit> {
  const ledger = new FileLedger(cfg.monitor.ledgerPath, logger.child({ component: "ledger" }));
  await ledger.load();

  const dispatcher = new NotificationDispatcher({
    webhook: cfg.notification.webhook,
    username: cfg.notification.username,
    gates: {
      copy: cfg.notification.notifyOnCopy,
      delete: cfg.notification.notifyOnDelete,
      error: cfg.notification.notifyOnError,
      waiting: cfg.notification.notifyOnWaiting,
    },
    retry: retryPolicyFrom(cfg.notification.maxAttempts),
    timeoutSec: cfg.notification.timeoutSec,
    maxQueue: cfg.notification.maxQueue,
    logger: logger.child({ component: "notify" }),
  });

  const client = new AlistClient({
    url: cfg.alist.url,
    token: cfg.alist.token,
    username: cfg.alist.username,
    password: cfg.alist.password,
    timeoutSec: cfg.alist.timeoutSec,
    logger: logger.child({ component: "alist" }),
  });

  const checkIntervalMs = cfg.monitor.checkIntervalSec * 1000;
  const detector = new CompletenessDetector(
    completenessPolicy({
      requiredSamples: cfg.monitor.stableSamples,
      minSpacingMs: minSpacingForInterval(checkIntervalMs),
    }),
  );

  const transfer = new TransferEngine(
    { client, notifier: dispatcher, logger: logger.child({ component: "transfer" }) },
    {
      destPath: cfg.monitor.destPath,
      deleteSource: cfg.monitor.deleteSource,
      copyRetry: retryPolicyFrom(cfg.monitor.copyMaxAttempts),
      verifyAttempts: cfg.monitor.verifyAttempts,
      verifyIntervalMs: cfg.monitor.verifyIntervalSec * 1000,
    },
  );

  const loop = new MonitorLoop(
    { client, detector, transfer, ledger, notifier: dispatcher, logger: logger.child({ component: "monitor" }) },
    {
      sourcePath: cfg.monitor.sourcePath,
      checkIntervalMs,
      identityIncludesMtime: cfg.monitor.identityIncludesMtime,
      runOnce: cfg.monitor.runOnce,
      configSummary: describeConfig(cfg),
    },
  );

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ event: "process.signal", signal }, "shutdown signal received");
    loop.stop();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  let server: FastifyInstance | null = null;
  try {
    server = await startStatusServer(cfg, { loop, ledger, dispatcher }, logger);
    return await loop.start();
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    const drained = await dispatcher.flush(NOTIFY_FLUSH_TIMEOUT_MS);
    if (!drained) {
      logger.warn({ event: "notify.flush.timeout", ...dispatcher.stats() }, "pending notifications dropped at shutdown");
    }
    dispatcher.close();
    if (server) await server.close();
  }
}

async function main(): Promise<void> {
  let cfg: AppConfig;
  try {
    cfg = await loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      // eslint-disable-next-line no-console
      console.error(`[alist-mover] invalid config: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const logger = createLogger(cfg.logLevel);
  try {
    const exit = await runMover(cfg, logger);
    logger.info({ event: "process.exit", reason: exit.reason, ...exit.counters }, "alist-mover exited");
  } catch (err) {
    const event = err instanceof StartupError ? "process.startup_failed" : "process.fatal";
    logger.fatal({ event, err: toErrorMessage(err) }, "alist-mover stopped on error");
    process.exitCode = 1;
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
