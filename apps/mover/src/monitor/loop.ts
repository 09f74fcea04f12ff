import {
  EntryState,
  MonitorState,
  NotificationKind,
  TransferOutcome,
  newCycleId,
  type CycleReportV1,
  type MonitorCountersV1,
  type MonitorStatusV1,
  type RemoteEntryV1,
} from "@alist-mover/shared";

import type { RemoteDirectoryClient } from "../alist/types.js";
import { AuthenticationError, StartupError, sanitizeErrorText, toErrorMessage } from "../errors.js";
import { sleep } from "../http.js";
import type { AppLogger } from "../logger.js";
import { createNotification, type Notifier } from "../notify/events.js";
import type { CompletenessDetector } from "./completeness.js";
import { computeIdentity, type ProcessedFileLedger } from "./ledger.js";
import { TransferFailureReason, type TransferResult } from "./transfer.js";

export type MonitorLoopOptions = {
  sourcePath: string;
  checkIntervalMs: number;
  identityIncludesMtime: boolean;
  /** Run just enough cycles to fill one stability window, then stop. */
  runOnce?: boolean;
  /** Active configuration, without secrets, for the startup event. */
  configSummary: Record<string, unknown>;
  now?: () => number;
  wait?: (ms: number, signal: AbortSignal) => Promise<boolean>;
};

export type MonitorDeps = {
  client: RemoteDirectoryClient;
  detector: CompletenessDetector;
  transfer: { transfer(entry: RemoteEntryV1): Promise<TransferResult> };
  ledger: ProcessedFileLedger;
  notifier: Notifier;
  logger: AppLogger;
};

export type MonitorExit = {
  reason: "cancelled" | "run_once";
  counters: MonitorCountersV1;
};

/**
 * Single cooperative poll loop: list, classify, transfer, record, notify,
 * sleep. Cancellation is honoured at the top of a cycle, between entries
 * and during the sleep; an in-flight transfer always runs to completion.
 */
export class MonitorLoop {
  private state_: MonitorState = MonitorState.Idle;
  private readonly counters: MonitorCountersV1 = { cycles: 0, copied: 0, deleted: 0, errored: 0 };
  private lastCycle: CycleReportV1 | null = null;
  private readonly processed: string[] = [];
  private readonly stopper = new AbortController();
  private cycleInFlight = false;
  private readonly now: () => number;
  private readonly wait: (ms: number, signal: AbortSignal) => Promise<boolean>;

  constructor(
    private readonly deps: MonitorDeps,
    private readonly opts: MonitorLoopOptions,
  ) {
    this.now = opts.now ?? Date.now;
    this.wait = opts.wait ?? sleep;
  }

  get state(): MonitorState {
    return this.state_;
  }

  get stopRequested(): boolean {
    return this.stopper.signal.aborted;
  }

  private setState(next: MonitorState): void {
    if (this.state_ === next) return;
    this.deps.logger.debug({ event: "monitor.state", from: this.state_, to: next }, "monitor state change");
    this.state_ = next;
  }

  /** Requests cooperative cancellation; the current entry finishes first. */
  stop(): void {
    if (this.stopper.signal.aborted) return;
    this.deps.logger.info({ event: "monitor.stop.requested", state: this.state_ }, "stop requested");
    this.stopper.abort();
  }

  private notifyError(message: string, extra: { path?: string; size?: number; reason_code?: string } = {}): void {
    this.deps.notifier.send(
      createNotification(NotificationKind.Error, {
        path: extra.path,
        size: extra.size,
        detail: { message, ...(extra.reason_code ? { reason_code: extra.reason_code } : {}) },
      }),
    );
  }

  private finish(): void {
    this.setState(MonitorState.Stopped);
    this.deps.logger.info({ event: "monitor.stopped", ...this.counters }, "monitoring stopped");
    this.deps.notifier.send(
      createNotification(NotificationKind.Stopped, {
        detail: {
          copied: this.counters.copied,
          deleted: this.counters.deleted,
          errored: this.counters.errored,
          cycles: this.counters.cycles,
          processed: [...this.processed],
        },
      }),
    );
  }

  /**
   * Authenticates, checks the source is reachable, announces startup and
   * cycles until stopped. Startup failures raise `StartupError`; an
   * authentication failure mid-run is rethrown after the stop event.
   */
  async start(): Promise<MonitorExit> {
    if (this.state_ !== MonitorState.Idle) throw new Error(`monitor_already_started:${this.state_}`);
    const { client, logger, notifier } = this.deps;

    try {
      await client.authenticate();
      await client.listDirectory(this.opts.sourcePath);
    } catch (err) {
      const message = sanitizeErrorText(toErrorMessage(err));
      logger.error({ event: "monitor.startup.failed", err: message }, "startup failed");
      this.notifyError(`Startup failed: ${message}`, {
        reason_code: err instanceof AuthenticationError ? "authentication_failed" : "source_unreachable",
      });
      this.setState(MonitorState.Stopped);
      throw new StartupError(`startup_failed:${message}`, err);
    }

    logger.info({ event: "monitor.started", ...this.opts.configSummary }, "monitoring started");
    notifier.send(createNotification(NotificationKind.Startup, { detail: { ...this.opts.configSummary } }));

    const cycleBudget = this.opts.runOnce ? this.deps.detector.requiredSamples : Number.POSITIVE_INFINITY;
    let cyclesRun = 0;
    try {
      while (!this.stopper.signal.aborted) {
        await this.runCycle();
        cyclesRun += 1;
        if (cyclesRun >= cycleBudget || this.stopper.signal.aborted) break;
        this.setState(MonitorState.Sleeping);
        const slept = await this.wait(this.opts.checkIntervalMs, this.stopper.signal);
        if (!slept) break;
      }
    } catch (err) {
      const message = sanitizeErrorText(toErrorMessage(err));
      logger.error({ event: "monitor.fatal", err: message }, "monitor stopped on fatal error");
      this.notifyError(`Monitoring halted: ${message}`, {
        reason_code: err instanceof AuthenticationError ? "authentication_failed" : "fatal",
      });
      this.finish();
      throw err;
    }

    this.finish();
    return {
      reason: this.opts.runOnce && !this.stopper.signal.aborted ? "run_once" : "cancelled",
      counters: { ...this.counters },
    };
  }

  async runCycle(): Promise<CycleReportV1> {
    if (this.cycleInFlight) throw new Error("monitor_cycle_in_flight");
    this.cycleInFlight = true;
    try {
      return await this.cycle();
    } finally {
      this.cycleInFlight = false;
    }
  }

  private async cycle(): Promise<CycleReportV1> {
    const { client, detector, ledger, logger } = this.deps;
    const report: CycleReportV1 = {
      cycle_id: newCycleId(),
      started_at: new Date(this.now()).toISOString(),
      finished_at: "",
      listed: 0,
      stable: 0,
      growing: 0,
      vanished: 0,
      skipped: 0,
      transferred: 0,
      failed: 0,
    };

    this.setState(MonitorState.Listing);
    let listing: RemoteEntryV1[];
    try {
      listing = await client.listDirectory(this.opts.sourcePath);
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      const message = sanitizeErrorText(toErrorMessage(err));
      report.list_error = message;
      logger.error({ event: "monitor.list.failed", cycle_id: report.cycle_id, err: message }, "listing source failed");
      this.notifyError(`Listing ${this.opts.sourcePath} failed: ${message}`, { reason_code: "list_failed" });
      return this.closeCycle(report);
    }

    this.setState(MonitorState.Classifying);
    const files = listing.filter((entry) => !entry.is_directory);
    report.listed = files.length;

    const candidates: RemoteEntryV1[] = [];
    for (const entry of files) {
      if (ledger.has(this.identityOf(entry))) {
        report.skipped += 1;
        detector.forget(entry.path);
        continue;
      }
      candidates.push(entry);
    }

    const states = detector.observe(candidates, this.now());
    const stable: RemoteEntryV1[] = [];
    for (const entry of candidates) {
      const state = states.get(entry.path);
      if (state === EntryState.Stable) {
        stable.push(entry);
        continue;
      }
      report.growing += 1;
      if (detector.sizeChanged(entry.path)) {
        logger.info({ event: "monitor.entry.growing", path: entry.path, size: entry.size }, "file still downloading");
        this.deps.notifier.send(
          createNotification(NotificationKind.Waiting, { path: entry.path, size: entry.size }),
        );
      }
    }
    for (const [entryPath, state] of states) {
      if (state !== EntryState.Vanished) continue;
      report.vanished += 1;
      logger.info({ event: "monitor.entry.vanished", path: entryPath }, "tracked file disappeared; history dropped");
    }
    report.stable = stable.length;

    for (const entry of stable) {
      if (this.stopper.signal.aborted) break;
      await this.handleStable(entry, report);
    }

    return this.closeCycle(report);
  }

  private identityOf(entry: RemoteEntryV1): string {
    return computeIdentity(entry, { includeMtime: this.opts.identityIncludesMtime });
  }

  private async handleStable(entry: RemoteEntryV1, report: CycleReportV1): Promise<void> {
    const { detector, ledger, logger } = this.deps;
    const identity = this.identityOf(entry);
    if (ledger.has(identity)) {
      report.skipped += 1;
      detector.forget(entry.path);
      return;
    }

    this.setState(MonitorState.Transferring);
    let result: TransferResult;
    try {
      result = await this.deps.transfer.transfer(entry);
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      const message = sanitizeErrorText(toErrorMessage(err));
      logger.error({ event: "monitor.transfer.crashed", path: entry.path, err: message }, "transfer threw");
      this.notifyError(`Transfer failed: ${message}`, { path: entry.path, size: entry.size });
      result = { ok: false, reason: TransferFailureReason.CopyFailed, message };
    }

    this.setState(MonitorState.Recording);
    const transferredAt = new Date(this.now()).toISOString();
    try {
      if (result.ok) {
        await ledger.record({
          identity,
          path: entry.path,
          size: entry.size,
          outcome: TransferOutcome.Success,
          transferred_at: transferredAt,
          detail: {
            dest_path: result.newPath,
            ...(result.deleteError ? { delete_failed: result.deleteError } : {}),
          },
        });
      } else {
        await ledger.record({
          identity,
          path: entry.path,
          size: entry.size,
          outcome: TransferOutcome.Failed,
          transferred_at: transferredAt,
          detail: { reason_code: result.reason, message: result.message },
        });
      }
    } catch (err) {
      const message = sanitizeErrorText(toErrorMessage(err));
      logger.error({ event: "monitor.ledger.write_failed", path: entry.path, err: message }, "ledger write failed");
      this.notifyError(`Ledger write failed: ${message}`, { path: entry.path, reason_code: "ledger_write_failed" });
    }

    if (result.ok) {
      report.transferred += 1;
      this.counters.copied += 1;
      if (result.deleted) this.counters.deleted += 1;
      this.processed.push(entry.name);
      detector.forget(entry.path);
      return;
    }

    report.failed += 1;
    this.counters.errored += 1;
    if (result.reason === TransferFailureReason.IntegrityMismatch) {
      detector.forget(entry.path);
    }
  }

  private closeCycle(report: CycleReportV1): CycleReportV1 {
    report.finished_at = new Date(this.now()).toISOString();
    this.counters.cycles += 1;
    this.lastCycle = report;
    this.deps.logger.info({ event: "monitor.cycle.done", ...report }, "cycle finished");
    return report;
  }

  status(): MonitorStatusV1 {
    return {
      state: this.state_,
      counters: { ...this.counters },
      last_cycle: this.lastCycle,
      tracked_paths: this.deps.detector.trackedPaths(),
      processed_paths: [...this.processed],
    };
  }
}
