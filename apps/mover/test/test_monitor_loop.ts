import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";

import { MonitorState, NotificationKind, TransferOutcome, type RemoteEntryV1 } from "@alist-mover/shared";

import { AuthenticationError, RemoteOperationError, StartupError, TransientNetworkError } from "../src/errors.js";
import { createSilentLogger } from "../src/logger.js";
import { CompletenessDetector, completenessPolicy, minSpacingForInterval } from "../src/monitor/completeness.js";
import { FileLedger, computeIdentity } from "../src/monitor/ledger.js";
import { MonitorLoop, type MonitorLoopOptions } from "../src/monitor/loop.js";
import { TransferEngine, type TransferResult } from "../src/monitor/transfer.js";
import { retryPolicyFrom } from "../src/retry.js";
import { FakeRemote, RecordingNotifier } from "./fake_remote.js";

const INTERVAL_MS = 60_000;

type Harness = {
  remote: FakeRemote;
  notifier: RecordingNotifier;
  ledger: FileLedger;
  detector: CompletenessDetector;
  loop: MonitorLoop;
  clock: { now: number };
};

type HarnessOptions = {
  deleteSource?: boolean;
  remote?: FakeRemote;
  loop?: Partial<MonitorLoopOptions>;
  wrapTransfer?: (engine: TransferEngine, loop: () => MonitorLoop) => { transfer(e: RemoteEntryV1): Promise<TransferResult> };
};

async function harness(ledgerFile: string, opts: HarnessOptions = {}): Promise<Harness> {
  const remote = opts.remote ?? new FakeRemote();
  remote.mkdir("/downloads");
  remote.mkdir("/archive");
  const notifier = new RecordingNotifier();
  const logger = createSilentLogger();
  const ledger = new FileLedger(ledgerFile);
  await ledger.load();
  const detector = new CompletenessDetector(
    completenessPolicy({ requiredSamples: 2, minSpacingMs: minSpacingForInterval(INTERVAL_MS) }),
  );
  const engine = new TransferEngine(
    { client: remote, notifier, logger },
    {
      destPath: "/archive",
      deleteSource: opts.deleteSource ?? true,
      copyRetry: retryPolicyFrom(2, { baseDelayMs: 1, jitterMs: 0 }),
      verifyAttempts: 2,
      verifyIntervalMs: 1,
      wait: async () => undefined,
    },
  );
  const clock = { now: 1_700_000_000_000 };
  let loopRef: MonitorLoop | null = null;
  const getLoop = (): MonitorLoop => {
    if (!loopRef) throw new Error("loop not built");
    return loopRef;
  };
  const loop = new MonitorLoop(
    {
      client: remote,
      detector,
      transfer: opts.wrapTransfer ? opts.wrapTransfer(engine, getLoop) : engine,
      ledger,
      notifier,
      logger,
    },
    {
      sourcePath: "/downloads",
      checkIntervalMs: INTERVAL_MS,
      identityIncludesMtime: false,
      configSummary: { source_path: "/downloads", dest_path: "/archive", check_interval_sec: 60 },
      now: () => clock.now,
      ...opts.loop,
    },
  );
  loopRef = loop;
  return { remote, notifier, ledger, detector, loop, clock };
}

function identity(entryPath: string, size: number): string {
  return computeIdentity({ path: entryPath, size, modified_at: "2024-01-01T00:00:00.000Z" });
}

async function testStableGrowingVanished(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "scenario.jsonl"));
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.put("/downloads/b.mp4", 500);
  h.remote.put("/downloads/c.mkv", 10);

  const first = await h.loop.runCycle();
  assert.equal(first.listed, 3);
  assert.equal(first.growing, 3);
  assert.equal(first.stable, 0);
  assert.equal(h.remote.count("copy"), 0);
  assert.deepEqual(h.notifier.kinds(), []);

  h.clock.now += INTERVAL_MS;
  h.remote.put("/downloads/b.mp4", 900);
  h.remote.remove("/downloads/c.mkv");
  const second = await h.loop.runCycle();
  assert.equal(second.listed, 2);
  assert.equal(second.stable, 1);
  assert.equal(second.growing, 1);
  assert.equal(second.vanished, 1);
  assert.equal(second.transferred, 1);
  assert.equal(second.failed, 0);

  assert.equal(h.remote.sizeOf("/archive/a.mp4"), 1000);
  assert.equal(h.remote.sizeOf("/downloads/a.mp4"), undefined);
  assert.equal(h.remote.sizeOf("/archive/b.mp4"), undefined);
  assert.equal(h.ledger.has(identity("/downloads/a.mp4", 1000)), true);
  assert.equal(h.ledger.has(identity("/downloads/b.mp4", 900)), false);
  assert.deepEqual(h.notifier.kinds(), [
    NotificationKind.Waiting,
    NotificationKind.Copy,
    NotificationKind.Delete,
    NotificationKind.Success,
  ]);
  assert.equal(h.notifier.events[0].path, "/downloads/b.mp4");

  const status = h.loop.status();
  assert.deepEqual(status.counters, { cycles: 2, copied: 1, deleted: 1, errored: 0 });
  assert.deepEqual(status.tracked_paths, ["/downloads/b.mp4"]);
  assert.deepEqual(status.processed_paths, ["a.mp4"]);
}

async function testIdempotentAcrossRestart(dir: string): Promise<void> {
  const ledgerFile = path.join(dir, "restart.jsonl");
  const remote = new FakeRemote();
  remote.put("/downloads/a.mp4", 1000);

  const before = await harness(ledgerFile, { deleteSource: false, remote });
  await before.loop.runCycle();
  before.clock.now += INTERVAL_MS;
  await before.loop.runCycle();
  before.clock.now += INTERVAL_MS;
  const third = await before.loop.runCycle();
  assert.equal(remote.count("copy"), 1);
  assert.equal(third.skipped, 1);
  assert.equal(third.transferred, 0);

  const after = await harness(ledgerFile, { deleteSource: false, remote });
  for (let i = 0; i < 3; i += 1) {
    const report = await after.loop.runCycle();
    assert.equal(report.skipped, 1);
    after.clock.now += INTERVAL_MS;
  }
  assert.equal(remote.count("copy"), 1);
  assert.deepEqual(after.notifier.kinds(), []);
  assert.deepEqual(after.ledger.stats(), {
    total_lines: 1,
    success: 1,
    failed: 0,
    torn_lines: 0,
    duplicate_success: 0,
    superseded_failed: 0,
  });
}

async function testIntegrityMismatchNotRecorded(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "mismatch.jsonl"));
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.copiedSize = (size) => size + 1;

  await h.loop.runCycle();
  h.clock.now += INTERVAL_MS;
  const report = await h.loop.runCycle();
  assert.equal(report.failed, 1);
  assert.equal(report.transferred, 0);
  assert.equal(h.ledger.has(identity("/downloads/a.mp4", 1000)), false);
  assert.equal(h.ledger.stats().failed, 1);
  assert.equal(h.ledger.list(1)[0].detail?.reason_code, "integrity_mismatch");
  assert.equal(h.remote.count("delete"), 0);
  assert.deepEqual(h.loop.status().counters, { cycles: 2, copied: 0, deleted: 0, errored: 1 });
  // history is dropped so the next cycle starts over
  assert.deepEqual(h.detector.trackedPaths(), []);

  h.clock.now += INTERVAL_MS;
  const retry = await h.loop.runCycle();
  assert.equal(retry.growing, 1);
  assert.equal(retry.stable, 0);
}

async function testStuckFailureKeepsLedgerBounded(dir: string): Promise<void> {
  const ledgerFile = path.join(dir, "stuck.jsonl");
  const h = await harness(ledgerFile);
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.copyFailures = Array.from(
    { length: 12 },
    () => new RemoteOperationError("/api/fs/copy", 200, 403, "permission denied"),
  );

  for (let i = 0; i < 12; i += 1) {
    await h.loop.runCycle();
    h.clock.now += INTERVAL_MS;
  }
  assert.equal(h.remote.count("copy"), 11);
  assert.equal(h.loop.status().counters.errored, 11);
  assert.equal((await readFile(ledgerFile, "utf8")).split("\n").filter(Boolean).length, 1);
  assert.equal(h.ledger.stats().failed, 1);
  assert.equal(h.ledger.list(100).length, 1);
  assert.equal(h.remote.sizeOf("/downloads/a.mp4"), 1000);
}

async function testDestinationHoldsSameSizeFile(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "dest-present.jsonl"));
  h.remote.put("/downloads/clip.mp4", 1000);
  h.remote.put("/archive/clip.mp4", 1000);

  await h.loop.runCycle();
  h.clock.now += INTERVAL_MS;
  h.remote.copyFailures = [new RemoteOperationError("/api/fs/copy", 200, 500, "storage offline")];
  const failed = await h.loop.runCycle();
  assert.equal(failed.failed, 1);
  assert.equal(h.remote.count("copy"), 1);
  assert.equal(h.remote.count("delete"), 0);
  assert.equal(h.remote.sizeOf("/downloads/clip.mp4"), 1000);

  h.clock.now += INTERVAL_MS;
  const moved = await h.loop.runCycle();
  assert.equal(moved.transferred, 1);
  assert.equal(h.remote.count("copy"), 2);
  assert.equal(h.remote.sizeOf("/downloads/clip.mp4"), undefined);
  assert.equal(h.remote.sizeOf("/archive/clip.mp4"), 1000);
}

async function testDeleteFailureStillRecordsSuccess(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "delete.jsonl"));
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.deleteFailures = [new Error("remove refused")];

  await h.loop.runCycle();
  h.clock.now += INTERVAL_MS;
  const report = await h.loop.runCycle();
  assert.equal(report.transferred, 1);

  const record = h.ledger.get(identity("/downloads/a.mp4", 1000));
  assert.equal(record?.outcome, TransferOutcome.Success);
  assert.equal(record?.detail?.dest_path, "/archive/a.mp4");
  assert.equal(record?.detail?.delete_failed, "remove refused");
  assert.deepEqual(h.loop.status().counters, { cycles: 2, copied: 1, deleted: 0, errored: 0 });
}

async function testKeepSourceNeverDeletes(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "keep.jsonl"), { deleteSource: false });
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.put("/downloads/b.mp4", 2000);

  for (let i = 0; i < 3; i += 1) {
    await h.loop.runCycle();
    h.clock.now += INTERVAL_MS;
  }
  assert.equal(h.remote.count("copy"), 2);
  assert.equal(h.remote.count("delete"), 0);
  assert.equal(h.remote.sizeOf("/downloads/a.mp4"), 1000);
}

async function testListFailureSkipsOnlyThatCycle(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "list.jsonl"));
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.listFailures = [new TransientNetworkError("alist_request_status:/api/fs/list:502", { status: 502 })];

  const failed = await h.loop.runCycle();
  assert.equal(failed.list_error, "alist_request_status:/api/fs/list:502");
  assert.equal(failed.listed, 0);
  assert.deepEqual(h.notifier.kinds(), [NotificationKind.Error]);
  assert.equal(h.notifier.events[0].detail.reason_code, "list_failed");

  h.clock.now += INTERVAL_MS;
  const next = await h.loop.runCycle();
  assert.equal(next.list_error, undefined);
  assert.equal(next.listed, 1);
}

async function testStopBetweenEntries(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "stop.jsonl"), {
    wrapTransfer: (engine, loop) => ({
      transfer: async (entry) => {
        loop().stop();
        return engine.transfer(entry);
      },
    }),
  });
  h.remote.put("/downloads/a.mp4", 1000);
  h.remote.put("/downloads/b.mp4", 2000);

  await h.loop.runCycle();
  h.clock.now += INTERVAL_MS;
  const report = await h.loop.runCycle();
  assert.equal(report.stable, 2);
  assert.equal(report.transferred, 1);
  assert.equal(h.loop.stopRequested, true);
  // the in-flight entry finished; the next one was left for later
  assert.equal(h.remote.sizeOf("/archive/a.mp4"), 1000);
  assert.equal(h.remote.sizeOf("/archive/b.mp4"), undefined);
}

async function testConcurrentCycleRejected(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "concurrent.jsonl"));
  const first = h.loop.runCycle();
  await assert.rejects(() => h.loop.runCycle(), /monitor_cycle_in_flight/);
  await first;
}

async function testStartRunsUntilCancelled(dir: string): Promise<void> {
  let sleeps = 0;
  let loopRef: MonitorLoop | null = null;
  let clockRef: { now: number } | null = null;
  const h = await harness(path.join(dir, "start.jsonl"), {
    loop: {
      wait: async (ms) => {
        sleeps += 1;
        if (clockRef) clockRef.now += ms;
        if (sleeps >= 2) {
          loopRef?.stop();
          return false;
        }
        return true;
      },
    },
  });
  loopRef = h.loop;
  clockRef = h.clock;
  h.remote.put("/downloads/a.mp4", 1000);

  assert.equal(h.loop.state, MonitorState.Idle);
  const exit = await h.loop.start();
  assert.equal(exit.reason, "cancelled");
  assert.deepEqual(exit.counters, { cycles: 2, copied: 1, deleted: 1, errored: 0 });
  assert.equal(h.loop.state, MonitorState.Stopped);

  const kinds = h.notifier.kinds();
  assert.equal(kinds[0], NotificationKind.Startup);
  assert.equal(kinds[kinds.length - 1], NotificationKind.Stopped);
  assert.deepEqual(h.notifier.events[0].detail, {
    source_path: "/downloads",
    dest_path: "/archive",
    check_interval_sec: 60,
  });
  assert.deepEqual(h.notifier.events[kinds.length - 1].detail, {
    copied: 1,
    deleted: 1,
    errored: 0,
    cycles: 2,
    processed: ["a.mp4"],
  });

  await assert.rejects(() => h.loop.start(), /monitor_already_started:stopped/);
}

async function testRunOnceMovesStableFile(dir: string): Promise<void> {
  const waits: number[] = [];
  let clockRef: { now: number } | null = null;
  const h = await harness(path.join(dir, "once.jsonl"), {
    loop: {
      runOnce: true,
      wait: async (ms) => {
        waits.push(ms);
        if (clockRef) clockRef.now += ms;
        return true;
      },
    },
  });
  clockRef = h.clock;
  h.remote.put("/downloads/a.mp4", 1000);

  const exit = await h.loop.start();
  assert.equal(exit.reason, "run_once");
  // one sleep between the two samples of the stability window, none after
  assert.deepEqual(waits, [INTERVAL_MS]);
  assert.deepEqual(exit.counters, { cycles: 2, copied: 1, deleted: 1, errored: 0 });
  assert.equal(h.remote.sizeOf("/archive/a.mp4"), 1000);
  assert.equal(h.remote.sizeOf("/downloads/a.mp4"), undefined);
  assert.deepEqual(h.notifier.kinds(), [
    NotificationKind.Startup,
    NotificationKind.Copy,
    NotificationKind.Delete,
    NotificationKind.Success,
    NotificationKind.Stopped,
  ]);
}

async function testRunOnceLeavesGrowingFile(dir: string): Promise<void> {
  let clockRef: { now: number } | null = null;
  let remoteRef: FakeRemote | null = null;
  const h = await harness(path.join(dir, "once-growing.jsonl"), {
    loop: {
      runOnce: true,
      wait: async (ms) => {
        if (clockRef) clockRef.now += ms;
        remoteRef?.put("/downloads/a.mp4", 2000);
        return true;
      },
    },
  });
  clockRef = h.clock;
  remoteRef = h.remote;
  h.remote.put("/downloads/a.mp4", 1000);

  const exit = await h.loop.start();
  assert.equal(exit.reason, "run_once");
  assert.equal(exit.counters.cycles, 2);
  assert.equal(h.remote.count("copy"), 0);
  assert.deepEqual(h.notifier.kinds(), [NotificationKind.Startup, NotificationKind.Waiting, NotificationKind.Stopped]);
}

async function testStartupFailures(dir: string): Promise<void> {
  const auth = await harness(path.join(dir, "auth.jsonl"));
  auth.remote.authFailures = [new AuthenticationError("alist_login_failed:status=200:code=400:bad password")];
  await assert.rejects(() => auth.loop.start(), StartupError);
  assert.equal(auth.loop.state, MonitorState.Stopped);
  assert.deepEqual(auth.notifier.kinds(), [NotificationKind.Error]);
  assert.equal(auth.notifier.events[0].detail.reason_code, "authentication_failed");

  const remote = new FakeRemote();
  const unreachable = await harness(path.join(dir, "unreachable.jsonl"), {
    remote,
    loop: { sourcePath: "/missing" },
  });
  await assert.rejects(() => unreachable.loop.start(), StartupError);
  assert.equal(unreachable.notifier.events[0].detail.reason_code, "source_unreachable");
}

async function testAuthFailureMidRunIsFatal(dir: string): Promise<void> {
  const h = await harness(path.join(dir, "midrun.jsonl"), { loop: { wait: async () => true } });
  h.remote.put("/downloads/a.mp4", 1000);
  // startup check and first cycle list fine, the second cycle's listing is rejected
  const originalList = h.remote.listDirectory.bind(h.remote);
  let lists = 0;
  h.remote.listDirectory = async (listDir: string) => {
    lists += 1;
    if (lists === 3) throw new AuthenticationError("alist_auth_rejected_after_login:/api/fs/list", 401);
    return originalList(listDir);
  };

  await assert.rejects(() => h.loop.start(), AuthenticationError);
  assert.equal(h.loop.state, MonitorState.Stopped);
  const kinds = h.notifier.kinds();
  assert.deepEqual(kinds.slice(-2), [NotificationKind.Error, NotificationKind.Stopped]);
  assert.equal(h.notifier.events[kinds.length - 2].detail.reason_code, "authentication_failed");
}

async function main(): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "alist-mover-loop-"));
  try {
    await testStableGrowingVanished(dir);
    await testIdempotentAcrossRestart(dir);
    await testIntegrityMismatchNotRecorded(dir);
    await testStuckFailureKeepsLedgerBounded(dir);
    await testDestinationHoldsSameSizeFile(dir);
    await testDeleteFailureStillRecordsSuccess(dir);
    await testKeepSourceNeverDeletes(dir);
    await testListFailureSkipsOnlyThatCycle(dir);
    await testStopBetweenEntries(dir);
    await testConcurrentCycleRejected(dir);
    await testStartRunsUntilCancelled(dir);
    await testRunOnceMovesStableFile(dir);
    await testRunOnceLeavesGrowingFile(dir);
    await testStartupFailures(dir);
    await testAuthFailureMidRunIsFatal(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
  // eslint-disable-next-line no-console
  console.log("test_monitor_loop: ok");
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
