import { createHash, randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import {
  TransferOutcome,
  type LedgerRecordV1,
  type LedgerStatsV1,
  type RemoteEntryV1,
} from "@alist-mover/shared";

import { isObject } from "../http.js";
import type { AppLogger } from "../logger.js";

export interface ProcessedFileLedger {
  has(identity: string): boolean;
  record(record: LedgerRecordV1): Promise<boolean>;
}

/**
 * Identity is derived from listing attributes only, so the same remote
 * listing yields the same identity after a restart.
 */
export function computeIdentity(
  entry: Pick<RemoteEntryV1, "path" | "size" | "modified_at">,
  opts: { includeMtime?: boolean } = {},
): string {
  const parts = [entry.path, String(entry.size)];
  if (opts.includeMtime) parts.push(entry.modified_at);
  const digest = createHash("sha256").update(parts.join("|"), "utf8").digest("hex");
  return `entry:${digest}`;
}

function readRecord(value: unknown): LedgerRecordV1 | null {
  if (!isObject(value)) return null;
  const { identity, path: entryPath, size, outcome, transferred_at, detail } = value;
  if (typeof identity !== "string" || !identity) return null;
  if (typeof entryPath !== "string" || typeof size !== "number") return null;
  if (outcome !== TransferOutcome.Success && outcome !== TransferOutcome.Failed) return null;
  if (typeof transferred_at !== "string") return null;
  const record: LedgerRecordV1 = { identity, path: entryPath, size, outcome, transferred_at };
  if (isObject(detail)) {
    record.detail = {};
    for (const key of ["dest_path", "delete_failed", "reason_code", "message"] as const) {
      const v = detail[key];
      if (typeof v === "string") record.detail[key] = v;
    }
  }
  return record;
}

function serialize(record: LedgerRecordV1): string {
  return `${JSON.stringify(record)}\n`;
}

async function fsyncPath(filePath: string): Promise<void> {
  const fd = await fs.open(filePath, "r");
  try {
    await fd.sync();
  } finally {
    await fd.close();
  }
}

function emptyStats(): LedgerStatsV1 {
  return { total_lines: 0, success: 0, failed: 0, torn_lines: 0, duplicate_success: 0, superseded_failed: 0 };
}

function failureKey(record: LedgerRecordV1): string {
  return `${record.identity}|${record.detail?.reason_code ?? ""}`;
}

export type LedgerLoadOptions = {
  /** Rewrite the file when it holds torn, duplicate or superseded lines. Defaults to true. */
  compact?: boolean;
};

/**
 * Append-only JSON Lines ledger with an in-memory index rebuilt by `load`.
 * Only the first failure per identity and reason is kept, so an entry that
 * keeps failing adds one line, not one per cycle.
 */
export class FileLedger implements ProcessedFileLedger {
  private readonly records: LedgerRecordV1[] = [];
  private readonly successes = new Map<string, LedgerRecordV1>();
  private readonly failures = new Set<string>();
  private stats_: LedgerStatsV1 = emptyStats();
  private loaded = false;
  private fileExists = false;

  constructor(
    readonly filePath: string,
    private readonly logger?: AppLogger,
    private readonly syncPath: (target: string) => Promise<void> = fsyncPath,
  ) {}

  async load(opts: LedgerLoadOptions = {}): Promise<LedgerStatsV1> {
    let raw = "";
    this.fileExists = false;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
      this.fileExists = true;
    } catch (err) {
      const code = isObject(err) ? err.code : undefined;
      if (code !== "ENOENT") throw err;
    }

    this.records.length = 0;
    this.successes.clear();
    this.failures.clear();
    const stats = emptyStats();

    const parsed: LedgerRecordV1[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) continue;
      stats.total_lines += 1;
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch {
        value = null;
      }
      const record = readRecord(value);
      if (!record) {
        stats.torn_lines += 1;
        continue;
      }
      parsed.push(record);
    }

    const succeeded = new Set(
      parsed.filter((r) => r.outcome === TransferOutcome.Success).map((r) => r.identity),
    );
    for (const record of parsed) {
      if (record.outcome === TransferOutcome.Success) {
        if (this.successes.has(record.identity)) {
          stats.duplicate_success += 1;
          continue;
        }
        this.successes.set(record.identity, record);
        stats.success += 1;
      } else {
        const key = failureKey(record);
        if (succeeded.has(record.identity) || this.failures.has(key)) {
          stats.superseded_failed += 1;
          continue;
        }
        this.failures.add(key);
        stats.failed += 1;
      }
      this.records.push(record);
    }

    const unterminated = raw.length > 0 && !raw.endsWith("\n");
    const dirty = stats.torn_lines > 0 || stats.duplicate_success > 0 || stats.superseded_failed > 0 || unterminated;
    if (dirty && opts.compact !== false) {
      await this.compact();
      this.logger?.warn(
        {
          event: "ledger.compacted",
          torn_lines: stats.torn_lines,
          duplicate_success: stats.duplicate_success,
          superseded_failed: stats.superseded_failed,
        },
        "ledger had torn, duplicate or superseded lines; rewrote it",
      );
    }

    this.stats_ = stats;
    this.loaded = true;
    this.logger?.info(
      { event: "ledger.loaded", file: this.filePath, success: stats.success, failed: stats.failed },
      "ledger loaded",
    );
    return stats;
  }

  private async syncDirectory(): Promise<void> {
    // Windows cannot open a directory for fsync.
    if (process.platform === "win32") return;
    await this.syncPath(path.dirname(this.filePath));
  }

  private async compact(): Promise<void> {
    const tmp = `${this.filePath}.tmp-${randomUUID()}`;
    await fs.writeFile(tmp, this.records.map(serialize).join(""), "utf8");
    await this.syncPath(tmp);
    await fs.rename(tmp, this.filePath);
    await this.syncDirectory();
  }

  has(identity: string): boolean {
    return this.successes.has(identity);
  }

  get(identity: string): LedgerRecordV1 | undefined {
    return this.successes.get(identity);
  }

  /**
   * Appends and fsyncs one record. Returns false without writing for a
   * second success of an identity, a failure of an identity that already
   * succeeded, or a failure repeating an earlier identity and reason.
   */
  async record(record: LedgerRecordV1): Promise<boolean> {
    if (!this.loaded) throw new Error("ledger_not_loaded");
    if (this.successes.has(record.identity)) return false;
    if (record.outcome === TransferOutcome.Failed && this.failures.has(failureKey(record))) return false;

    const creating = !this.fileExists;
    if (creating) await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const fd = await fs.open(this.filePath, "a");
    try {
      await fd.write(serialize(record));
      await fd.sync();
    } finally {
      await fd.close();
    }
    if (creating) {
      await this.syncDirectory();
      this.fileExists = true;
    }

    this.records.push(record);
    this.stats_.total_lines += 1;
    if (record.outcome === TransferOutcome.Success) {
      this.successes.set(record.identity, record);
      this.stats_.success += 1;
    } else {
      this.failures.add(failureKey(record));
      this.stats_.failed += 1;
    }
    return true;
  }

  /** Most recent first. */
  list(limit = 100): LedgerRecordV1[] {
    if (limit <= 0) return [];
    return this.records.slice(-limit).reverse();
  }

  stats(): LedgerStatsV1 {
    return { ...this.stats_ };
  }
}
