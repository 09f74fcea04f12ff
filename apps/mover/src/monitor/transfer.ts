import { NotificationKind, type RemoteEntryV1 } from "@alist-mover/shared";

import { joinRemotePath, splitRemotePath } from "../alist/paths.js";
import type { RemoteDirectoryClient } from "../alist/types.js";
import {
  AuthenticationError,
  IntegrityMismatchError,
  isTransientError,
  sanitizeErrorText,
  toErrorMessage,
} from "../errors.js";
import { sleep } from "../http.js";
import type { AppLogger } from "../logger.js";
import { createNotification, type Notifier } from "../notify/events.js";
import { withRetry, type RetryPolicy } from "../retry.js";

export const TransferFailureReason = {
  IntegrityMismatch: "integrity_mismatch",
  CopyFailed: "copy_failed",
  CopyNotVisible: "copy_not_visible",
} as const;

export type TransferFailureReason = (typeof TransferFailureReason)[keyof typeof TransferFailureReason];

export type TransferResult =
  | {
      ok: true;
      newPath: string;
      alreadyPresent: boolean;
      deleted: boolean;
      deleteError?: string;
    }
  | {
      ok: false;
      reason: TransferFailureReason;
      message: string;
    };

export type TransferOptions = {
  destPath: string;
  deleteSource: boolean;
  copyRetry: RetryPolicy;
  verifyAttempts: number;
  verifyIntervalMs: number;
  deleteVerifyAttempts?: number;
  wait?: (ms: number) => Promise<unknown>;
};

export type TransferDeps = {
  client: RemoteDirectoryClient;
  notifier: Notifier;
  logger: AppLogger;
};

const DEFAULT_DELETE_VERIFY_ATTEMPTS = 3;

class CopyNotVisibleError extends Error {
  constructor(destPath: string) {
    super(`copy_not_visible:${destPath}`);
    this.name = "CopyNotVisibleError";
  }
}

/**
 * Copy, verify, then optionally delete one stable entry. Authentication
 * failures propagate; every other failure becomes a `{ ok: false }` result.
 */
export class TransferEngine {
  private readonly wait: (ms: number) => Promise<unknown>;

  constructor(
    private readonly deps: TransferDeps,
    private readonly opts: TransferOptions,
  ) {
    this.wait = opts.wait ?? ((ms: number) => sleep(ms));
  }

  private async findAtDestination(name: string): Promise<RemoteEntryV1 | undefined> {
    const listing = await this.deps.client.listDirectory(this.opts.destPath);
    return listing.find((item) => !item.is_directory && item.name === name);
  }

  private async copyWithRetry(entry: RemoteEntryV1, destFile: string): Promise<void> {
    await withRetry(
      this.opts.copyRetry,
      {
        shouldRetry: isTransientError,
        retryAfterMs: (err) => {
          if (!err || typeof err !== "object" || !("retryAfterSec" in err)) return undefined;
          return typeof err.retryAfterSec === "number" ? err.retryAfterSec * 1000 : undefined;
        },
        onRetry: ({ attempt, waitMs, err }) => {
          this.deps.logger.warn(
            { event: "transfer.copy.retry", path: entry.path, attempt, wait_ms: waitMs, err: toErrorMessage(err) },
            "copy failed transiently; retrying",
          );
        },
        wait: this.wait,
      },
      () => this.deps.client.copyEntry(entry.path, destFile),
    );
  }

  /** Polls the destination until the copy shows up with the expected size. */
  private async verifyCopy(entry: RemoteEntryV1, destFile: string): Promise<void> {
    let lastSeenSize: number | undefined;
    for (let attempt = 0; attempt < this.opts.verifyAttempts; attempt += 1) {
      await this.wait(this.opts.verifyIntervalMs);
      let found: RemoteEntryV1 | undefined;
      try {
        found = await this.findAtDestination(entry.name);
      } catch (err) {
        if (err instanceof AuthenticationError) throw err;
        this.deps.logger.warn(
          { event: "transfer.verify.list_failed", path: destFile, attempt: attempt + 1, err: toErrorMessage(err) },
          "destination listing failed during verification",
        );
        continue;
      }
      if (!found) continue;
      if (found.size === entry.size) return;
      if (found.size > entry.size) throw new IntegrityMismatchError(destFile, entry.size, found.size);
      lastSeenSize = found.size;
    }
    if (lastSeenSize !== undefined) throw new IntegrityMismatchError(destFile, entry.size, lastSeenSize);
    throw new CopyNotVisibleError(destFile);
  }

  private async deleteSource(entry: RemoteEntryV1): Promise<string | undefined> {
    try {
      await withRetry(
        this.opts.copyRetry,
        { shouldRetry: isTransientError, wait: this.wait },
        () => this.deps.client.deleteEntry(entry.path),
      );
    } catch (err) {
      return sanitizeErrorText(toErrorMessage(err));
    }

    const attempts = this.opts.deleteVerifyAttempts ?? DEFAULT_DELETE_VERIFY_ATTEMPTS;
    const { dir } = splitRemotePath(entry.path);
    for (let attempt = 0; attempt < attempts; attempt += 1) {
      try {
        const listing = await this.deps.client.listDirectory(dir);
        if (!listing.some((item) => item.path === entry.path)) return undefined;
      } catch (err) {
        this.deps.logger.warn(
          { event: "transfer.delete.verify_failed", path: entry.path, err: toErrorMessage(err) },
          "source listing failed while confirming delete",
        );
      }
      if (attempt < attempts - 1) await this.wait(this.opts.verifyIntervalMs);
    }
    return "source_still_present_after_delete";
  }

  async transfer(entry: RemoteEntryV1): Promise<TransferResult> {
    const destFile = joinRemotePath(this.opts.destPath, entry.name);
    const sourceDir = splitRemotePath(entry.path).dir;
    const { logger, notifier } = this.deps;

    let alreadyPresent = false;
    try {
      const existing = await this.findAtDestination(entry.name);
      alreadyPresent = existing?.size === entry.size;
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      logger.warn(
        { event: "transfer.precheck.failed", path: entry.path, err: toErrorMessage(err) },
        "could not inspect destination before copy",
      );
    }

    notifier.send(
      createNotification(NotificationKind.Copy, {
        path: entry.path,
        size: entry.size,
        detail: { from: sourceDir, to: this.opts.destPath, already_present: alreadyPresent },
      }),
    );
    logger.info(
      { event: "transfer.copy.start", path: entry.path, dest: destFile, size: entry.size, already_present: alreadyPresent },
      "copying file",
    );

    // A same-size file at the destination may be a different file, so the
    // copy is always issued; the source is only deleted after our own copy.
    try {
      await this.copyWithRetry(entry, destFile);
      await this.verifyCopy(entry, destFile);
    } catch (err) {
      if (err instanceof AuthenticationError) throw err;
      const reason =
        err instanceof IntegrityMismatchError
          ? TransferFailureReason.IntegrityMismatch
          : err instanceof CopyNotVisibleError
            ? TransferFailureReason.CopyNotVisible
            : TransferFailureReason.CopyFailed;
      const message = sanitizeErrorText(toErrorMessage(err));
      logger.error({ event: "transfer.failed", path: entry.path, reason_code: reason, err: message }, "transfer failed");
      notifier.send(
        createNotification(NotificationKind.Error, {
          path: entry.path,
          size: entry.size,
          detail: { message: `Transfer failed: ${message}`, reason_code: reason },
        }),
      );
      return { ok: false, reason, message };
    }

    let deleted = false;
    let deleteError: string | undefined;
    if (this.opts.deleteSource) {
      notifier.send(createNotification(NotificationKind.Delete, { path: entry.path, size: entry.size }));
      deleteError = await this.deleteSource(entry);
      deleted = deleteError === undefined;
      if (deleteError) {
        logger.warn(
          { event: "transfer.delete.failed", path: entry.path, err: deleteError },
          "copy succeeded but source delete failed",
        );
        notifier.send(
          createNotification(NotificationKind.Warning, {
            path: entry.path,
            size: entry.size,
            detail: { message: `Copied but could not delete source: ${deleteError}` },
          }),
        );
      }
    }

    logger.info(
      { event: "transfer.success", path: entry.path, dest: destFile, deleted, delete_error: deleteError },
      "file moved",
    );
    notifier.send(
      createNotification(NotificationKind.Success, {
        path: entry.path,
        size: entry.size,
        detail: { dest_path: destFile, deleted, ...(deleteError ? { delete_failed: deleteError } : {}) },
      }),
    );
    return { ok: true, newPath: destFile, alreadyPresent, deleted, deleteError };
  }
}
