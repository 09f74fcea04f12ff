import { NotificationKind, type NotificationEventV1 } from "@alist-mover/shared";

import { NotificationDeliveryError, isTransientError, sanitizeErrorText, toErrorMessage } from "../errors.js";
import { isSuccessStatus, isTransientStatus, requestJson, sleep } from "../http.js";
import type { AppLogger } from "../logger.js";
import { withRetry, type RetryPolicy } from "../retry.js";
import type { Notifier } from "./events.js";
import { toWebhookMessage } from "./format.js";

export type NotificationGates = {
  copy: boolean;
  delete: boolean;
  error: boolean;
  waiting: boolean;
};

export type DispatcherOptions = {
  webhook?: string;
  username: string;
  gates: NotificationGates;
  retry: RetryPolicy;
  timeoutSec: number;
  maxQueue: number;
  logger: AppLogger;
};

export type DispatcherStats = {
  queued: number;
  delivered: number;
  failed: number;
  dropped: number;
};

/**
 * Fire-and-forget webhook sender. `send` only enqueues; a single background
 * drain delivers in order with bounded retries, so a failing sink never
 * blocks the caller.
 */
export class NotificationDispatcher implements Notifier {
  private readonly queue: NotificationEventV1[] = [];
  private draining: Promise<void> | null = null;
  private readonly closer = new AbortController();
  private delivered = 0;
  private failed = 0;
  private dropped = 0;

  constructor(private readonly opts: DispatcherOptions) {}

  isEnabled(kind: NotificationEventV1["kind"]): boolean {
    switch (kind) {
      case NotificationKind.Copy:
      case NotificationKind.Success:
        return this.opts.gates.copy;
      case NotificationKind.Delete:
        return this.opts.gates.delete;
      case NotificationKind.Error:
      case NotificationKind.Warning:
        return this.opts.gates.error;
      case NotificationKind.Waiting:
        return this.opts.gates.waiting;
      case NotificationKind.Startup:
      case NotificationKind.Stopped:
        return true;
    }
  }

  send(event: NotificationEventV1): void {
    if (this.closer.signal.aborted) return;
    if (!this.isEnabled(event.kind)) return;
    this.opts.logger.debug({ event: "notify.enqueue", kind: event.kind, path: event.path }, "notification queued");
    if (!this.opts.webhook) return;

    if (this.queue.length >= this.opts.maxQueue) {
      const oldest = this.queue.shift();
      this.dropped += 1;
      this.opts.logger.warn(
        { event: "notify.queue.overflow", dropped_kind: oldest?.kind, max_queue: this.opts.maxQueue },
        "notification queue full; dropped oldest event",
      );
    }
    this.queue.push(event);
    this.kick();
  }

  private kick(): void {
    if (this.draining || this.closer.signal.aborted) return;
    this.draining = this.drain()
      .catch((err) => {
        this.opts.logger.error({ event: "notify.drain.crashed", err: toErrorMessage(err) }, "notification drain crashed");
      })
      .finally(() => {
        this.draining = null;
        if (this.queue.length > 0) this.kick();
      });
  }

  private async drain(): Promise<void> {
    while (this.queue.length > 0 && !this.closer.signal.aborted) {
      const event = this.queue.shift();
      if (!event) break;
      try {
        await this.deliver(event);
        this.delivered += 1;
      } catch (err) {
        if (this.closer.signal.aborted) {
          this.dropped += 1;
          this.opts.logger.debug(
            { event: "notify.delivery.abandoned", kind: event.kind, event_id: event.event_id },
            "dispatcher closed; in-flight notification dropped",
          );
          break;
        }
        this.failed += 1;
        this.opts.logger.warn(
          {
            event: "notify.delivery.failed",
            kind: event.kind,
            event_id: event.event_id,
            err: sanitizeErrorText(toErrorMessage(err)),
          },
          "notification dropped after retries",
        );
      }
    }
  }

  private async deliver(event: NotificationEventV1): Promise<void> {
    const webhook = this.opts.webhook;
    if (!webhook) return;
    const body = JSON.stringify(toWebhookMessage(event, this.opts.username));

    await withRetry(
      this.opts.retry,
      {
        shouldRetry: (err) => {
          if (this.closer.signal.aborted) return false;
          if (err instanceof NotificationDeliveryError) {
            return err.status === undefined || isTransientStatus(err.status);
          }
          return isTransientError(err);
        },
        retryAfterMs: (err) =>
          err instanceof NotificationDeliveryError && err.retryAfterSec ? err.retryAfterSec * 1000 : undefined,
        onRetry: ({ attempt, waitMs, err }) => {
          this.opts.logger.debug(
            { event: "notify.delivery.retry", kind: event.kind, attempt, wait_ms: waitMs, err: toErrorMessage(err) },
            "retrying notification",
          );
        },
        wait: async (ms) => {
          if (!(await sleep(ms, this.closer.signal))) throw new Error("notification_dispatcher_closed");
        },
      },
      async () => {
        const response = await requestJson(
          webhook,
          { method: "POST", headers: { "content-type": "application/json" }, body },
          this.opts.timeoutSec,
        );
        if (!isSuccessStatus(response.status)) {
          throw new NotificationDeliveryError(
            `webhook_status:${response.status}:${sanitizeErrorText(response.text)}`,
            response.status,
            response.retryAfterSec,
          );
        }
      },
    );
  }

  /** Waits until the queue is empty or `timeoutMs` passes. Returns true when drained. */
  async flush(timeoutMs = 5_000): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const idle = (async (): Promise<boolean> => {
      while (this.draining) await this.draining;
      return this.queue.length === 0;
    })();
    try {
      return await Promise.race([idle, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Stops retries and drops anything still queued. */
  close(): void {
    if (this.closer.signal.aborted) return;
    this.closer.abort();
    this.dropped += this.queue.length;
    this.queue.length = 0;
  }

  stats(): DispatcherStats {
    return {
      queued: this.queue.length,
      delivered: this.delivered,
      failed: this.failed,
      dropped: this.dropped,
    };
  }
}
