import { NotificationKind, type NotificationEventV1, type WebhookMessageV1 } from "@alist-mover/shared";

import { splitRemotePath } from "../alist/paths.js";

const MAX_CONTENT_LENGTH = 2000;

export function formatSizeMb(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
}

function text(detail: Record<string, unknown>, key: string): string | undefined {
  const value = detail[key];
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

function yesNo(value: unknown): string {
  return value === true ? "yes" : "no";
}

function fileName(event: NotificationEventV1): string {
  return event.path ? splitRemotePath(event.path).name : "-";
}

function sizeLine(event: NotificationEventV1): string[] {
  return typeof event.size === "number" ? [`Size: ${formatSizeMb(event.size)}`] : [];
}

function renderLines(event: NotificationEventV1): string[] {
  const d = event.detail;
  switch (event.kind) {
    case NotificationKind.Startup: {
      const lines = [
        "🚀 Monitoring started",
        `Source: ${text(d, "source_path") ?? "-"}`,
        `Destination: ${text(d, "dest_path") ?? "-"}`,
        `Check interval: ${text(d, "check_interval_sec") ?? "-"}s`,
        `Delete source after copy: ${yesNo(d.delete_source)}`,
      ];
      const auth = text(d, "auth");
      if (auth) lines.push(`Auth: ${auth === "token" ? "static token" : "password login"}`);
      return lines;
    }
    case NotificationKind.Copy: {
      const lines = ["📋 Copying file", `Name: ${fileName(event)}`, ...sizeLine(event)];
      lines.push(`From: ${text(d, "from") ?? "-"}`, `To: ${text(d, "to") ?? "-"}`);
      if (d.already_present === true) lines.push("Destination already holds a file of this size; copying over it");
      return lines;
    }
    case NotificationKind.Waiting:
      return [
        `⏳ Still downloading: ${fileName(event)}`,
        ...(typeof event.size === "number" ? [`Current size: ${formatSizeMb(event.size)}`] : []),
      ];
    case NotificationKind.Delete:
      return [`🗑️ Deleting source file: ${fileName(event)}`];
    case NotificationKind.Success: {
      const lines = [`✅ File moved: ${fileName(event)}`, ...sizeLine(event)];
      const dest = text(d, "dest_path");
      if (dest) lines.push(`Now at: ${dest}`);
      const deleteFailed = text(d, "delete_failed");
      if (deleteFailed) lines.push(`⚠️ Source not deleted: ${deleteFailed}`);
      return lines;
    }
    case NotificationKind.Error: {
      const lines = [`❌ ${text(d, "message") ?? "error"}`];
      if (event.path) lines.push(`File: ${fileName(event)}`);
      const reason = text(d, "reason_code");
      if (reason) lines.push(`Reason: ${reason}`);
      return lines;
    }
    case NotificationKind.Warning: {
      const lines = [`⚠️ ${text(d, "message") ?? "warning"}`];
      if (event.path) lines.push(`File: ${fileName(event)}`);
      return lines;
    }
    case NotificationKind.Stopped: {
      const lines = [
        "🛑 Monitoring stopped",
        `Copied: ${text(d, "copied") ?? "0"}`,
        `Deleted: ${text(d, "deleted") ?? "0"}`,
        `Errors: ${text(d, "errored") ?? "0"}`,
      ];
      const processed = Array.isArray(d.processed) ? d.processed.filter((v): v is string => typeof v === "string") : [];
      if (processed.length > 0) {
        lines.push("Processed files:", ...processed.map((name) => `  - ${name}`));
      }
      return lines;
    }
  }
}

export function formatNotification(event: NotificationEventV1): string {
  const content = renderLines(event).join("\n");
  if (content.length <= MAX_CONTENT_LENGTH) return content;
  return `${content.slice(0, MAX_CONTENT_LENGTH - 3)}...`;
}

export function toWebhookMessage(event: NotificationEventV1, username: string): WebhookMessageV1 {
  return { username, content: formatNotification(event) };
}
