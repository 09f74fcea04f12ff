import type { EventId } from "./ids.js";

export const NotificationKind = {
  Startup: "startup",
  Copy: "copy",
  Delete: "delete",
  Waiting: "waiting",
  Success: "success",
  Error: "error",
  Warning: "warning",
  Stopped: "stopped",
} as const;

export type NotificationKind = (typeof NotificationKind)[keyof typeof NotificationKind];

export interface NotificationEventV1 {
  event_id: EventId;
  kind: NotificationKind;
  path?: string;
  size?: number;
  timestamp: string; // RFC3339 timestamp
  detail: Record<string, unknown>;
}

export interface WebhookMessageV1 {
  username: string;
  content: string;
}
