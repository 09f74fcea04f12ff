import { newEventId, type NotificationEventV1, type NotificationKind } from "@alist-mover/shared";

export interface Notifier {
  send(event: NotificationEventV1): void;
}

export function createNotification(
  kind: NotificationKind,
  input: { path?: string; size?: number; detail?: Record<string, unknown> } = {},
  now: Date = new Date(),
): NotificationEventV1 {
  return {
    event_id: newEventId(),
    kind,
    path: input.path,
    size: input.size,
    timestamp: now.toISOString(),
    detail: input.detail ?? {},
  };
}
