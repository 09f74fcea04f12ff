export class TransientNetworkError extends Error {
  public readonly status?: number;
  public readonly retryAfterSec?: number;

  constructor(message: string, opts: { status?: number; retryAfterSec?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = "TransientNetworkError";
    this.status = opts.status;
    this.retryAfterSec = opts.retryAfterSec;
  }
}

export class AuthenticationError extends Error {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "AuthenticationError";
    this.status = status;
  }
}

export class RemoteOperationError extends Error {
  public readonly route: string;
  public readonly status: number;
  public readonly code?: number;
  public readonly bodyText: string;

  constructor(route: string, status: number, code: number | undefined, bodyText: string) {
    super(`alist_request_failed:${route}:status=${status}:code=${code ?? "-"}:body=${bodyText.slice(0, 280) || "<empty>"}`);
    this.name = "RemoteOperationError";
    this.route = route;
    this.status = status;
    this.code = code;
    this.bodyText = bodyText;
  }
}

export class IntegrityMismatchError extends Error {
  public readonly path: string;
  public readonly expectedSize: number;
  public readonly actualSize: number;

  constructor(path: string, expectedSize: number, actualSize: number) {
    super(`integrity_mismatch:${path}:expected=${expectedSize}:actual=${actualSize}`);
    this.name = "IntegrityMismatchError";
    this.path = path;
    this.expectedSize = expectedSize;
    this.actualSize = actualSize;
  }
}

export class NotificationDeliveryError extends Error {
  public readonly status?: number;
  public readonly retryAfterSec?: number;

  constructor(message: string, status?: number, retryAfterSec?: number) {
    super(message);
    this.name = "NotificationDeliveryError";
    this.status = status;
    this.retryAfterSec = retryAfterSec;
  }
}

export class ConfigError extends Error {
  public readonly key: string;

  constructor(key: string, message: string) {
    super(`${key} ${message}`);
    this.name = "ConfigError";
    this.key = key;
  }
}

export class StartupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StartupError";
  }
}

const TRANSIENT_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_SOCKET",
]);

function readErrorCode(value: unknown): string | undefined {
  if (!value || typeof value !== "object" || !("code" in value)) return undefined;
  return typeof value.code === "string" ? value.code : undefined;
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof TransientNetworkError) return true;
  if (!(err instanceof Error)) return false;
  if (err.name === "AbortError" || err.name === "TimeoutError") return true;
  const code = readErrorCode(err) ?? readErrorCode(err.cause);
  if (code && TRANSIENT_SOCKET_CODES.has(code)) return true;
  if (err.name === "TypeError" && /fetch failed|network|socket|connection/i.test(err.message)) {
    return true;
  }
  return false;
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function sanitizeErrorText(input: string): string {
  return input
    .replace(/Bearer\s+[A-Za-z0-9._\-]+/gi, "Bearer [REDACTED]")
    .replace(/"(token|password)"\s*:\s*"[^"]*"/gi, '"$1":"[REDACTED]"')
    .replace(/(https?:\/\/[^\s?]+)\?[^\s]*/gi, "$1?[REDACTED]")
    .slice(0, 500);
}
