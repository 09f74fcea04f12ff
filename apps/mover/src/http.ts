import { setTimeout as delay } from "node:timers/promises";

export type HttpJson = {
  status: number;
  text: string;
  json: unknown;
  retryAfterSec?: number;
};

export function buildUrl(baseUrl: string, routePath: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${routePath}`;
}

export function isObject(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutSec: number,
): Promise<Response> {
  const ctl = new AbortController();
  const timeout = setTimeout(() => ctl.abort(), timeoutSec * 1000);
  try {
    return await fetch(url, { ...init, signal: ctl.signal });
  } finally {
    clearTimeout(timeout);
  }
}

export async function requestJson(url: string, init: RequestInit, timeoutSec: number): Promise<HttpJson> {
  const res = await fetchWithTimeout(url, init, timeoutSec);
  const text = await res.text();
  let json: unknown = null;
  try {
    json = text ? JSON.parse(text) : null;
  } catch {
    json = null;
  }
  return {
    status: res.status,
    text,
    json,
    retryAfterSec: parseRetryAfterSec(res.headers.get("retry-after"), json),
  };
}

/** Reads the Retry-After header, falling back to a JSON `retry_after` field (seconds). */
export function parseRetryAfterSec(header: string | null, body: unknown): number | undefined {
  const fromBody = isObject(body) ? body.retry_after : undefined;
  const raw = header ?? fromBody;
  const n = typeof raw === "string" ? Number(raw) : typeof raw === "number" ? raw : NaN;
  if (!Number.isFinite(n) || n <= 0) return undefined;
  return n;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Resolves after `ms`, or early (without throwing) when `signal` aborts.
 * Returns false when the wait was cut short.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (ms <= 0) return !signal?.aborted;
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}
