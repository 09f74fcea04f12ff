import { readFile } from "node:fs/promises";
import path from "node:path";

import { ConfigError } from "./errors.js";
import { isObject } from "./http.js";

export interface AlistConfig {
  url: string;
  token?: string;
  username?: string;
  password?: string;
  timeoutSec: number;
}

export interface MonitorConfig {
  sourcePath: string;
  destPath: string;
  checkIntervalSec: number;
  deleteSource: boolean;
  stableSamples: number;
  ledgerPath: string;
  copyMaxAttempts: number;
  verifyAttempts: number;
  verifyIntervalSec: number;
  identityIncludesMtime: boolean;
  runOnce: boolean;
}

export interface NotificationConfig {
  webhook?: string;
  username: string;
  notifyOnCopy: boolean;
  notifyOnDelete: boolean;
  notifyOnError: boolean;
  notifyOnWaiting: boolean;
  maxAttempts: number;
  timeoutSec: number;
  maxQueue: number;
}

export interface ServerConfig {
  port?: number;
  host: string;
}

export interface AppConfig {
  alist: AlistConfig;
  monitor: MonitorConfig;
  notification: NotificationConfig;
  server: ServerConfig;
  logLevel: string;
}

type Section = Record<string, unknown>;

const DEFAULT_CONFIG_PATH = "config.json";
const DEFAULT_LEDGER_PATH = "data/processed.jsonl";
const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function section(raw: Section, name: string, required: boolean): Section {
  const value = raw[name];
  if (value == null) {
    if (required) throw new ConfigError(name, "section is required");
    return {};
  }
  if (!isObject(value)) throw new ConfigError(name, "must be an object");
  return value;
}

function optionalString(sec: Section, key: string, name: string): string | undefined {
  const value = sec[key];
  if (value == null) return undefined;
  if (typeof value !== "string") throw new ConfigError(name, "must be a string");
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function requireString(sec: Section, key: string, name: string): string {
  const value = optionalString(sec, key, name);
  if (!value) throw new ConfigError(name, "is required");
  return value;
}

function parseBoolean(raw: unknown, name: string, defaultValue: boolean): boolean {
  if (raw == null || raw === "") return defaultValue;
  if (typeof raw === "boolean") return raw;
  if (typeof raw === "string") {
    const value = raw.trim().toLowerCase();
    if (value === "1" || value === "true" || value === "yes" || value === "on") return true;
    if (value === "0" || value === "false" || value === "no" || value === "off") return false;
  }
  throw new ConfigError(name, "must be one of true/false/1/0/yes/no/on/off");
}

function parsePositiveNumber(raw: unknown, name: string, defaultValue?: number): number {
  if (raw == null || raw === "") {
    if (defaultValue === undefined) throw new ConfigError(name, "is required");
    return defaultValue;
  }
  const n = typeof raw === "string" ? Number(raw) : raw;
  if (typeof n !== "number" || !Number.isFinite(n) || n <= 0) {
    throw new ConfigError(name, "must be a positive number");
  }
  return n;
}

function parsePositiveInt(raw: unknown, name: string, defaultValue: number): number {
  const n = parsePositiveNumber(raw, name, defaultValue);
  if (!Number.isInteger(n)) throw new ConfigError(name, "must be a positive integer");
  return n;
}

function parsePort(raw: unknown, name: string): number | undefined {
  if (raw == null || raw === "") return undefined;
  const n = typeof raw === "string" ? Number(raw) : raw;
  if (typeof n !== "number" || !Number.isInteger(n) || n <= 0 || n > 65535) {
    throw new ConfigError(name, "must be an integer between 1 and 65535");
  }
  return n;
}

function parseUrl(raw: string, name: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(name, "must be an absolute URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(name, "must use http or https");
  }
  return raw.replace(/\/+$/, "");
}

export function normalizeRemotePath(raw: string): string {
  const withSlash = raw.startsWith("/") ? raw : `/${raw}`;
  const collapsed = withSlash.replace(/\/{2,}/g, "/");
  if (collapsed === "/") return collapsed;
  return collapsed.replace(/\/+$/, "");
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Validates a parsed config document. Environment variables override the
 * file for credentials and deployment knobs.
 */
export function parseConfig(
  raw: unknown,
  opts: { env?: NodeJS.ProcessEnv; baseDir?: string } = {},
): AppConfig {
  const env = opts.env ?? process.env;
  const baseDir = opts.baseDir ?? process.cwd();
  if (!isObject(raw)) throw new ConfigError("config", "must be a JSON object");

  const alistSec = section(raw, "alist", true);
  const monitorSec = section(raw, "monitor", true);
  const notificationSec = section(raw, "notification", false);
  const serverSec = section(raw, "server", false);
  const logSec = section(raw, "log", false);

  const url = parseUrl(envString(env, "ALIST_URL") ?? requireString(alistSec, "url", "alist.url"), "alist.url");
  const token = envString(env, "ALIST_TOKEN") ?? optionalString(alistSec, "token", "alist.token");
  const username = envString(env, "ALIST_USERNAME") ?? optionalString(alistSec, "username", "alist.username");
  const password = envString(env, "ALIST_PASSWORD") ?? optionalString(alistSec, "password", "alist.password");
  if (!token && (!username || !password)) {
    throw new ConfigError("alist", "needs a token or both username and password");
  }

  const sourcePath = normalizeRemotePath(requireString(monitorSec, "source_path", "monitor.source_path"));
  const destPath = normalizeRemotePath(requireString(monitorSec, "dest_path", "monitor.dest_path"));
  if (sourcePath === destPath) {
    throw new ConfigError("monitor.dest_path", "must differ from monitor.source_path");
  }

  const ledgerRaw = optionalString(monitorSec, "ledger_path", "monitor.ledger_path") ?? DEFAULT_LEDGER_PATH;

  const webhook =
    envString(env, "NOTIFICATION_WEBHOOK") ??
    optionalString(notificationSec, "webhook", "notification.webhook") ??
    optionalString(notificationSec, "discord_webhook", "notification.discord_webhook");

  const logLevel = (envString(env, "LOG_LEVEL") ?? optionalString(logSec, "level", "log.level") ?? "info").toLowerCase();
  if (!LOG_LEVELS.has(logLevel)) {
    throw new ConfigError("log.level", `must be one of ${[...LOG_LEVELS].join("/")}`);
  }

  return {
    alist: {
      url,
      token,
      username,
      password,
      timeoutSec: parsePositiveNumber(alistSec.timeout_sec, "alist.timeout_sec", 30),
    },
    monitor: {
      sourcePath,
      destPath,
      checkIntervalSec: parsePositiveNumber(monitorSec.check_interval, "monitor.check_interval"),
      deleteSource: parseBoolean(monitorSec.delete_source, "monitor.delete_source", true),
      stableSamples: Math.max(2, parsePositiveInt(monitorSec.stable_samples, "monitor.stable_samples", 2)),
      ledgerPath: path.resolve(baseDir, ledgerRaw),
      copyMaxAttempts: parsePositiveInt(monitorSec.copy_max_attempts, "monitor.copy_max_attempts", 3),
      verifyAttempts: parsePositiveInt(monitorSec.verify_attempts, "monitor.verify_attempts", 10),
      verifyIntervalSec: parsePositiveNumber(monitorSec.verify_interval_sec, "monitor.verify_interval_sec", 5),
      identityIncludesMtime: parseBoolean(
        monitorSec.identity_includes_mtime,
        "monitor.identity_includes_mtime",
        false,
      ),
      runOnce: parseBoolean(env.MOVER_RUN_ONCE ?? monitorSec.run_once, "monitor.run_once", false),
    },
    notification: {
      webhook: webhook ? parseUrl(webhook, "notification.webhook") : undefined,
      username: optionalString(notificationSec, "username", "notification.username") ?? "Alist Mover",
      notifyOnCopy: parseBoolean(notificationSec.notify_on_copy, "notification.notify_on_copy", true),
      notifyOnDelete: parseBoolean(notificationSec.notify_on_delete, "notification.notify_on_delete", true),
      notifyOnError: parseBoolean(notificationSec.notify_on_error, "notification.notify_on_error", true),
      notifyOnWaiting: parseBoolean(notificationSec.notify_on_waiting, "notification.notify_on_waiting", true),
      maxAttempts: parsePositiveInt(notificationSec.max_attempts, "notification.max_attempts", 3),
      timeoutSec: parsePositiveNumber(notificationSec.timeout_sec, "notification.timeout_sec", 10),
      maxQueue: parsePositiveInt(notificationSec.max_queue, "notification.max_queue", 100),
    },
    server: {
      port: parsePort(env.MOVER_STATUS_PORT ?? serverSec.port, "server.port"),
      host: optionalString(serverSec, "host", "server.host") ?? "127.0.0.1",
    },
    logLevel,
  };
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const configPath = path.resolve(envString(env, "MOVER_CONFIG_PATH") ?? DEFAULT_CONFIG_PATH);
  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (err) {
    const code = err && typeof err === "object" && "code" in err ? err.code : undefined;
    if (code === "ENOENT") throw new ConfigError("config", `file not found: ${configPath}`);
    throw err;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("config", `is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw, { env, baseDir: path.dirname(configPath) });
}

/** Config summary safe to log or expose over the status API. */
export function describeConfig(cfg: AppConfig): Record<string, unknown> {
  return {
    alist_url: cfg.alist.url,
    auth: cfg.alist.token ? "token" : "password",
    source_path: cfg.monitor.sourcePath,
    dest_path: cfg.monitor.destPath,
    check_interval_sec: cfg.monitor.checkIntervalSec,
    delete_source: cfg.monitor.deleteSource,
    stable_samples: cfg.monitor.stableSamples,
    notifications: cfg.notification.webhook ? "webhook" : "log_only",
  };
}
