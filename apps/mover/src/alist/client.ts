import type { RemoteEntryV1 } from "@alist-mover/shared";

import {
  AuthenticationError,
  RemoteOperationError,
  TransientNetworkError,
  isTransientError,
  sanitizeErrorText,
  toErrorMessage,
} from "../errors.js";
import { buildUrl, isObject, isSuccessStatus, isTransientStatus, requestJson, type HttpJson } from "../http.js";
import type { AppLogger } from "../logger.js";
import { joinRemotePath, splitRemotePath } from "./paths.js";
import type { AlistEnvelope, AlistListItem, RemoteDirectoryClient } from "./types.js";

export type AlistClientOptions = {
  url: string;
  token?: string;
  username?: string;
  password?: string;
  timeoutSec: number;
  logger: AppLogger;
};

const EPOCH = new Date(0).toISOString();

function readEnvelope(json: unknown): AlistEnvelope | null {
  if (!isObject(json) || typeof json.code !== "number") return null;
  return {
    code: json.code,
    message: typeof json.message === "string" ? json.message : "",
    data: json.data,
  };
}

function isAuthFailure(response: HttpJson, envelope: AlistEnvelope | null): boolean {
  if (response.status === 401 || response.status === 403) return true;
  return envelope?.code === 401 || envelope?.code === 403;
}

function readListItem(value: unknown): AlistListItem | null {
  if (!isObject(value) || typeof value.name !== "string" || !value.name) return null;
  const size = typeof value.size === "number" && Number.isFinite(value.size) && value.size >= 0 ? value.size : 0;
  return {
    name: value.name,
    size,
    is_dir: value.is_dir === true,
    modified: typeof value.modified === "string" ? value.modified : undefined,
  };
}

function toModifiedAt(raw: string | undefined): string {
  if (!raw) return EPOCH;
  const ms = Date.parse(raw);
  return Number.isFinite(ms) ? new Date(ms).toISOString() : EPOCH;
}

export class AlistClient implements RemoteDirectoryClient {
  private token: string | undefined;

  constructor(private readonly opts: AlistClientOptions) {
    if (!opts.token && (!opts.username || !opts.password)) {
      throw new AuthenticationError("alist_credentials_missing");
    }
  }

  private canLogin(): boolean {
    return Boolean(this.opts.username && this.opts.password);
  }

  async authenticate(): Promise<void> {
    if (this.opts.token) {
      this.token = this.opts.token;
      this.opts.logger.info({ event: "alist.auth.token" }, "using configured alist token");
      return;
    }
    await this.login();
  }

  private async login(): Promise<void> {
    if (!this.canLogin()) {
      throw new AuthenticationError("alist_token_rejected_no_credentials");
    }
    let response: HttpJson;
    try {
      response = await requestJson(
        buildUrl(this.opts.url, "/api/auth/login"),
        {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ username: this.opts.username, password: this.opts.password }),
        },
        this.opts.timeoutSec,
      );
    } catch (err) {
      if (isTransientError(err)) {
        throw new TransientNetworkError(`alist_login_transport:${toErrorMessage(err)}`, { cause: err });
      }
      throw err;
    }

    if (isTransientStatus(response.status)) {
      throw new TransientNetworkError(`alist_login_status:${response.status}`, {
        status: response.status,
        retryAfterSec: response.retryAfterSec,
      });
    }
    const envelope = readEnvelope(response.json);
    const data = envelope?.data;
    const token = isObject(data) && typeof data.token === "string" ? data.token.trim() : "";
    if (!isSuccessStatus(response.status) || envelope?.code !== 200 || !token) {
      throw new AuthenticationError(
        `alist_login_failed:status=${response.status}:code=${envelope?.code ?? "-"}:${sanitizeErrorText(envelope?.message ?? response.text)}`,
        response.status,
      );
    }
    this.token = token;
    this.opts.logger.info({ event: "alist.auth.login", username: this.opts.username }, "alist login succeeded");
  }

  private async send(route: string, payload: unknown): Promise<HttpJson> {
    try {
      return await requestJson(
        buildUrl(this.opts.url, route),
        {
          method: "POST",
          headers: {
            "content-type": "application/json",
            authorization: this.token ?? "",
          },
          body: JSON.stringify(payload),
        },
        this.opts.timeoutSec,
      );
    } catch (err) {
      if (isTransientError(err)) {
        throw new TransientNetworkError(`alist_request_transport:${route}:${toErrorMessage(err)}`, { cause: err });
      }
      throw err;
    }
  }

  private async post(route: string, payload: unknown): Promise<unknown> {
    if (!this.token) await this.authenticate();

    let response = await this.send(route, payload);
    let envelope = readEnvelope(response.json);
    if (isAuthFailure(response, envelope)) {
      this.opts.logger.warn({ event: "alist.auth.rejected", route }, "alist rejected token; re-authenticating once");
      if (!this.canLogin()) {
        throw new AuthenticationError("alist_token_rejected_no_credentials", response.status);
      }
      await this.login();
      response = await this.send(route, payload);
      envelope = readEnvelope(response.json);
      if (isAuthFailure(response, envelope)) {
        throw new AuthenticationError(`alist_auth_rejected_after_login:${route}`, response.status);
      }
    }

    if (isTransientStatus(response.status)) {
      throw new TransientNetworkError(`alist_request_status:${route}:${response.status}`, {
        status: response.status,
        retryAfterSec: response.retryAfterSec,
      });
    }
    if (!isSuccessStatus(response.status) || !envelope || envelope.code !== 200) {
      throw new RemoteOperationError(route, response.status, envelope?.code, sanitizeErrorText(response.text));
    }
    return envelope.data;
  }

  async listDirectory(dirPath: string): Promise<RemoteEntryV1[]> {
    const data = await this.post("/api/fs/list", {
      path: dirPath,
      password: "",
      page: 1,
      per_page: 0,
      refresh: true,
    });
    const content = isObject(data) && Array.isArray(data.content) ? data.content : [];
    const entries: RemoteEntryV1[] = [];
    for (const raw of content) {
      const item = readListItem(raw);
      if (!item) continue;
      entries.push({
        path: joinRemotePath(dirPath, item.name),
        name: item.name,
        size: item.size,
        modified_at: toModifiedAt(item.modified),
        is_directory: item.is_dir,
      });
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async copyEntry(sourcePath: string, destPath: string): Promise<void> {
    const src = splitRemotePath(sourcePath);
    const dst = splitRemotePath(destPath);
    if (src.name !== dst.name) {
      throw new RemoteOperationError("/api/fs/copy", 0, undefined, "copy_rename_unsupported");
    }
    await this.post("/api/fs/copy", {
      src_dir: src.dir,
      dst_dir: dst.dir,
      names: [src.name],
    });
  }

  async deleteEntry(entryPath: string): Promise<void> {
    const target = splitRemotePath(entryPath);
    await this.post("/api/fs/remove", {
      dir: target.dir,
      names: [target.name],
    });
  }
}
