/**
 * HTTPS API client for the GDO cloud service
 */

import { z } from "zod";
import { isRecord } from "./attributes.js";
import {
  API_TIMEOUT_MS,
  DEFAULT_API_URL,
  TRANSFORM_HEADER,
  TRANSFORM_VALUE,
  TRANSFORM_VERSION_HEADER,
  TRANSFORM_VERSION_VALUE,
} from "./constants.js";
import { GdoError, ResponseError } from "./errors.js";
import { defaultLogger, type GdoLogger } from "./logger.js";
import type { ApiResponse, DeviceDetails, DeviceMeta, ResponseFailure, Session } from "./types.js";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface GdoApiClientOptions {
  baseUrl?: string;
  fetch?: FetchFn;
  timeoutMs?: number;
  logger?: GdoLogger;
}

/** The calls the client makes against the HTTPS API. */
export interface GdoApi {
  login(username: string, password: string): Promise<Session>;
  logout(): Promise<void>;
  listDevices(): Promise<DeviceMeta[]>;
  getDeviceDetails(varName: string): Promise<DeviceDetails>;
}

const LoginResultSchema = z
  .object({
    auth: z.object({ apiKey: z.string().min(1) }).passthrough(),
  })
  .passthrough();

const DeviceListSchema = z.array(
  z.object({ varName: z.string().min(1), name: z.string() }).passthrough(),
);

const DeviceDetailsSchema = z
  .array(z.object({ attributes: z.record(z.unknown()) }).passthrough())
  .nonempty();

/** Empty strings, zero, empty arrays and empty objects count as no result. */
function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return true;
  }
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Sort a raw response into success or one of the failure kinds.
 * Bodies of non-200 responses that are not JSON are kept only as `raw`.
 */
export function classifyResponse(status: number, raw: string, path: string): ApiResponse {
  let data: Record<string, unknown> = {};
  if (raw) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      if (status === 200) {
        throw new GdoError(`Invalid JSON response from ${path}`);
      }
      parsed = {};
    }
    if (isRecord(parsed)) {
      data = parsed;
    } else if (status === 200) {
      throw new GdoError(`Unexpected response shape from ${path}: expected an object`);
    }
  }

  let failure: ResponseFailure | null = null;
  if (status !== 200) {
    failure = "http";
  } else if (data.err !== undefined && data.err !== null) {
    failure = "application";
  } else if (isBlank(data.result)) {
    failure = "missing-result";
  }

  return { status, failure, data, raw };
}

export class GdoApiClient implements GdoApi {
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly logger: GdoLogger;
  private readonly cookies = new Map<string, string>();

  constructor(options: GdoApiClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? API_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
  }

  async login(username: string, password: string): Promise<Session> {
    const response = await this.request("/login", { username, password });
    const result = this.parseResult(LoginResultSchema, response, "login");
    return { apiKey: result.auth.apiKey, data: result };
  }

  async logout(): Promise<void> {
    const response = await this.request("/logout");
    if (response.failure) {
      throw new ResponseError("logout failed", response);
    }
    this.cookies.clear();
  }

  async listDevices(): Promise<DeviceMeta[]> {
    const response = await this.request("/devices");
    return this.parseResult(DeviceListSchema, response, "devices request");
  }

  async getDeviceDetails(varName: string): Promise<DeviceDetails> {
    const response = await this.request(`/devices/${encodeURIComponent(varName)}`);
    const [details] = this.parseResult(DeviceDetailsSchema, response, `device request for ${varName}`);
    return details;
  }

  /**
   * Send one request. A body makes it a JSON POST, otherwise a GET.
   */
  async request(path: string, body?: unknown): Promise<ApiResponse> {
    const normalizedPath = path.startsWith("/") ? path : `/${path}`;
    const payload = body !== undefined ? JSON.stringify(body) : undefined;

    const headers: Record<string, string> = {
      [TRANSFORM_HEADER]: TRANSFORM_VALUE,
    };
    if (payload !== undefined) {
      headers["Content-Type"] = "application/json; charset=utf-8";
    } else {
      headers[TRANSFORM_VERSION_HEADER] = TRANSFORM_VERSION_VALUE;
    }
    if (this.cookies.size > 0) {
      headers.Cookie = [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const method = payload !== undefined ? "POST" : "GET";
    this.logger.debug(`${method} ${normalizedPath}`);

    try {
      const response = await this.fetchFn(`${this.baseUrl}${normalizedPath}`, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
      });
      this.storeCookies(response);
      const raw = await response.text();
      return classifyResponse(response.status, raw, normalizedPath);
    } catch (error: unknown) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new GdoError(`API request timeout after ${this.timeoutMs}ms: ${normalizedPath}`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private storeCookies(response: Response): void {
    for (const cookie of response.headers.getSetCookie()) {
      const [pair] = cookie.split(";");
      const separator = pair.indexOf("=");
      if (separator <= 0) continue;
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }

  private parseResult<T extends z.ZodTypeAny>(schema: T, response: ApiResponse, what: string): z.output<T> {
    if (response.failure) {
      throw new ResponseError(`${what} failed`, response);
    }
    const parsed = schema.safeParse(response.data.result);
    if (!parsed.success) {
      throw new GdoError(`Unexpected ${what} result: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }
}
