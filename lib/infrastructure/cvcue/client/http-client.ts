/**
 * CV-CUE HTTP Client
 *
 * Low-level HTTP client for the CV-CUE REST API with:
 * - API-key login and a cookie-based session cached on disk
 * - Session validity probe
 * - Error handling and mapping
 * - Request logging
 *
 * Requests are never retried; every failure reaches the caller.
 */

import {
  ClientClosedError,
  CvCueError,
  TransportError,
  parseHttpStatusError,
} from "../errors";
import { createConsoleLogger, type CvCueLogger } from "../logger";
import type { LoginResponse } from "../types/api-responses";
import { CookieJar, SESSION_COOKIE_NAME } from "./cookie-jar";
import { SessionStore } from "./session-store";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean;
export type QueryParams = Record<string, QueryValue | readonly QueryValue[] | null | undefined>;

export interface RequestOptions {
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  timeout?: number; // milliseconds, overrides the client default
}

export interface CvCueHttpClientConfig {
  baseUrl: string;
  keyId: string;
  keyValue: string;
  clientId: string;
  sessionFile: string;
  timeoutMs?: number; // no timeout unless set
  /** Session cache; defaults to a SessionStore on `sessionFile` */
  sessionStore?: SessionStore;
  /** Custom fetch implementation */
  fetchFn?: typeof fetch;
  logger?: CvCueLogger;
}

export const SESSION_PATH = "/session";
export const LOGIN_SESSION_TIMEOUT_SECONDS = 300;

/**
 * CV-CUE HTTP Client
 * Owns the base URL and the cookie session shared by every resource
 */
export class CvCueHttpClient {
  readonly baseUrl: string;
  readonly sessionStore: SessionStore;

  private readonly config: CvCueHttpClientConfig;
  private readonly cookies = new CookieJar();
  private readonly fetchFn: typeof fetch;
  private readonly logger: CvCueLogger;
  private readonly lifetime = new AbortController();
  private sessionLoad: Promise<void> | null = null;

  constructor(config: CvCueHttpClientConfig) {
    this.config = config;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.logger = config.logger ?? createConsoleLogger("CV-CUE HTTP");
    this.sessionStore = config.sessionStore ?? new SessionStore(config.sessionFile, config.logger);
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));

    // Start reading the session cache right away; every operation awaits it
    this.sessionLoad = this.loadSession();
  }

  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  /**
   * Whether the session cookie is present (says nothing about server-side validity)
   */
  async hasSessionCookie(): Promise<boolean> {
    await this.ensureSessionLoaded();
    return this.cookies.has(SESSION_COOKIE_NAME);
  }

  /**
   * Authenticate with the API key and cache the session cookies.
   * Nothing is cached when the login request fails.
   */
  async login(): Promise<LoginResponse> {
    const response = await this.post<LoginResponse>(SESSION_PATH, {
      type: "apiKeyCredentials",
      keyId: this.config.keyId,
      keyValue: this.config.keyValue,
      clientIdentifier: this.config.clientId,
      timeout: LOGIN_SESSION_TIMEOUT_SECONDS,
    });

    await this.sessionStore.save(this.cookies.toArray());
    return response ?? {};
  }

  /**
   * Check whether the cached session is still accepted by the API.
   *
   * Returns false without a network call when the session cookie is missing.
   * Otherwise probes GET /session: only a 200 counts as active, and transport
   * failures count as inactive. A stale cookie is left in place.
   */
  async isSessionActive(): Promise<boolean> {
    this.ensureOpen(SESSION_PATH);

    if (!(await this.hasSessionCookie())) {
      this.logger.info?.(`Session is not active: ${SESSION_COOKIE_NAME} cookie not found`);
      return false;
    }

    const url = this.buildUrl(SESSION_PATH);
    this.logger.info?.(`Checking session status at ${url}`);

    try {
      const response = await this.send("GET", url, {});
      // Drain the body so the connection is released
      await response.arrayBuffer();

      if (response.status === 200) {
        this.logger.info?.("Session is active");
        return true;
      }
      this.logger.info?.(`Session is not active (status: ${response.status})`);
      return false;
    } catch (error) {
      if (error instanceof ClientClosedError) {
        throw error;
      }
      this.logger.warn?.(
        `Failed to check session status: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * Forget the cached session file. The in-memory cookies are dropped too.
   * @returns false when the cache file could not be deleted
   */
  async clearSession(): Promise<boolean> {
    await this.ensureSessionLoaded();
    this.cookies.clear();
    return this.sessionStore.clear();
  }

  /**
   * Execute a request against `baseUrl + path` and return the parsed JSON body
   * (null for an empty body).
   *
   * @throws HttpStatusError for any non-2xx status
   * @throws TransportError when no response was received
   */
  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T | null> {
    const url = this.buildUrl(path, options.params);
    this.ensureOpen(url);
    await this.ensureSessionLoaded();

    this.logger.info?.(`Making ${method} request to ${url}`);
    const response = await this.send(method, url, options);

    if (!response.ok) {
      const body = await response.text();
      const error = parseHttpStatusError(response, url, body);
      this.logger.error?.(`HTTP error occurred: ${error.message}`);
      throw error;
    }

    const text = await response.text();
    try {
      if (text === "") {
        return null;
      }
      return JSON.parse(text) as T;
    } catch (error) {
      throw new CvCueError(
        `Invalid JSON in response from ${method} ${url}`,
        response.status,
        url,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async get<T>(path: string, params?: QueryParams, options?: Omit<RequestOptions, "params" | "body">): Promise<T | null> {
    return this.request<T>("GET", path, { ...options, params });
  }

  async post<T>(path: string, body?: unknown, options?: Omit<RequestOptions, "body">): Promise<T | null> {
    return this.request<T>("POST", path, { ...options, body });
  }

  async put<T>(path: string, body?: unknown, options?: Omit<RequestOptions, "body">): Promise<T | null> {
    return this.request<T>("PUT", path, { ...options, body });
  }

  async delete<T>(path: string, options?: Omit<RequestOptions, "body">): Promise<T | null> {
    return this.request<T>("DELETE", path, options);
  }

  /**
   * Abort in-flight requests and reject any later call. Safe to call twice.
   */
  close(): void {
    if (!this.lifetime.signal.aborted) {
      this.lifetime.abort();
    }
  }

  /**
   * Send one request and return the raw response, whatever its status
   */
  private async send(method: HttpMethod, url: string, options: RequestOptions): Promise<Response> {
    const headers: Record<string, string> = {
      // The API requires Content-Type even on requests without a body
      "Content-Type": "application/json",
      Accept: "application/json",
    };
    const cookieHeader = this.cookies.toHeader();
    if (cookieHeader) {
      headers.Cookie = cookieHeader;
    }
    Object.assign(headers, options.headers);

    const controller = new AbortController();
    const onClose = () => controller.abort();
    this.lifetime.signal.addEventListener("abort", onClose, { once: true });

    const timeout = options.timeout ?? this.config.timeoutMs;
    let timedOut = false;
    const timeoutId =
      timeout === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeout);

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      this.cookies.updateFromResponse(response.headers);
      return response;
    } catch (error) {
      if (this.closed) {
        throw new ClientClosedError(url);
      }
      if (timedOut) {
        throw new TransportError(`Request timed out after ${timeout}ms`, url, toError(error));
      }
      const transportError = new TransportError(`Request failed: ${toError(error).message}`, url, toError(error));
      this.logger.error?.(transportError.message);
      throw transportError;
    } finally {
      clearTimeout(timeoutId);
      this.lifetime.signal.removeEventListener("abort", onClose);
    }
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const normalizedPath = path.startsWith("/") ? path : `/${path}`;
    const queryString = params ? buildQueryString(params) : "";
    return queryString
      ? `${this.baseUrl}${normalizedPath}?${queryString}`
      : `${this.baseUrl}${normalizedPath}`;
  }

  private ensureOpen(endpoint: string): void {
    if (this.closed) {
      throw new ClientClosedError(endpoint);
    }
  }

  private async ensureSessionLoaded(): Promise<void> {
    if (this.sessionLoad) {
      await this.sessionLoad;
      this.sessionLoad = null;
    }
  }

  private async loadSession(): Promise<void> {
    const cookies = await this.sessionStore.load();
    this.cookies.update(cookies);
  }
}

/**
 * Build a query string. Null/undefined values are dropped and arrays repeat the key.
 */
export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (isQueryValueList(value)) {
      for (const item of value) {
        search.append(key, String(item));
      }
    } else {
      search.append(key, String(value));
    }
  }
  return search.toString();
}

function isQueryValueList(value: QueryValue | readonly QueryValue[]): value is readonly QueryValue[] {
  return Array.isArray(value);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
