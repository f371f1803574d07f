/**
 * CV-CUE Client
 *
 * Entry point of the library: resolves configuration, owns the HTTP client
 * and exposes every API resource as a field built at construction time.
 */

import { resolveClientConfig, type ClientConfigInput } from "../../../config";
import type { CvCueLogger } from "../logger";
import type { LoginResponse } from "../types/api-responses";
import { ManagedDevicesResource } from "../resources/managed-devices";
import {
  CvCueHttpClient,
  type HttpMethod,
  type QueryParams,
  type RequestOptions,
} from "./http-client";
import type { SessionStore } from "./session-store";

export interface CvCueClientOptions extends ClientConfigInput {
  sessionStore?: SessionStore;
  fetchFn?: typeof fetch;
  logger?: CvCueLogger;
  /** Environment to read CV_CUE_* variables from (default: process.env) */
  env?: Record<string, string | undefined>;
}

export class CvCueClient {
  readonly http: CvCueHttpClient;
  readonly managedDevices: ManagedDevicesResource;

  /**
   * @throws ConfigurationError when a credential or the base URL is missing
   */
  constructor(options: CvCueClientOptions = {}) {
    const { sessionStore, fetchFn, logger, env, ...input } = options;
    const config = resolveClientConfig(input, env);

    this.http = new CvCueHttpClient({ ...config, sessionStore, fetchFn, logger });
    this.managedDevices = new ManagedDevicesResource(this.http);
  }

  get baseUrl(): string {
    return this.http.baseUrl;
  }

  get sessionFile(): string {
    return this.http.sessionStore.filePath;
  }

  login(): Promise<LoginResponse> {
    return this.http.login();
  }

  isSessionActive(): Promise<boolean> {
    return this.http.isSessionActive();
  }

  hasSessionCookie(): Promise<boolean> {
    return this.http.hasSessionCookie();
  }

  clearSession(): Promise<boolean> {
    return this.http.clearSession();
  }

  request<T>(method: HttpMethod, path: string, options?: RequestOptions): Promise<T | null> {
    return this.http.request<T>(method, path, options);
  }

  get<T>(path: string, params?: QueryParams): Promise<T | null> {
    return this.http.get<T>(path, params);
  }

  post<T>(path: string, body?: unknown): Promise<T | null> {
    return this.http.post<T>(path, body);
  }

  put<T>(path: string, body?: unknown): Promise<T | null> {
    return this.http.put<T>(path, body);
  }

  delete<T>(path: string): Promise<T | null> {
    return this.http.delete<T>(path);
  }

  close(): void {
    this.http.close();
  }
}

/**
 * Run `fn` with a fresh client and close the client however `fn` exits
 *
 * @example
 * const devices = await withCvCueClient({}, async (client) => {
 *   if (!(await client.isSessionActive())) await client.login();
 *   return client.managedDevices.getAllAps({ extraParams: { active: true } });
 * });
 */
export async function withCvCueClient<T>(
  options: CvCueClientOptions,
  fn: (client: CvCueClient) => Promise<T>,
): Promise<T> {
  const client = new CvCueClient(options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
