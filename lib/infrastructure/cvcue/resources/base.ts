import type { HttpMethod, RequestOptions } from "../client/http-client";

/**
 * The part of the HTTP client a resource depends on.
 * Resolves to null when the response had no body.
 */
export interface RequestExecutor {
  request<T>(method: HttpMethod, path: string, options?: RequestOptions): Promise<T | null>;
}

/**
 * Base class for API resources. Resources are built eagerly by CvCueClient
 * and share its HTTP client.
 */
export abstract class BaseResource {
  constructor(protected readonly client: RequestExecutor) {}

  protected request<T>(method: HttpMethod, path: string, options?: RequestOptions): Promise<T | null> {
    return this.client.request<T>(method, path, options);
  }
}
