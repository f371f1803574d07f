/**
 * CV-CUE Error Types
 *
 * Domain-specific error types for CV-CUE client operations
 */

/**
 * Base error class for all CV-CUE-related errors
 */
export class CvCueError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public endpoint?: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "CvCueError";

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CvCueError);
    }
  }
}

/**
 * Error thrown when credentials or the base URL are missing or invalid
 */
export class ConfigurationError extends CvCueError {
  constructor(message: string, cause?: Error) {
    super(message, undefined, undefined, cause);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown for an unknown filter operator or logical operator
 */
export class InvalidOperatorError extends CvCueError {
  constructor(
    public operator: string,
    public validOperators: readonly string[],
  ) {
    super(`Invalid operator '${operator}'. Must be one of: ${validOperators.join(", ")}`);
    this.name = "InvalidOperatorError";
  }
}

/**
 * Error thrown when a `property:operator:value` expression cannot be split
 */
export class InvalidFilterExpressionError extends CvCueError {
  constructor(public expression: string) {
    super(`Invalid filter format: ${expression}. Expected format: property:operator:value`);
    this.name = "InvalidFilterExpressionError";
  }
}

/**
 * Error thrown when the request never produced a response (network failure, abort, timeout)
 */
export class TransportError extends CvCueError {
  constructor(message: string, endpoint?: string, cause?: Error) {
    super(message, undefined, endpoint, cause);
    this.name = "TransportError";
  }
}

/**
 * Error thrown for any non-2xx response. The raw body is kept for diagnostics.
 */
export class HttpStatusError extends CvCueError {
  constructor(
    message: string,
    statusCode: number,
    endpoint: string,
    public responseBody: string,
  ) {
    super(message, statusCode, endpoint);
    this.name = "HttpStatusError";
  }
}

/**
 * Error thrown when the API rejects the credentials or the session cookie
 */
export class AuthenticationError extends HttpStatusError {
  constructor(message: string, statusCode: number, endpoint: string, responseBody: string) {
    super(message, statusCode, endpoint, responseBody);
    this.name = "AuthenticationError";
  }
}

/**
 * Error describing a failed read, write or delete of the session cache file.
 * SessionStore logs these rather than throwing them.
 */
export class SessionCacheError extends CvCueError {
  constructor(
    message: string,
    public filePath: string,
    cause?: Error,
  ) {
    super(message, undefined, undefined, cause);
    this.name = "SessionCacheError";
  }
}

/**
 * Error thrown when pagination reaches its page cap while the server still returns full pages
 */
export class PaginationLimitError extends CvCueError {
  constructor(
    public maxPages: number,
    public fetchedItems: number,
    endpoint?: string,
  ) {
    super(
      `Pagination stopped after ${maxPages} pages (${fetchedItems} items) while the server was still returning full pages`,
      undefined,
      endpoint,
    );
    this.name = "PaginationLimitError";
  }
}

export class InvalidPaginationError extends CvCueError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPaginationError";
  }
}

export class ClientClosedError extends CvCueError {
  constructor(endpoint?: string) {
    super("CV-CUE client has been closed", undefined, endpoint);
    this.name = "ClientClosedError";
  }
}

/**
 * Parse a CV-CUE error response and create the appropriate error
 */
export function parseHttpStatusError(
  response: Response,
  endpoint: string,
  body: string,
): HttpStatusError {
  const statusCode = response.status;

  let errorMessage = `CV-CUE request failed with status ${statusCode}`;
  if (body) {
    const apiMessage = extractApiMessage(body);
    errorMessage = apiMessage
      ? `${errorMessage}: ${apiMessage}`
      : `${errorMessage}: ${body.slice(0, 500)}`;
  }

  if (statusCode === 401 || statusCode === 403) {
    return new AuthenticationError(errorMessage, statusCode, endpoint, body);
  }

  return new HttpStatusError(errorMessage, statusCode, endpoint, body);
}

function extractApiMessage(body: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    // Not JSON, the caller falls back to the raw body
    return undefined;
  }

  if (typeof parsed !== "object" || parsed === null) {
    return undefined;
  }

  if ("message" in parsed && typeof parsed.message === "string") {
    return parsed.message;
  }
  if ("error" in parsed) {
    const error = parsed.error;
    if (typeof error === "string") {
      return error;
    }
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
      return error.message;
    }
  }
  return undefined;
}
