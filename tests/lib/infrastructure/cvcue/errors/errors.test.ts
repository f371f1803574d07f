/**
 * Unit Tests for CV-CUE error mapping
 */

import { describe, it, expect } from "vitest";
import {
  AuthenticationError,
  CvCueError,
  HttpStatusError,
  PaginationLimitError,
  parseHttpStatusError,
} from "../../../../../lib/infrastructure/cvcue/errors";

const ENDPOINT = "https://cvcue.test/wifi/api/manageddevices/aps";

describe("parseHttpStatusError", () => {
  it("uses the message field of a JSON body", () => {
    const error = parseHttpStatusError(
      new Response(null, { status: 400 }),
      ENDPOINT,
      JSON.stringify({ message: "Invalid sort field" }),
    );

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error.message).toBe("CV-CUE request failed with status 400: Invalid sort field");
    expect(error.statusCode).toBe(400);
    expect(error.endpoint).toBe(ENDPOINT);
  });

  it("uses a string error field", () => {
    const error = parseHttpStatusError(new Response(null, { status: 500 }), ENDPOINT, '{"error":"Internal"}');
    expect(error.message).toBe("CV-CUE request failed with status 500: Internal");
  });

  it("uses a nested error message", () => {
    const error = parseHttpStatusError(
      new Response(null, { status: 502 }),
      ENDPOINT,
      '{"error":{"message":"Upstream down"}}',
    );
    expect(error.message).toBe("CV-CUE request failed with status 502: Upstream down");
  });

  it("falls back to the raw body, truncated to 500 characters", () => {
    const body = "x".repeat(600);
    const error = parseHttpStatusError(new Response(null, { status: 503 }), ENDPOINT, body);

    expect(error.message).toBe(`CV-CUE request failed with status 503: ${"x".repeat(500)}`);
    expect(error.responseBody).toBe(body);
  });

  it("falls back to the raw body for JSON without a message", () => {
    const error = parseHttpStatusError(new Response(null, { status: 500 }), ENDPOINT, "[1,2]");
    expect(error.message).toBe("CV-CUE request failed with status 500: [1,2]");
  });

  it("omits the detail for an empty body", () => {
    const error = parseHttpStatusError(new Response(null, { status: 404 }), ENDPOINT, "");
    expect(error.message).toBe("CV-CUE request failed with status 404");
  });

  it.each([401, 403])("returns AuthenticationError for %d", (status) => {
    const error = parseHttpStatusError(new Response(null, { status }), ENDPOINT, "");

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error.name).toBe("AuthenticationError");
  });
});

describe("error hierarchy", () => {
  it("derives every error from CvCueError", () => {
    const error = new PaginationLimitError(3, 300, "/manageddevices/aps");

    expect(error).toBeInstanceOf(CvCueError);
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe(
      "Pagination stopped after 3 pages (300 items) while the server was still returning full pages",
    );
  });
});
