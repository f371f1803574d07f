/**
 * CV-CUE Session Store
 *
 * Persists the session cookies between CLI invocations so a login is only
 * needed when the cached session has expired. Every failure here is reported
 * through the logger, never thrown: a missing cache just means logging in again.
 */

import { promises as fs } from "node:fs";
import { z } from "zod";
import { SessionCacheError } from "../errors";
import { createConsoleLogger, type CvCueLogger } from "../logger";
import type { SessionCookie } from "./cookie-jar";

export const DEFAULT_SESSION_FILE = ".session";

const SessionFileSchema = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  cookies: z.array(
    z.object({
      name: z.string().min(1),
      value: z.string(),
    }),
  ),
});

export type SessionFile = z.infer<typeof SessionFileSchema>;

export class SessionStore {
  private readonly logger: CvCueLogger;

  constructor(
    readonly filePath: string = DEFAULT_SESSION_FILE,
    logger?: CvCueLogger,
  ) {
    this.logger = logger ?? createConsoleLogger("CV-CUE Session");
  }

  /**
   * Load cached cookies. Returns an empty list when the file is absent;
   * a file that cannot be parsed is deleted and treated the same way.
   */
  async load(): Promise<SessionCookie[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      this.report(new SessionCacheError("Failed to read session cache", this.filePath, toError(error)), "warn");
      return [];
    }

    const parsed = parseSessionFile(raw);
    if (!parsed.success) {
      this.report(
        new SessionCacheError(`Failed to load session cache: ${parsed.reason}`, this.filePath),
        "warn",
      );
      await this.remove();
      return [];
    }

    this.logger.info?.(`Loaded session from ${this.filePath}`);
    return parsed.data.cookies;
  }

  /**
   * Write the cookies to the cache file.
   * @returns false when the file could not be written
   */
  async save(cookies: readonly SessionCookie[]): Promise<boolean> {
    const document: SessionFile = {
      version: 1,
      savedAt: new Date().toISOString(),
      cookies: cookies.map(({ name, value }) => ({ name, value })),
    };

    try {
      await fs.writeFile(this.filePath, JSON.stringify(document, null, 2), { encoding: "utf8", mode: 0o600 });
      this.logger.info?.(`Saved session to ${this.filePath}`);
      return true;
    } catch (error) {
      this.report(new SessionCacheError("Failed to save session cache", this.filePath, toError(error)), "error");
      return false;
    }
  }

  /**
   * Delete the cache file if present.
   * @returns false when the file exists but could not be deleted
   */
  async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.filePath);
      this.logger.info?.(`Cleared session cache: ${this.filePath}`);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return true;
      }
      this.report(new SessionCacheError("Failed to clear session cache", this.filePath, toError(error)), "error");
      return false;
    }
  }

  private async remove(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        this.report(
          new SessionCacheError("Failed to remove corrupted session cache", this.filePath, toError(error)),
          "warn",
        );
      }
    }
  }

  private report(error: SessionCacheError, level: "warn" | "error"): void {
    const detail = error.cause ? `: ${error.cause.message}` : "";
    this.logger[level]?.(`${error.message} (${error.filePath})${detail}`);
  }
}

type ParseResult = { success: true; data: SessionFile } | { success: false; reason: string };

function parseSessionFile(raw: string): ParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { success: false, reason: toError(error).message };
  }

  const result = SessionFileSchema.safeParse(json);
  if (!result.success) {
    return { success: false, reason: result.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { success: true, data: result.data };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
