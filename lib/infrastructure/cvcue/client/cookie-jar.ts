/**
 * Minimal in-memory cookie jar for a single API host.
 *
 * Only name/value pairs are kept; attributes (Path, Expires, HttpOnly...) are
 * ignored because the API is always addressed through one base URL.
 */

export interface SessionCookie {
  name: string;
  value: string;
}

export const SESSION_COOKIE_NAME = "JSESSIONID";

export class CookieJar {
  private readonly cookies = new Map<string, string>();

  constructor(initial: readonly SessionCookie[] = []) {
    this.update(initial);
  }

  get size(): number {
    return this.cookies.size;
  }

  has(name: string): boolean {
    return this.cookies.has(name);
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  set(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  update(cookies: readonly SessionCookie[]): void {
    for (const { name, value } of cookies) {
      this.cookies.set(name, value);
    }
  }

  /**
   * Store every cookie from the response's Set-Cookie headers
   */
  updateFromResponse(headers: Headers): void {
    for (const line of headers.getSetCookie()) {
      const cookie = parseSetCookie(line);
      if (cookie) {
        this.cookies.set(cookie.name, cookie.value);
      }
    }
  }

  clear(): void {
    this.cookies.clear();
  }

  toArray(): SessionCookie[] {
    return Array.from(this.cookies, ([name, value]) => ({ name, value }));
  }

  /**
   * Value for the Cookie request header, or undefined when the jar is empty
   */
  toHeader(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join("; ");
  }
}

/**
 * Parse the name/value pair from one Set-Cookie header line
 */
export function parseSetCookie(line: string): SessionCookie | null {
  const pair = line.split(";", 1)[0] ?? "";
  const separator = pair.indexOf("=");
  if (separator <= 0) {
    return null;
  }

  const name = pair.slice(0, separator).trim();
  const value = pair.slice(separator + 1).trim();
  if (!name) {
    return null;
  }
  return { name, value };
}
