import {
  ACCESS_TOKEN_PATTERN,
  ENDPOINTS,
  GEMINI_HEADERS,
  ROTATE_COOKIES_BODY,
  ROTATE_COOKIES_HEADERS,
  ROTATING_COOKIE,
  SESSION_COOKIE,
} from "./constants.js";
import { AuthError } from "./errors.js";
import { logger } from "./logger.js";
import type { Transport } from "./transport.js";
import type { CookieJar } from "./types.js";

export type Credential = {
  readonly cookies: Readonly<CookieJar>;
  readonly accessToken: string;
  readonly issuedAt: Date;
};

/**
 * Holds the cookie jar and access token as one value. Writers replace the whole
 * pair, so a reader's snapshot can never mix an old token with new cookies.
 */
export class CredentialStore {
  #seed: CookieJar;
  #current: Credential | null = null;

  constructor(seedCookies: CookieJar) {
    if (!seedCookies[SESSION_COOKIE]) {
      throw new Error(`${SESSION_COOKIE}_cookie_required`);
    }
    this.#seed = { ...seedCookies };
  }

  /** Stable key for this account; background tasks are registered under it. */
  get identity(): string {
    return this.cookies[SESSION_COOKIE] ?? "";
  }

  /** Latest cookies, usable before the first handshake. */
  get cookies(): Readonly<CookieJar> {
    return this.#current?.cookies ?? this.#seed;
  }

  get hasCredential(): boolean {
    return this.#current !== null;
  }

  read(): Credential {
    if (!this.#current) {
      throw new AuthError("credential_not_acquired");
    }
    return this.#current;
  }

  replace(credential: Credential): void {
    this.#current = Object.freeze({
      cookies: Object.freeze({ ...credential.cookies }),
      accessToken: credential.accessToken,
      issuedAt: credential.issuedAt,
    });
    this.#seed = { ...credential.cookies };
  }

  /** Swaps one cookie, keeping it paired with the token it was issued beside. */
  updateCookie(name: string, value: string): void {
    const cookies = { ...this.cookies, [name]: value };
    if (this.#current) {
      this.replace({ ...this.#current, cookies });
      return;
    }
    this.#seed = cookies;
  }
}

/**
 * Derives the access token from seed cookies: picks up the auxiliary cookies
 * google.com hands out, then reads the token from the app page.
 */
export async function acquireCredential(
  transport: Transport,
  seedCookies: Readonly<CookieJar>,
  timeoutMs?: number,
): Promise<Credential> {
  const extra = await transport.request({ method: "GET", url: ENDPOINTS.google, timeoutMs });
  const cookies: CookieJar = { ...extra.setCookies, ...seedCookies };

  const page = await transport.request({
    method: "GET",
    url: ENDPOINTS.init,
    headers: GEMINI_HEADERS,
    cookies,
    timeoutMs,
  });
  if (page.status !== 200) {
    throw new AuthError(`access_token_request_failed_${page.status}: check that the session cookies are valid`);
  }

  const accessToken = ACCESS_TOKEN_PATTERN.exec(page.text)?.[1];
  if (!accessToken) {
    throw new AuthError("access_token_not_found: cookies were rejected or have expired");
  }

  return {
    cookies: { ...cookies, ...page.setCookies },
    accessToken,
    issuedAt: new Date(),
  };
}

/** Asks the account service for a fresh rotating cookie; `null` when none was issued. */
export async function rotateSessionCookie(
  transport: Transport,
  cookies: Readonly<CookieJar>,
  timeoutMs?: number,
): Promise<string | null> {
  const response = await transport.request({
    method: "POST",
    url: ENDPOINTS.rotateCookies,
    headers: ROTATE_COOKIES_HEADERS,
    cookies,
    body: ROTATE_COOKIES_BODY,
    timeoutMs,
  });

  if (response.status === 401) {
    throw new AuthError("cookie_rotation_unauthorized");
  }
  if (response.status < 200 || response.status >= 300) {
    throw new AuthError(`cookie_rotation_failed_${response.status}`);
  }

  const rotated = response.setCookies[ROTATING_COOKIE] ?? null;
  logger.debug("cookie rotation finished", { rotated: rotated !== null });
  return rotated;
}
