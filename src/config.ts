import { readFileSync } from "node:fs";

import { ROTATING_COOKIE, SESSION_COOKIE } from "./constants.js";
import type { CookieJar } from "./types.js";

export type LifecycleSettings = {
  timeoutMs: number;
  autoClose: boolean;
  closeDelayMs: number;
  autoRefresh: boolean;
  refreshIntervalMs: number;
};

export type ClientConfigOptions = Partial<LifecycleSettings> & {
  secure1psid?: string;
  secure1psidts?: string;
  /** Extra cookies sent alongside the session pair. */
  cookies?: CookieJar;
  imageScanLimit?: number;
  retryDelayMs?: number;
};

export type ClientConfig = LifecycleSettings & {
  cookies: CookieJar;
  imageScanLimit: number;
  retryDelayMs: number;
};

type Env = Record<string, string | undefined>;

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_AUTO_CLOSE = false;
const DEFAULT_CLOSE_DELAY_MS = 300000;
const DEFAULT_AUTO_REFRESH = true;
const DEFAULT_REFRESH_INTERVAL_MS = 540000;
const DEFAULT_IMAGE_SCAN_LIMIT = 64;
const DEFAULT_RETRY_DELAY_MS = 1000;

export function readSecretFromFile(filePath: string): string {
  const path = filePath.trim();
  if (!path) {
    return "";
  }

  try {
    return readFileSync(path, "utf8").trim();
  } catch {
    return "";
  }
}

export function parseOptionalBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return undefined;
}

export function parsePositiveNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim();
  if (!normalized) {
    return undefined;
  }

  const parsed = Number(normalized);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return undefined;
  }

  return parsed;
}

function parseNonNegativeInteger(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim();
  if (!normalized) {
    return undefined;
  }

  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed < 0) {
    return undefined;
  }

  return parsed;
}

export type CliFlags = {
  values: Map<string, string>;
  switches: Set<string>;
};

/** `--name=value`, `--name value`, or a bare `--name` switch. */
export function parseCliFlags(args: readonly string[]): CliFlags {
  const flags: CliFlags = { values: new Map(), switches: new Set() };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? "";
    if (!arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    if (separator > 0) {
      flags.values.set(arg.slice(0, separator), arg.slice(separator + 1).trim());
      continue;
    }

    const next = args[index + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags.values.set(arg, next.trim());
      index += 1;
    } else {
      flags.switches.add(arg);
    }
  }

  return flags;
}

/** Option, then environment, then default. */
export function resolveClientConfig(options: ClientConfigOptions = {}, env: Env = process.env): ClientConfig {
  const psidFromEnv = String(options.secure1psid ?? env.GEMINI_SECURE_1PSID ?? "").trim();
  const psid = psidFromEnv || readSecretFromFile(String(env.GEMINI_SECURE_1PSID_FILE ?? ""));
  if (!psid) {
    throw new Error(
      `GEMINI_SECURE_1PSID is required (value of the ${SESSION_COOKIE} cookie) or set GEMINI_SECURE_1PSID_FILE`,
    );
  }

  const cookies: CookieJar = { ...options.cookies, [SESSION_COOKIE]: psid };
  const psidts = String(options.secure1psidts ?? env.GEMINI_SECURE_1PSIDTS ?? "").trim();
  if (psidts) {
    cookies[ROTATING_COOKIE] = psidts;
  }

  return {
    cookies,
    timeoutMs: options.timeoutMs ?? parsePositiveNumber(env.GEMINI_TIMEOUT_MS) ?? DEFAULT_TIMEOUT_MS,
    autoClose: options.autoClose ?? parseOptionalBoolean(env.GEMINI_AUTO_CLOSE) ?? DEFAULT_AUTO_CLOSE,
    closeDelayMs: options.closeDelayMs ?? parsePositiveNumber(env.GEMINI_CLOSE_DELAY_MS) ?? DEFAULT_CLOSE_DELAY_MS,
    autoRefresh: options.autoRefresh ?? parseOptionalBoolean(env.GEMINI_AUTO_REFRESH) ?? DEFAULT_AUTO_REFRESH,
    refreshIntervalMs:
      options.refreshIntervalMs ?? parsePositiveNumber(env.GEMINI_REFRESH_INTERVAL_MS) ?? DEFAULT_REFRESH_INTERVAL_MS,
    imageScanLimit:
      options.imageScanLimit ?? parsePositiveNumber(env.GEMINI_IMAGE_SCAN_LIMIT) ?? DEFAULT_IMAGE_SCAN_LIMIT,
    retryDelayMs: options.retryDelayMs ?? parseNonNegativeInteger(env.GEMINI_RETRY_DELAY_MS) ?? DEFAULT_RETRY_DELAY_MS,
  };
}
