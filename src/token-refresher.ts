import { ROTATING_COOKIE } from "./constants.js";
import type { CredentialStore } from "./credentials.js";
import { toErrorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { type ScheduledTask, type TaskRegistry, scheduleOnce } from "./task-registry.js";
import type { CookieJar } from "./types.js";

export type RotateCookie = (cookies: Readonly<CookieJar>) => Promise<string | null>;

export function refreshTaskKey(identity: string): string {
  return `refresh:${identity}`;
}

/**
 * Periodically rotates the short-lived session cookie of a credential, starting
 * right away. One refresher runs per credential identity; the first failure
 * stops it.
 */
export class TokenRefresher {
  readonly #registry: TaskRegistry;
  readonly #rotate: RotateCookie;

  constructor(registry: TaskRegistry, rotate: RotateCookie) {
    this.#registry = registry;
    this.#rotate = rotate;
  }

  isRunning(store: CredentialStore): boolean {
    return this.#registry.has(refreshTaskKey(store.identity));
  }

  start(store: CredentialStore, intervalMs: number): ScheduledTask {
    const key = refreshTaskKey(store.identity);
    const rotate = this.#rotate;
    const registry = this.#registry;
    let pending: ScheduledTask | null = null;
    let cancelled = false;

    const task: ScheduledTask = {
      cancel: () => {
        cancelled = true;
        pending?.cancel();
        pending = null;
      },
    };

    const tick = async (): Promise<void> => {
      try {
        const rotated = await rotate(store.cookies);
        if (cancelled) {
          return;
        }
        if (rotated) {
          store.updateCookie(ROTATING_COOKIE, rotated);
        }
        logger.debug("session cookie refreshed", { rotated: Boolean(rotated) });
        schedule(intervalMs);
      } catch (error) {
        logger.warn("cookie refresh failed; background refresh cancelled", { error: toErrorMessage(error) });
        registry.cancel(key, task);
      }
    };

    const schedule = (delayMs: number): void => {
      if (cancelled) {
        return;
      }
      pending = scheduleOnce(delayMs, () => {
        void tick();
      });
    };

    registry.startOrReplace(key, task);
    schedule(0);
    return task;
  }

  stop(store: CredentialStore): boolean {
    return this.#registry.cancel(refreshTaskKey(store.identity));
  }
}
