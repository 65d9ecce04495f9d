import { APIError, ClientError, ImageGenerationError } from "./errors.js";
import { logger } from "./logger.js";

/** What the invoker needs from the client: a readiness flag and a way to get ready. */
export interface ReadinessTarget {
  readonly running: boolean;
  init(): Promise<void>;
}

export type CallDescriptor<T> = {
  name: string;
  run: () => Promise<T>;
  /** Retries allowed after the first attempt. */
  retry: number;
  /** Narrows the remaining budget for a given failure; defaults to `capRetries`. */
  budgetFor?: (error: ClientError, remaining: number) => number;
};

export type RetryingInvokerOptions = {
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_RETRY_DELAY_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Image generation is slow enough that a second retry is never worth it. */
export function capRetries(error: ClientError, remaining: number): number {
  if (error instanceof ImageGenerationError) {
    return Math.min(1, remaining);
  }
  return remaining;
}

/**
 * Runs a call against a client that may need (re-)initialising first, retrying
 * classified failures within the call's budget. Initialisation failures and
 * unclassified errors are never retried.
 */
export class RetryingInvoker {
  readonly #target: ReadinessTarget;
  readonly #delayMs: number;
  readonly #sleep: (ms: number) => Promise<void>;

  constructor(target: ReadinessTarget, options: RetryingInvokerOptions = {}) {
    this.#target = target;
    this.#delayMs = options.delayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.#sleep = options.sleep ?? sleep;
  }

  async #ensureReady(name: string): Promise<void> {
    if (this.#target.running) {
      return;
    }

    await this.#target.init();
    if (!this.#target.running) {
      throw new APIError(`invalid_call_${name}: client initialization failed`);
    }
  }

  async invoke<T>(call: CallDescriptor<T>): Promise<T> {
    const budgetFor = call.budgetFor ?? capRetries;
    let remaining = Math.max(0, Math.floor(call.retry));

    for (let attempt = 1; ; attempt += 1) {
      await this.#ensureReady(call.name);

      try {
        return await call.run();
      } catch (error) {
        if (!(error instanceof ClientError)) {
          throw error;
        }

        remaining = budgetFor(error, remaining);
        if (remaining <= 0) {
          throw error;
        }

        remaining -= 1;
        logger.debug("retrying call", { call: call.name, attempt, remaining, error: error.message });
        await this.#sleep(this.#delayMs);
      }
    }
  }
}
