export interface ScheduledTask {
  cancel(): void;
}

/** Runs `run` once after `delayMs`. The timer never keeps the process alive. */
export function scheduleOnce(delayMs: number, run: () => void): ScheduledTask {
  const timer = setTimeout(run, delayMs);
  timer.unref();
  return {
    cancel: () => clearTimeout(timer),
  };
}

/**
 * Background tasks owned by one client, at most one per identity. Starting a
 * task under a taken identity cancels the previous holder first.
 */
export class TaskRegistry {
  readonly #tasks = new Map<string, ScheduledTask>();

  startOrReplace(identity: string, task: ScheduledTask): void {
    this.#tasks.get(identity)?.cancel();
    this.#tasks.set(identity, task);
  }

  /**
   * Cancels the task under `identity`. With `only`, nothing happens unless that
   * exact task still holds the slot, so a stale task cannot cancel its successor.
   */
  cancel(identity: string, only?: ScheduledTask): boolean {
    const task = this.#tasks.get(identity);
    if (!task || (only && task !== only)) {
      return false;
    }

    task.cancel();
    this.#tasks.delete(identity);
    return true;
  }

  has(identity: string): boolean {
    return this.#tasks.has(identity);
  }

  get size(): number {
    return this.#tasks.size;
  }

  cancelAll(): void {
    for (const task of this.#tasks.values()) {
      task.cancel();
    }
    this.#tasks.clear();
  }
}
