import type { Logger, Scheduler, TimePoint } from "../core.js";

interface RealSchedulerOptions {
  readonly now?: () => TimePoint;
  readonly logger?: Logger;
}

export class RealScheduler implements Scheduler {
  readonly #now: () => TimePoint;
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions = {}) {
    this.#now = options.now ?? Date.now;
    this.#logger = options.logger;
  }

  now(): TimePoint {
    return this.#now();
  }

  sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
    if (delayMs < 0) {
      return Promise.reject(new Error("Sleep delay must be non-negative"));
    }
    if (signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        this.#logger?.debug?.("Sleep interrupted", { delayMs });
        resolve();
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, delayMs);

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
