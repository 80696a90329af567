/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records pending sleeps and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). Between wake-ups it
 * lets the woken code run until it suspends again, so a whole round loop can be driven without
 * real time or fake timers.
 */
interface PendingSleep {
  readonly wakeAt: TimePoint;
  readonly resolve: () => void;
}

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly PendingSleep[];
}

export class InMemoryScheduler implements Scheduler {
  #state: SchedulerState;

  constructor(startAt: TimePoint = 0) {
    this.#state = { now: startAt, queue: [] };
  }

  now(): TimePoint {
    return this.#state.now;
  }

  get pending(): number {
    return this.#state.queue.length;
  }

  sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
    if (delayMs < 0) {
      return Promise.reject(new Error("Sleep delay must be non-negative"));
    }
    if (signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const entry: PendingSleep = { wakeAt: this.#state.now + delayMs, resolve };
      const insertAt = this.#state.queue.findIndex((existing) => existing.wakeAt > entry.wakeAt);
      const queue =
        insertAt === -1
          ? [...this.#state.queue, entry]
          : [
              ...this.#state.queue.slice(0, insertAt),
              entry,
              ...this.#state.queue.slice(insertAt),
            ];
      this.#state = { ...this.#state, queue };

      signal?.addEventListener(
        "abort",
        () => {
          this.#state = {
            ...this.#state,
            queue: this.#state.queue.filter((pending) => pending !== entry),
          };
          resolve();
        },
        { once: true },
      );
    });
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    await settle();

    for (;;) {
      const [next, ...remaining] = this.#state.queue;
      if (!next || next.wakeAt > targetTime) {
        break;
      }

      this.#state = { now: next.wakeAt, queue: remaining };
      next.resolve();
      await settle();
    }

    this.#state = { ...this.#state, now: targetTime };
  }
}

/** Lets every queued promise continuation run before returning. */
function settle(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}
