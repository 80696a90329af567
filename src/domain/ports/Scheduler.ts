import type { TimePoint } from "../typedefs.js";

/**
 * Infrastructure abstraction over time.
 *
 * The round loop suspends only through {@link Scheduler.sleep}. Implementations must resolve the
 * returned promise once the delay elapses, or early (without rejecting) when the given signal is
 * aborted, so callers can check the signal on wake and stop.
 */
export interface Scheduler {
  now(): TimePoint;
  sleep(delayMs: number, signal?: AbortSignal): Promise<void>;
}
