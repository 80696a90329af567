/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */

/** Counts live connections per source address and refuses those above the ceiling. */
export class ConnectionLimiter {
  #counts: Map<string, number> = new Map();
  readonly #limit: number;

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error("Connection limit must be a positive integer");
    }
    this.#limit = limit;
  }

  tryAcquire(address: string): boolean {
    const current = this.#counts.get(address) ?? 0;
    if (current >= this.#limit) {
      return false;
    }
    this.#counts.set(address, current + 1);
    return true;
  }

  release(address: string): void {
    const remaining = (this.#counts.get(address) ?? 0) - 1;
    if (remaining <= 0) {
      this.#counts.delete(address);
      return;
    }
    this.#counts.set(address, remaining);
  }

  count(address: string): number {
    return this.#counts.get(address) ?? 0;
  }

  get trackedAddresses(): number {
    return this.#counts.size;
  }
}
