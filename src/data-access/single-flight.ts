/**
 * Single-flight registry: at most one in-flight computation per key.
 * Concurrent callers for a key share the first caller's promise.
 */

interface Flight<T> {
  locationId: string;
  promise: Promise<T>;
}

export class SingleFlight<T> {
  private flights = new Map<string, Flight<T>>();

  /**
   * Join the in-flight call for `key` or start one with `fn`.
   * The slot is released on every exit path, success or failure.
   */
  run(key: string, locationId: string, fn: () => Promise<T>): { promise: Promise<T>; shared: boolean } {
    const existing = this.flights.get(key);
    if (existing) {
      return { promise: existing.promise, shared: true };
    }

    const promise = Promise.resolve().then(fn);
    const flight: Flight<T> = { locationId, promise };
    this.flights.set(key, flight);

    const release = (): void => {
      if (this.flights.get(key) === flight) {
        this.flights.delete(key);
      }
    };
    promise.then(release, release);

    return { promise, shared: false };
  }

  /**
   * Forget in-flight calls for a location so later callers start a fresh one.
   * Callers already waiting keep their promise.
   */
  detachLocation(locationId: string): number {
    let detached = 0;
    for (const [key, flight] of this.flights) {
      if (flight.locationId === locationId) {
        this.flights.delete(key);
        detached++;
      }
    }
    return detached;
  }

  isInFlight(key: string): boolean {
    return this.flights.has(key);
  }

  get size(): number {
    return this.flights.size;
  }
}
