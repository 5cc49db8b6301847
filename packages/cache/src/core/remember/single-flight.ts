/**
 * Collapses concurrent calls for the same key onto one in-flight promise.
 *
 * Callers that arrive while a flight is running share its outcome, including
 * its rejection. The key is released once the flight settles, so the next call
 * starts fresh.
 */
export class SingleFlight<T> {
  private readonly flights = new Map<string, Promise<T>>()

  async run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.flights.get(key)

    if (existing) return existing

    const flight = fn()
    this.flights.set(key, flight)

    try {
      return await flight
    } finally {
      if (this.flights.get(key) === flight) {
        this.flights.delete(key)
      }
    }
  }

  get size(): number {
    return this.flights.size
  }
}
