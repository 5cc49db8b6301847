import type { Clock } from "../../core/time/clock"
import type { Milliseconds } from "../../ports/time"

export const TEST_EPOCH_MS = Date.UTC(2025, 0, 1)

export class ManualTestClock implements Clock {
  public constructor(private nowMsValue: Milliseconds = TEST_EPOCH_MS) {}

  public nowMs(): Milliseconds {
    return this.nowMsValue
  }

  public now(): Date {
    return new Date(this.nowMsValue)
  }

  public advanceMs(ms: Milliseconds): void {
    this.nowMsValue += ms
  }

  public advanceSeconds(seconds: number): void {
    this.advanceMs(seconds * 1000)
  }
}
