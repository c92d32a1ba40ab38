import { epochDateNow, toEpochDate, type EpochDate } from '@gridline/shared'

/**
 * Time source abstraction for consistent time access.
 * Supports both real-time and simulated time for backtesting.
 */
export interface TimeSource {
  /**
   * Get current time as EpochDate (milliseconds since Unix epoch)
   */
  nowEpoch(): EpochDate
}

/**
 * Real-time source for live trading
 */
export class RealTimeSource implements TimeSource {
  nowEpoch(): EpochDate {
    return epochDateNow()
  }
}

/**
 * Simulated time source for backtesting, driven by bar timestamps
 */
export class SimulatedTimeSource implements TimeSource {
  private currentTime: EpochDate

  constructor(startTime: EpochDate = epochDateNow()) {
    this.currentTime = startTime
  }

  nowEpoch(): EpochDate {
    return this.currentTime
  }

  /**
   * Advance time to specific date
   */
  advanceTo(date: EpochDate | Date): void {
    const ms = date instanceof Date ? toEpochDate(date) : date
    if (ms < this.currentTime) {
      throw new Error('Cannot move time backwards')
    }
    this.currentTime = ms
  }
}
