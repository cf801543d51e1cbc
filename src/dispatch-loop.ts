/**
 * Dispatch Loop
 *
 * Runs a periodic job on a cron schedule, one cycle at a time. A trigger that
 * fires while a cycle is still running is skipped. The loop survives any
 * cycle's failure.
 */

import { CronJob } from 'cron'
import { describeError } from './errors'
import type { Logger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type CycleOutcome<T> =
  | { status: 'completed'; result: T }
  | { status: 'failed'; error: unknown }
  | { status: 'skipped' }

export type DispatchLoopOptions<T> = {
  name: string
  /** Six-field cron expression (with seconds) */
  cronTime: string
  timezone: string
  logger: Logger
  runCycle: () => Promise<T>
}

export interface DispatchLoop<T> {
  /** Schedules the job; a no-op when already started. */
  start(): void
  /** Unschedules the job and waits for the cycle in flight, if any. */
  stop(): Promise<void>
  /** Runs one cycle now unless one is already in flight. */
  tick(): Promise<CycleOutcome<T>>
  isStarted(): boolean
  isCycleRunning(): boolean
  /** Triggers dropped because a cycle was in flight or the loop was stopping */
  skippedTicks(): number
}

// ============================================================================
// Factory
// ============================================================================

export function createDispatchLoop<T>(options: DispatchLoopOptions<T>): DispatchLoop<T> {
  const { name, logger } = options
  let job: CronJob | null = null
  let inFlight: Promise<CycleOutcome<T>> | null = null
  let stopping = false
  let skipped = 0

  async function runGuarded(): Promise<CycleOutcome<T>> {
    try {
      return { status: 'completed', result: await options.runCycle() }
    } catch (error) {
      logger.error(`${name} cycle failed`, { error: describeError(error) })
      return { status: 'failed', error }
    }
  }

  async function tick(): Promise<CycleOutcome<T>> {
    if (stopping || inFlight) {
      skipped++
      logger.warn(`${name} trigger skipped`, { reason: stopping ? 'stopping' : 'cycle in flight' })
      return { status: 'skipped' }
    }
    const cycle = runGuarded()
    inFlight = cycle
    try {
      return await cycle
    } finally {
      inFlight = null
    }
  }

  return {
    start() {
      if (job) return
      job = CronJob.from({
        cronTime: options.cronTime,
        onTick: () => {
          void tick()
        },
        start: true,
        timeZone: options.timezone,
      })
      logger.info(`${name} started`, { cronTime: options.cronTime, timezone: options.timezone })
    },

    async stop() {
      if (!job && !inFlight) return
      stopping = true
      job?.stop()
      job = null
      try {
        if (inFlight) await inFlight
      } finally {
        stopping = false
      }
      logger.info(`${name} stopped`)
    },

    tick,

    isStarted: () => job !== null,
    isCycleRunning: () => inFlight !== null,
    skippedTicks: () => skipped,
  }
}
