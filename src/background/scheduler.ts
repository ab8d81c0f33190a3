import type { Config } from '../core/config.js'
import { logger } from '../utils/logger.js'
import type { MemoryStore } from '../memory/store.js'

const log = logger.child('scheduler')

export type SchedulerConfig = Pick<Config, 'flushPolicy' | 'flushInterval' | 'decayRate' | 'compactionInterval'>

export class BackgroundScheduler {
  private flushTimer: ReturnType<typeof setInterval> | null = null
  private compactionTimer: ReturnType<typeof setInterval> | null = null
  private running = false

  constructor(
    private store: MemoryStore,
    private config: SchedulerConfig,
  ) {}

  start(): void {
    if (this.running) return
    this.running = true

    if (this.config.flushPolicy === 'batched' && this.config.flushInterval > 0) {
      this.flushTimer = setInterval(() => this.runFlush(), this.config.flushInterval)
      log.info(`Background flush scheduled every ${this.config.flushInterval / 1000}s`)
    }

    if (this.config.decayRate < 1 && this.config.compactionInterval > 0) {
      this.compactionTimer = setInterval(() => this.runCompaction(), this.config.compactionInterval)
      log.info(`Background compaction scheduled every ${this.config.compactionInterval / 1000}s`)
    }
  }

  /** Clears the timers and writes whatever is still pending. */
  stop(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer)
      this.flushTimer = null
    }
    if (this.compactionTimer) {
      clearInterval(this.compactionTimer)
      this.compactionTimer = null
    }
    if (this.running) this.runFlush()
    this.running = false
    log.info('Background scheduler stopped')
  }

  get isRunning(): boolean {
    return this.running
  }

  runFlush(): number {
    try {
      const written = this.store.flush()
      if (written > 0) log.debug(`Background: flushed ${written} events`)
      return written
    } catch (err) {
      log.error('Background flush failed', err)
      return 0
    }
  }

  runCompaction(): number {
    log.info('Background: running scheduled compaction')
    try {
      return this.store.compact().evicted
    } catch (err) {
      log.error('Background compaction failed', err)
      return 0
    }
  }
}
