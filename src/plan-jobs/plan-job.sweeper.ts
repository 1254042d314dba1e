import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { CLOCK, type Clock } from '../clock/clock'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { PLAN_JOB_STORE, type PlanJobStore } from './plan-job.store'
import { isTerminal } from './plan-job.types'

export type SweepReport = {
  expired: string[]
  evicted: string[]
}

/**
 * Optional housekeeping, off unless a threshold is configured:
 * - stale expiry fails processing jobs older than `staleAfterMs`
 * - retention evicts terminal jobs not updated for `retentionMs`
 */
@Injectable()
export class PlanJobSweeper implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PlanJobSweeper.name)
  private timer: NodeJS.Timeout | null = null

  constructor(
    @Inject(PLAN_JOB_STORE) private readonly store: PlanJobStore,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  get enabled(): boolean {
    const { staleAfterMs, retentionMs } = this.config.planJobs
    return staleAfterMs > 0 || retentionMs > 0
  }

  onModuleInit(): void {
    if (!this.enabled) return
    const { sweepIntervalMs, staleAfterMs, retentionMs } = this.config.planJobs
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        this.logger.error(`Sweep failed: ${String(err)}`)
      })
    }, sweepIntervalMs)
    this.timer.unref()
    this.logger.log(
      `Sweeping every ${sweepIntervalMs} ms (staleAfterMs=${staleAfterMs}, retentionMs=${retentionMs})`,
    )
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  async sweep(): Promise<SweepReport> {
    const { staleAfterMs, retentionMs } = this.config.planJobs
    const nowMs = this.clock.now().getTime()
    const report: SweepReport = { expired: [], evicted: [] }

    for (const record of await this.store.list()) {
      if (!isTerminal(record.status)) {
        if (staleAfterMs <= 0) continue
        if (nowMs - Date.parse(record.createdAtIso) < staleAfterMs) continue
        const result = await this.store.markStale(
          record.jobKey,
          record.jobId,
          `Training plan generation timed out after ${staleAfterMs} ms`,
        )
        if (result.ok) report.expired.push(record.jobKey)
        continue
      }

      if (retentionMs <= 0) continue
      if (nowMs - Date.parse(record.updatedAtIso) < retentionMs) continue
      if (await this.store.evict(record.jobKey, record.jobId)) {
        report.evicted.push(record.jobKey)
      }
    }

    if (report.expired.length > 0 || report.evicted.length > 0) {
      this.logger.log(`Sweep expired=${report.expired.length} evicted=${report.evicted.length}`)
    }
    return report
  }
}
