import { Inject, Injectable, Logger } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from '../config/app-config'

type PendingTask = {
  label: string
  run: () => Promise<unknown>
}

/**
 * FIFO executor for background plan work. At most `concurrency` tasks run at
 * once; the rest wait in submission order.
 */
@Injectable()
export class PlanJobScheduler {
  private readonly logger = new Logger(PlanJobScheduler.name)
  private readonly concurrency: number
  private readonly pending: PendingTask[] = []
  private running = 0
  private drainResolvers: Array<() => void> = []

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.concurrency = Math.max(1, Math.floor(config.planJobs.concurrency))
  }

  getPendingCount(): number {
    return this.pending.length
  }

  getRunningCount(): number {
    return this.running
  }

  /** Queues `run`; never throws and never waits for the task. */
  schedule(label: string, run: () => Promise<unknown>): void {
    this.pending.push({ label, run })
    this.pump()
  }

  /** Resolves once nothing is queued or running. */
  async drain(): Promise<void> {
    if (this.pending.length === 0 && this.running === 0) return
    await new Promise<void>((resolve) => {
      this.drainResolvers.push(resolve)
    })
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const task = this.pending.shift()
      if (!task) return
      this.running += 1
      void Promise.resolve()
        .then(task.run)
        .catch((err: unknown) => {
          this.logger.error(`Background task "${task.label}" rejected: ${String(err)}`)
        })
        .finally(() => {
          this.running -= 1
          if (this.pending.length === 0 && this.running === 0) {
            const resolvers = this.drainResolvers
            this.drainResolvers = []
            for (const resolve of resolvers) resolve()
          } else {
            this.pump()
          }
        })
    }
  }
}
