import { Inject, Injectable, Logger } from '@nestjs/common'
import {
  PLAN_GENERATOR,
  PlanGenerationError,
  type PlanGenerator,
} from '../plan-generator/plan-generator.types'
import { PLAN_JOB_STORE, type PlanJobStore } from './plan-job.store'
import { PlanJobScheduler } from './plan-job.scheduler'
import {
  COMPLETED_FALLBACK_MESSAGE,
  FAILED_FALLBACK_MESSAGE,
  type PlanJobOutcome,
  type PlanJobRecord,
} from './plan-job.types'

/**
 * Boundary between the job lifecycle and the generator. Every dispatched job
 * ends with one terminal write, whatever the generator does.
 */
@Injectable()
export class PlanJobRunner {
  private readonly logger = new Logger(PlanJobRunner.name)

  constructor(
    @Inject(PLAN_JOB_STORE) private readonly store: PlanJobStore,
    @Inject(PLAN_GENERATOR) private readonly generator: PlanGenerator,
    private readonly scheduler: PlanJobScheduler,
  ) {}

  dispatch(job: PlanJobRecord): void {
    this.scheduler.schedule(`plan:${job.jobKey}:${job.jobId}`, () => this.run(job))
  }

  /** Resolves to null when the job was expired or replaced before it started. */
  async run(job: PlanJobRecord): Promise<PlanJobOutcome | null> {
    if (!(await this.isCurrent(job))) {
      this.logger.warn(`Skipped job ${job.jobId} for "${job.jobKey}": no longer current`)
      return null
    }
    const outcome = await this.generate(job)
    await this.record(job, outcome)
    return outcome
  }

  private async isCurrent(job: PlanJobRecord): Promise<boolean> {
    const current = await this.store.get(job.jobKey)
    return current !== null && current.jobId === job.jobId && current.status === 'processing'
  }

  private async generate(job: PlanJobRecord): Promise<PlanJobOutcome> {
    try {
      const result = await this.generator.generate(
        { jobKey: job.jobKey, athleteName: job.athleteName, goals: job.goals },
        { isCurrent: () => this.isCurrent(job) },
      )
      const artifactRef = typeof result?.artifactRef === 'string' ? result.artifactRef.trim() : ''
      if (artifactRef.length === 0) {
        throw new PlanGenerationError('artifact', 'Generator finished without producing an artifact')
      }
      const summary = typeof result.summary === 'string' ? result.summary.trim() : ''
      return {
        status: 'completed',
        message: summary.length > 0 ? summary : COMPLETED_FALLBACK_MESSAGE,
        artifactRef,
      }
    } catch (err) {
      return { status: 'failed', message: describeFailure(err) }
    }
  }

  private async record(job: PlanJobRecord, outcome: PlanJobOutcome): Promise<void> {
    try {
      const result = await this.store.update(job.jobKey, job.jobId, outcome)
      if (result.ok) {
        if (outcome.status === 'completed') {
          this.logger.log(`Job ${job.jobId} for "${job.jobKey}" completed (${outcome.artifactRef})`)
        } else {
          this.logger.warn(`Job ${job.jobId} for "${job.jobKey}" failed: ${outcome.message}`)
        }
        return
      }
      this.logger.warn(
        `Discarded ${outcome.status} outcome of job ${job.jobId} for "${job.jobKey}": ${result.reason}`,
      )
    } catch (err) {
      // The store has already logged corruption; keep the runner alive.
      this.logger.error(`Could not record outcome of job ${job.jobId}: ${String(err)}`)
    }
  }
}

export function describeFailure(err: unknown): string {
  const text = err instanceof Error ? err.message.trim() : typeof err === 'string' ? err.trim() : ''
  const message = text.length > 0 ? text : FAILED_FALLBACK_MESSAGE
  if (err instanceof PlanGenerationError) {
    return `${STAGE_LABELS[err.stage]}: ${message}`
  }
  return message
}

const STAGE_LABELS: Record<PlanGenerationError['stage'], string> = {
  activity: 'Activity data unavailable',
  drafting: 'Plan drafting failed',
  artifact: 'Spreadsheet export failed',
}
