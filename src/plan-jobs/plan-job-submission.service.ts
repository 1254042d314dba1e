import { Inject, Injectable, Logger } from '@nestjs/common'
import { deriveJobKey, normalizeAthleteName } from './job-key'
import { PLAN_JOB_STORE, type PlanJobStore } from './plan-job.store'
import { PlanJobRunner } from './plan-job.runner'
import {
  ALREADY_IN_PROGRESS_MESSAGE,
  SUBMISSION_ACCEPTED_MESSAGE,
  type SubmissionResult,
} from './plan-job.types'

@Injectable()
export class PlanJobSubmissionService {
  private readonly logger = new Logger(PlanJobSubmissionService.name)

  constructor(
    @Inject(PLAN_JOB_STORE) private readonly store: PlanJobStore,
    private readonly runner: PlanJobRunner,
  ) {}

  async submit(athleteName: string, goals?: string | null): Promise<SubmissionResult> {
    const jobKey = deriveJobKey(athleteName)
    if (!jobKey) {
      return {
        accepted: false,
        reason: 'invalid_athlete_name',
        message: 'athleteName must not be empty',
      }
    }

    const created = await this.store.create({
      jobKey,
      athleteName: normalizeAthleteName(athleteName),
      goals: goals && goals.trim().length > 0 ? goals : null,
    })

    if (!created.ok) {
      this.logger.log(`Rejected submission for "${jobKey}": job ${created.record.jobId} in progress`)
      return { accepted: false, reason: 'already_in_progress', message: ALREADY_IN_PROGRESS_MESSAGE }
    }

    if (created.replaced) {
      this.logger.log(
        `Resubmission for "${jobKey}" replaces ${created.replaced.status} job ${created.replaced.jobId}`,
      )
    }

    this.runner.dispatch(created.record)
    this.logger.log(`Accepted job ${created.record.jobId} for "${jobKey}"`)

    return {
      accepted: true,
      jobKey,
      jobId: created.record.jobId,
      message: SUBMISSION_ACCEPTED_MESSAGE,
    }
  }
}
