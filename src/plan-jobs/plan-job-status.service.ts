import { Inject, Injectable } from '@nestjs/common'
import { deriveJobKey } from './job-key'
import { PLAN_JOB_STORE, type PlanJobStore } from './plan-job.store'
import { NOT_FOUND_MESSAGE, type PlanJobRecord, type PlanJobStatusView } from './plan-job.types'

@Injectable()
export class PlanJobStatusService {
  constructor(@Inject(PLAN_JOB_STORE) private readonly store: PlanJobStore) {}

  async getStatus(athleteName: string): Promise<PlanJobStatusView> {
    return toStatusView(await this.findRecord(athleteName))
  }

  async findRecord(athleteName: string): Promise<PlanJobRecord | null> {
    const jobKey = deriveJobKey(athleteName)
    if (!jobKey) return null
    return this.store.get(jobKey)
  }
}

export function toStatusView(record: PlanJobRecord | null): PlanJobStatusView {
  if (!record) {
    return { status: 'not_found', message: NOT_FOUND_MESSAGE, artifactAvailable: false }
  }
  return {
    status: record.status,
    message: record.message,
    artifactAvailable: record.status === 'completed',
  }
}
