import type { ReadStream } from 'fs'
import { Injectable, Logger } from '@nestjs/common'
import {
  PlanArtifactStorage,
  XLSX_CONTENT_TYPE,
  type StoredArtifact,
} from '../plan-artifacts/plan-artifact.storage'
import { PlanJobStatusService, toStatusView } from './plan-job-status.service'
import type { PlanJobStatusView } from './plan-job.types'

export type ResolvedArtifact = {
  fileName: string
  absolutePath: string
  sizeBytes: number
  contentType: string
  open(): ReadStream
}

export type ArtifactResolution =
  | { ok: true; artifact: ResolvedArtifact }
  | {
      ok: false
      error: 'not_found' | 'not_ready' | 'artifact_missing'
      status: PlanJobStatusView
    }

@Injectable()
export class PlanArtifactResolver {
  private readonly logger = new Logger(PlanArtifactResolver.name)

  constructor(
    private readonly statusService: PlanJobStatusService,
    private readonly storage: PlanArtifactStorage,
  ) {}

  async resolve(athleteName: string): Promise<ArtifactResolution> {
    const record = await this.statusService.findRecord(athleteName)
    const status = toStatusView(record)

    if (!record) return { ok: false, error: 'not_found', status }
    if (record.status !== 'completed' || !record.artifactRef) {
      return { ok: false, error: 'not_ready', status }
    }

    let stored: StoredArtifact | null
    try {
      stored = await this.storage.find(record.artifactRef)
    } catch (err) {
      this.logger.error(`Artifact ${record.artifactRef} of job ${record.jobId} unreadable: ${String(err)}`)
      stored = null
    }

    if (!stored) {
      this.logger.warn(`Artifact ${record.artifactRef} of completed job ${record.jobId} is missing`)
      return { ok: false, error: 'artifact_missing', status }
    }

    const artifact = stored
    return {
      ok: true,
      artifact: {
        ...artifact,
        contentType: XLSX_CONTENT_TYPE,
        open: () => this.storage.open(artifact),
      },
    }
  }
}
