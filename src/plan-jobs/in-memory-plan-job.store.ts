import { randomUUID } from 'crypto'
import { Inject, Injectable, Logger } from '@nestjs/common'
import { CLOCK, type Clock } from '../clock/clock'
import { StoreCorruptionError } from './plan-job.errors'
import type { PlanJobStore } from './plan-job.store'
import {
  isTerminal,
  PROCESSING_MESSAGE,
  type CreatePlanJobResult,
  type NewPlanJob,
  type PlanJobOutcome,
  type PlanJobRecord,
  type UpdatePlanJobResult,
} from './plan-job.types'

/**
 * Process-local store. Every method does its check-and-set before the first
 * await point, so two callers racing on one key are serialised by the event
 * loop and exactly one create wins.
 */
@Injectable()
export class InMemoryPlanJobStore implements PlanJobStore {
  private readonly logger = new Logger(InMemoryPlanJobStore.name)
  private readonly records = new Map<string, PlanJobRecord>()

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  async create(job: NewPlanJob): Promise<CreatePlanJobResult> {
    const existing = this.records.get(job.jobKey) ?? null
    if (existing && !isTerminal(existing.status)) {
      return { ok: false, reason: 'already_exists', record: existing }
    }

    const nowIso = this.clock.now().toISOString()
    const record = freeze({
      jobId: randomUUID(),
      jobKey: job.jobKey,
      athleteName: job.athleteName,
      goals: job.goals,
      status: 'processing',
      message: PROCESSING_MESSAGE,
      artifactRef: null,
      createdAtIso: nowIso,
      updatedAtIso: nowIso,
      expiredAtIso: null,
    })
    this.records.set(job.jobKey, record)
    return { ok: true, record, replaced: existing }
  }

  async get(jobKey: string): Promise<PlanJobRecord | null> {
    return this.records.get(jobKey) ?? null
  }

  async update(jobKey: string, jobId: string, outcome: PlanJobOutcome): Promise<UpdatePlanJobResult> {
    const current = this.records.get(jobKey)
    if (!current) return { ok: false, reason: 'not_found' }
    if (current.jobId !== jobId) return { ok: false, reason: 'superseded' }
    if (current.expiredAtIso !== null) return { ok: false, reason: 'expired' }

    if (isTerminal(current.status)) {
      throw this.corruption(
        `update of terminal job (status=${current.status}, attempted=${outcome.status})`,
        current,
      )
    }
    if (outcome.message.trim().length === 0) {
      throw this.corruption(`empty message for ${outcome.status} outcome`, current)
    }
    if (outcome.status === 'completed' && outcome.artifactRef.trim().length === 0) {
      throw this.corruption('completed outcome without artifact reference', current)
    }

    const record = freeze({
      ...current,
      status: outcome.status,
      message: outcome.message,
      artifactRef: outcome.status === 'completed' ? outcome.artifactRef : null,
      updatedAtIso: this.clock.now().toISOString(),
    })
    this.records.set(jobKey, record)
    return { ok: true, record }
  }

  async markStale(jobKey: string, jobId: string, message: string): Promise<UpdatePlanJobResult> {
    const current = this.records.get(jobKey)
    if (!current) return { ok: false, reason: 'not_found' }
    if (current.jobId !== jobId) return { ok: false, reason: 'superseded' }
    if (current.expiredAtIso !== null) return { ok: false, reason: 'expired' }
    // The job may have finished between the sweeper's list() and this call.
    if (isTerminal(current.status)) return { ok: false, reason: 'already_terminal' }

    const nowIso = this.clock.now().toISOString()
    const record = freeze({
      ...current,
      status: 'failed',
      message,
      artifactRef: null,
      updatedAtIso: nowIso,
      expiredAtIso: nowIso,
    })
    this.records.set(jobKey, record)
    return { ok: true, record }
  }

  async evict(jobKey: string, jobId: string): Promise<boolean> {
    const current = this.records.get(jobKey)
    if (!current || current.jobId !== jobId || !isTerminal(current.status)) return false
    return this.records.delete(jobKey)
  }

  async list(): Promise<PlanJobRecord[]> {
    return [...this.records.values()]
  }

  private corruption(detail: string, record: PlanJobRecord): StoreCorruptionError {
    const err = new StoreCorruptionError(
      `Store corruption for job ${record.jobId} (key="${record.jobKey}"): ${detail}`,
      record.jobKey,
      record.jobId,
    )
    this.logger.error(err.message)
    return err
  }
}

function freeze(record: PlanJobRecord): PlanJobRecord {
  return Object.freeze(record)
}
