import type {
  CreatePlanJobResult,
  NewPlanJob,
  PlanJobOutcome,
  PlanJobRecord,
  UpdatePlanJobResult,
} from './plan-job.types'

export const PLAN_JOB_STORE = Symbol('PLAN_JOB_STORE')

/**
 * Registry of plan jobs keyed by JobKey. Returned records are immutable
 * snapshots; a store replaces a record wholesale on every write.
 */
export interface PlanJobStore {
  /** Fails with `already_exists` while the key's current record is processing. */
  create(job: NewPlanJob): Promise<CreatePlanJobResult>

  get(jobKey: string): Promise<PlanJobRecord | null>

  /**
   * Moves the job identified by `jobKey` + `jobId` to a terminal state.
   * Throws StoreCorruptionError when the record is already terminal.
   */
  update(jobKey: string, jobId: string, outcome: PlanJobOutcome): Promise<UpdatePlanJobResult>

  /**
   * Fails a processing job that has been running for too long. A job that is
   * already terminal is left alone (`already_terminal`).
   */
  markStale(jobKey: string, jobId: string, message: string): Promise<UpdatePlanJobResult>

  /** Removes a terminal record. Processing records are never evicted. */
  evict(jobKey: string, jobId: string): Promise<boolean>

  list(): Promise<PlanJobRecord[]>
}
