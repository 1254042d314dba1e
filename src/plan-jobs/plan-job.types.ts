export type PlanJobStatus = 'processing' | 'completed' | 'failed'

export type PlanJobRecord = {
  jobId: string
  jobKey: string
  athleteName: string
  goals: string | null
  status: PlanJobStatus
  message: string
  artifactRef: string | null
  createdAtIso: string
  updatedAtIso: string
  expiredAtIso: string | null
}

export type NewPlanJob = {
  jobKey: string
  athleteName: string
  goals: string | null
}

export type PlanJobOutcome =
  | { status: 'completed'; message: string; artifactRef: string }
  | { status: 'failed'; message: string }

export type CreatePlanJobResult =
  | { ok: true; record: PlanJobRecord; replaced: PlanJobRecord | null }
  | { ok: false; reason: 'already_exists'; record: PlanJobRecord }

export type UpdatePlanJobResult =
  | { ok: true; record: PlanJobRecord }
  | { ok: false; reason: 'not_found' | 'superseded' | 'expired' | 'already_terminal' }

export type PlanJobStatusView = {
  status: PlanJobStatus | 'not_found'
  message: string
  artifactAvailable: boolean
}

export type SubmissionResult =
  | { accepted: true; jobKey: string; jobId: string; message: string }
  | {
      accepted: false
      reason: 'invalid_athlete_name' | 'already_in_progress'
      message: string
    }

export const PROCESSING_MESSAGE = 'Training plan is still being generated'
export const COMPLETED_FALLBACK_MESSAGE = 'Training plan generated successfully'
export const FAILED_FALLBACK_MESSAGE = 'Unknown error occurred'
export const NOT_FOUND_MESSAGE = 'no plan requested'
export const ALREADY_IN_PROGRESS_MESSAGE = 'already in progress'
export const SUBMISSION_ACCEPTED_MESSAGE =
  'Training plan generation started. Please check the status endpoint for updates.'

export function isTerminal(status: PlanJobStatus): boolean {
  return status === 'completed' || status === 'failed'
}
