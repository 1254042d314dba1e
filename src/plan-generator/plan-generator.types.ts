export const PLAN_GENERATOR = Symbol('PLAN_GENERATOR')

export type PlanGenerationInput = {
  jobKey: string
  athleteName: string
  goals: string | null
}

export type PlanGenerationResult = {
  /** Human-readable description of the plan, shown to the client on completion. */
  summary: string
  /** File name of the artifact inside the artifact directory. */
  artifactRef: string
}

/** Tells a running generation whether its job is still the current one for the key. */
export interface PlanGenerationGuard {
  isCurrent(): Promise<boolean>
}

export interface PlanGenerator {
  generate(input: PlanGenerationInput, guard: PlanGenerationGuard): Promise<PlanGenerationResult>
}

export type PlanGenerationStage = 'activity' | 'drafting' | 'artifact'

export class PlanGenerationError extends Error {
  constructor(
    readonly stage: PlanGenerationStage,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'PlanGenerationError'
  }
}
