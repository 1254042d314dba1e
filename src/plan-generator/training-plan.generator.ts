import { Injectable, Logger } from '@nestjs/common'
import { PlanArtifactStorage } from '../plan-artifacts/plan-artifact.storage'
import { ActivityService } from './activity.service'
import { PlanWorkbookWriter } from './plan-workbook.writer'
import {
  PlanGenerationError,
  type PlanGenerationGuard,
  type PlanGenerationInput,
  type PlanGenerationResult,
  type PlanGenerator,
  type PlanGenerationStage,
} from './plan-generator.types'
import { TrainingWeekService } from './training-week.service'

/**
 * Activity history -> drafted week -> spreadsheet. The artifact lands at the
 * location derived from the job key, overwriting a previous plan for the
 * same athlete unless the job has been expired or replaced meanwhile.
 */
@Injectable()
export class TrainingPlanGenerator implements PlanGenerator {
  private readonly logger = new Logger(TrainingPlanGenerator.name)

  constructor(
    private readonly activityService: ActivityService,
    private readonly trainingWeekService: TrainingWeekService,
    private readonly workbookWriter: PlanWorkbookWriter,
    private readonly storage: PlanArtifactStorage,
  ) {}

  async generate(
    { jobKey, athleteName, goals }: PlanGenerationInput,
    guard: PlanGenerationGuard,
  ): Promise<PlanGenerationResult> {
    const activity = await stage('activity', () => this.activityService.getSummary())
    const week = await stage('drafting', () =>
      this.trainingWeekService.draft({ athleteName, goals, activity }),
    )
    await stage('artifact', async () => {
      // The file location is shared by every job of the key.
      if (!(await guard.isCurrent())) {
        throw new PlanGenerationError('artifact', 'Job is no longer current; plan not written')
      }
      await this.workbookWriter.write(this.storage.pathFor(jobKey), { athleteName, goals, week })
    })

    this.logger.log(`Drafted ${week.provider} plan for "${jobKey}" starting ${week.weekStartDate}`)
    return { summary: week.summary, artifactRef: this.storage.fileNameFor(jobKey) }
  }
}

async function stage<T>(name: PlanGenerationStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (err instanceof PlanGenerationError) throw err
    const detail = err instanceof Error ? err.message : String(err)
    throw new PlanGenerationError(name, detail, { cause: err })
  }
}
