import { Module } from '@nestjs/common'
import { PlanArtifactsModule } from '../plan-artifacts/plan-artifacts.module'
import { PlanGeneratorModule } from '../plan-generator/plan-generator.module'
import { InMemoryPlanJobStore } from './in-memory-plan-job.store'
import { PlanArtifactResolver } from './plan-artifact.resolver'
import { PlanJobRunner } from './plan-job.runner'
import { PlanJobScheduler } from './plan-job.scheduler'
import { PLAN_JOB_STORE } from './plan-job.store'
import { PlanJobStatusService } from './plan-job-status.service'
import { PlanJobSubmissionService } from './plan-job-submission.service'
import { PlanJobSweeper } from './plan-job.sweeper'
import { PlanJobsController } from './plan-jobs.controller'

@Module({
  imports: [PlanArtifactsModule, PlanGeneratorModule],
  providers: [
    { provide: PLAN_JOB_STORE, useClass: InMemoryPlanJobStore },
    PlanJobScheduler,
    PlanJobRunner,
    PlanJobSubmissionService,
    PlanJobStatusService,
    PlanArtifactResolver,
    PlanJobSweeper,
  ],
  controllers: [PlanJobsController],
  exports: [PlanJobScheduler],
})
export class PlanJobsModule {}
