import { Module } from '@nestjs/common'
import axios from 'axios'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { PlanArtifactsModule } from '../plan-artifacts/plan-artifacts.module'
import { ActivityService } from './activity.service'
import { PlanWorkbookWriter } from './plan-workbook.writer'
import { PLAN_GENERATOR } from './plan-generator.types'
import { StravaClient } from './strava/strava.client'
import { TrainingPlanGenerator } from './training-plan.generator'
import { TrainingWeekService } from './training-week.service'

@Module({
  imports: [PlanArtifactsModule],
  providers: [
    {
      provide: StravaClient,
      useFactory: (config: AppConfig) =>
        new StravaClient(config.activity.strava, axios.create({ timeout: config.activity.strava.timeoutMs })),
      inject: [APP_CONFIG],
    },
    ActivityService,
    TrainingWeekService,
    PlanWorkbookWriter,
    TrainingPlanGenerator,
    { provide: PLAN_GENERATOR, useExisting: TrainingPlanGenerator },
  ],
  exports: [PLAN_GENERATOR],
})
export class PlanGeneratorModule {}
