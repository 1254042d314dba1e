import { Module } from '@nestjs/common'
import { AppController } from './app.controller'
import { ClockModule } from './clock/clock.module'
import { AppConfigModule } from './config/app-config.module'
import { PlanJobsModule } from './plan-jobs/plan-jobs.module'

@Module({
  imports: [AppConfigModule, ClockModule, PlanJobsModule],
  controllers: [AppController],
})
export class AppModule {}
