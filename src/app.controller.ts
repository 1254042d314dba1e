import { Controller, Get } from '@nestjs/common'
import { PlanJobScheduler } from './plan-jobs/plan-job.scheduler'

@Controller()
export class AppController {
  constructor(private readonly scheduler: PlanJobScheduler) {}

  @Get()
  getRoot() {
    return { status: 'ok', message: 'Training Plan Jobs API is running' }
  }

  @Get('health')
  health() {
    return {
      status: 'ok',
      planJobs: {
        running: this.scheduler.getRunningCount(),
        pending: this.scheduler.getPendingCount(),
      },
    }
  }
}
