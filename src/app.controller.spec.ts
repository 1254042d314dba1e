import { Test } from '@nestjs/testing'
import { AppController } from './app.controller'
import { APP_CONFIG, loadAppConfig } from './config/app-config'
import { PlanJobScheduler } from './plan-jobs/plan-job.scheduler'

describe('AppController', () => {
  let controller: AppController
  let scheduler: PlanJobScheduler

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [AppController],
      providers: [PlanJobScheduler, { provide: APP_CONFIG, useValue: loadAppConfig({ PLAN_JOB_CONCURRENCY: '1' }) }],
    }).compile()

    controller = moduleRef.get(AppController)
    scheduler = moduleRef.get(PlanJobScheduler)
  })

  it('describes the service', () => {
    expect(controller.getRoot()).toEqual({ status: 'ok', message: 'Training Plan Jobs API is running' })
  })

  it('reports background queue depth', async () => {
    let release: () => void = () => undefined
    const blocker = new Promise<void>((resolve) => {
      release = resolve
    })
    scheduler.schedule('first', () => blocker)
    scheduler.schedule('second', async () => undefined)

    expect(controller.health()).toEqual({ status: 'ok', planJobs: { running: 1, pending: 1 } })

    release()
    await scheduler.drain()
    expect(controller.health()).toEqual({ status: 'ok', planJobs: { running: 0, pending: 0 } })
  })
})
