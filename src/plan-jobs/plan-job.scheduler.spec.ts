import { loadAppConfig } from '../config/app-config'
import { PlanJobScheduler } from './plan-job.scheduler'

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

describe('PlanJobScheduler', () => {
  it('returns before the task runs', async () => {
    const scheduler = new PlanJobScheduler(loadAppConfig({}))
    const ran: string[] = []

    scheduler.schedule('a', async () => {
      ran.push('a')
    })
    expect(ran).toEqual([])

    await scheduler.drain()
    expect(ran).toEqual(['a'])
  })

  it('runs at most `concurrency` tasks at once, in FIFO order', async () => {
    const scheduler = new PlanJobScheduler(loadAppConfig({ PLAN_JOB_CONCURRENCY: '1' }))
    const first = deferred()
    const started: string[] = []

    scheduler.schedule('first', async () => {
      started.push('first')
      await first.promise
    })
    scheduler.schedule('second', async () => {
      started.push('second')
    })

    await Promise.resolve()
    await Promise.resolve()
    expect(started).toEqual(['first'])
    expect(scheduler.getRunningCount()).toBe(1)
    expect(scheduler.getPendingCount()).toBe(1)

    first.resolve()
    await scheduler.drain()
    expect(started).toEqual(['first', 'second'])
    expect(scheduler.getRunningCount()).toBe(0)
    expect(scheduler.getPendingCount()).toBe(0)
  })

  it('keeps going after a task rejects', async () => {
    const scheduler = new PlanJobScheduler(loadAppConfig({ PLAN_JOB_CONCURRENCY: '1' }))
    const ran: string[] = []

    scheduler.schedule('bad', async () => {
      throw new Error('boom')
    })
    scheduler.schedule('good', async () => {
      ran.push('good')
    })

    await scheduler.drain()
    expect(ran).toEqual(['good'])
  })

  it('drain resolves immediately when idle', async () => {
    const scheduler = new PlanJobScheduler(loadAppConfig({}))
    await expect(scheduler.drain()).resolves.toBeUndefined()
  })
})
