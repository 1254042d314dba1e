import { ManualClock } from '../src/clock/clock'
import { loadAppConfig } from '../src/config/app-config'
import { PlanGenerationError } from '../src/plan-generator/plan-generator.types'
import { InMemoryPlanJobStore } from '../src/plan-jobs/in-memory-plan-job.store'
import { PlanJobRunner, describeFailure } from '../src/plan-jobs/plan-job.runner'
import { PlanJobScheduler } from '../src/plan-jobs/plan-job.scheduler'
import type { PlanJobRecord } from '../src/plan-jobs/plan-job.types'
import { ControllablePlanGenerator, flushMicrotasks } from './support/controllable-plan-generator'

describe('PlanJobRunner', () => {
  let store: InMemoryPlanJobStore
  let generator: ControllablePlanGenerator
  let scheduler: PlanJobScheduler
  let runner: PlanJobRunner
  let job: PlanJobRecord

  beforeEach(async () => {
    store = new InMemoryPlanJobStore(new ManualClock('2025-03-10T09:00:00.000Z'))
    generator = new ControllablePlanGenerator()
    scheduler = new PlanJobScheduler(loadAppConfig({}))
    runner = new PlanJobRunner(store, generator, scheduler)

    const created = await store.create({ jobKey: 'jane doe', athleteName: 'Jane Doe', goals: '10k PB' })
    if (!created.ok) throw new Error('create failed')
    job = created.record
  })

  it('dispatch returns before the generator is called', async () => {
    runner.dispatch(job)
    expect(generator.calls).toHaveLength(0)

    await flushMicrotasks()
    expect(generator.calls).toEqual([{ jobKey: 'jane doe', athleteName: 'Jane Doe', goals: '10k PB' }])
    expect((await store.get('jane doe'))?.status).toBe('processing')
  })

  it('records a completed outcome with the artifact reference', async () => {
    runner.dispatch(job)
    await flushMicrotasks()

    generator.succeed('jane doe', { summary: '  Four sessions this week.  ', artifactRef: 'jane_doe_plan.xlsx' })
    await scheduler.drain()

    expect(await store.get('jane doe')).toMatchObject({
      status: 'completed',
      message: 'Four sessions this week.',
      artifactRef: 'jane_doe_plan.xlsx',
    })
  })

  it('falls back to a default summary when the generator returns a blank one', async () => {
    const run = runner.run(job)
    await flushMicrotasks()
    generator.succeed('jane doe', { summary: ' ', artifactRef: 'a.xlsx' })

    await expect(run).resolves.toEqual({
      status: 'completed',
      message: 'Training plan generated successfully',
      artifactRef: 'a.xlsx',
    })
  })

  it('records generator errors as failed', async () => {
    const run = runner.run(job)
    await flushMicrotasks()
    generator.fail('jane doe', new PlanGenerationError('activity', 'Missing Strava API credentials'))

    await run
    expect(await store.get('jane doe')).toMatchObject({
      status: 'failed',
      message: 'Activity data unavailable: Missing Strava API credentials',
      artifactRef: null,
    })
  })

  it('fails jobs whose result carries no artifact', async () => {
    const run = runner.run(job)
    await flushMicrotasks()
    generator.succeed('jane doe', { summary: 'done', artifactRef: '' })

    await expect(run).resolves.toEqual({
      status: 'failed',
      message: 'Spreadsheet export failed: Generator finished without producing an artifact',
    })
  })

  it('handles non-Error rejections', async () => {
    const run = runner.run(job)
    await flushMicrotasks()
    generator.fail('jane doe', undefined)

    await expect(run).resolves.toEqual({ status: 'failed', message: 'Unknown error occurred' })
  })

  it('does not reject when the store refuses the write', async () => {
    const run = runner.run(job)
    await flushMicrotasks()
    await store.update('jane doe', job.jobId, { status: 'failed', message: 'already done' })
    generator.succeed('jane doe', { summary: 'late', artifactRef: 'a.xlsx' })

    await expect(run).resolves.toMatchObject({ status: 'completed' })
    expect(await store.get('jane doe')).toMatchObject({ status: 'failed', message: 'already done' })
  })

  it('skips a job that expired before it started', async () => {
    await store.markStale('jane doe', job.jobId, 'Training plan generation timed out after 60000 ms')

    await expect(runner.run(job)).resolves.toBeNull()
    expect(generator.calls).toHaveLength(0)
    expect(await store.get('jane doe')).toMatchObject({
      status: 'failed',
      message: 'Training plan generation timed out after 60000 ms',
    })
  })

  it('does not generate queued jobs that expired while waiting', async () => {
    const serialScheduler = new PlanJobScheduler(loadAppConfig({ PLAN_JOB_CONCURRENCY: '1' }))
    const serial = new PlanJobRunner(store, generator, serialScheduler)
    const created = await store.create({ jobKey: 'john roe', athleteName: 'John Roe', goals: null })
    if (!created.ok) throw new Error('create failed')

    serial.dispatch(job)
    serial.dispatch(created.record)
    await flushMicrotasks()
    expect(generator.calls.map((c) => c.jobKey)).toEqual(['jane doe'])

    await store.markStale('jane doe', job.jobId, 'timed out')
    await store.markStale('john roe', created.record.jobId, 'timed out')
    generator.succeed('jane doe', { summary: 'late', artifactRef: 'a.xlsx' })
    await flushMicrotasks()

    expect(generator.calls.map((c) => c.jobKey)).toEqual(['jane doe'])
    expect(generator.isRunning('john roe')).toBe(false)
  })

  it('hands the generator a guard that follows the store', async () => {
    runner.dispatch(job)
    await flushMicrotasks()
    const [guard] = generator.guards

    await expect(guard.isCurrent()).resolves.toBe(true)

    const resubmitted = await store.create({ jobKey: 'jane doe', athleteName: 'Jane Doe', goals: null })
    expect(resubmitted.ok).toBe(false)
    await store.markStale('jane doe', job.jobId, 'timed out')
    await expect(guard.isCurrent()).resolves.toBe(false)

    const next = await store.create({ jobKey: 'jane doe', athleteName: 'Jane Doe', goals: null })
    expect(next.ok).toBe(true)
    await expect(guard.isCurrent()).resolves.toBe(false)
  })
})

describe('describeFailure', () => {
  it('prefixes generation errors with their stage', () => {
    expect(describeFailure(new PlanGenerationError('drafting', 'OPENAI_API_KEY missing'))).toBe(
      'Plan drafting failed: OPENAI_API_KEY missing',
    )
  })

  it('uses plain error messages and strings as-is', () => {
    expect(describeFailure(new Error('disk full'))).toBe('disk full')
    expect(describeFailure('timeout')).toBe('timeout')
  })

  it('falls back for empty messages', () => {
    expect(describeFailure(new Error(''))).toBe('Unknown error occurred')
    expect(describeFailure({})).toBe('Unknown error occurred')
  })
})
