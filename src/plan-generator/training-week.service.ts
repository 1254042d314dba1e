import { Inject, Injectable, Logger } from '@nestjs/common'
import OpenAI from 'openai'
import { CLOCK, type Clock } from '../clock/clock'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { PlanGenerationError } from './plan-generator.types'
import type { ActivitySummary, Sport } from './strava/strava.types'
import { draftedWeekSchema } from './training-week.schema'
import { WEEKDAYS, type PlannedWorkout, type TrainingWeek, type WorkoutType } from './training-week.types'

export type DraftRequest = {
  athleteName: string
  goals: string | null
  activity: ActivitySummary
}

const SPORT_PRIORITY: Sport[] = ['run', 'ride', 'swim']

const SPORT_WORDING: Record<Sport, { type: WorkoutType; noun: string; label: string }> = {
  run: { type: 'Run', noun: 'run', label: 'running' },
  ride: { type: 'Bike', noun: 'ride', label: 'cycling' },
  swim: { type: 'Swim', noun: 'swim', label: 'swimming' },
}

const MIN_WEEKLY_MINUTES = 150
const MAX_WEEKLY_MINUTES = 600

@Injectable()
export class TrainingWeekService {
  private readonly logger = new Logger(TrainingWeekService.name)

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async draft(request: DraftRequest): Promise<TrainingWeek> {
    const { provider, openAiApiKey } = this.config.aiPlan
    if (provider !== 'openai') return this.draftStub(request)

    if (!openAiApiKey) {
      throw new PlanGenerationError('drafting', 'OPENAI_API_KEY missing')
    }

    try {
      return await this.draftWithOpenAi(request, openAiApiKey)
    } catch (err) {
      this.logger.warn(`OpenAI drafting failed, using stub plan: ${String(err)}`)
      return this.draftStub(request)
    }
  }

  draftStub({ athleteName, goals, activity }: DraftRequest): TrainingWeek {
    const { weekStartDate, weekEndDate } = this.upcomingWeek()
    const sport = primarySport(activity)
    const { type, noun, label } = SPORT_WORDING[sport]

    const recentHours =
      activity.recent.run.movingTimeHours +
      activity.recent.ride.movingTimeHours +
      activity.recent.swim.movingTimeHours
    const weeklyMinutes = clamp(
      Math.round((recentHours * 60) / 4),
      MIN_WEEKLY_MINUTES,
      MAX_WEEKLY_MINUTES,
    )

    const workouts: PlannedWorkout[] = [
      restDay('Monday'),
      {
        day: 'Tuesday',
        title: `Easy ${noun}`,
        type,
        intensity: 'Easy',
        durationMin: roundTo5(weeklyMinutes * 0.2),
        description: `Conversational pace ${noun}, keep the effort relaxed throughout.`,
      },
      {
        day: 'Wednesday',
        title: 'Strength & mobility',
        type: 'Strength',
        intensity: 'Moderate',
        durationMin: 30,
        description: 'Core, hips and single-leg strength followed by mobility work.',
      },
      qualitySession(activity, sport, roundTo5(weeklyMinutes * 0.2)),
      restDay('Friday'),
      {
        day: 'Saturday',
        title: `Easy ${noun}`,
        type,
        intensity: 'Easy',
        durationMin: roundTo5(weeklyMinutes * 0.15),
        description: `Short, easy ${noun} to shake out the legs before the long session.`,
      },
      {
        day: 'Sunday',
        title: `Long ${noun}`,
        type,
        intensity: 'Easy',
        durationMin: roundTo5(weeklyMinutes * 0.45),
        description: `Steady aerobic ${noun} at an easy effort; fuel and hydrate as needed.`,
      },
    ]

    const sessions = workouts.filter((w) => w.type !== 'Rest').length
    const totalMin = workouts.reduce((sum, w) => sum + w.durationMin, 0)
    const recentCount = activity.recent[sport].count

    const notes: string[] = []
    if (activity.source === 'none' || recentCount === 0) {
      notes.push('No recent activity history available; volumes start from a conservative baseline.')
    } else {
      const { fitnessLevel, weeklyLoadHours, weeklySessions, trainingFrequency } = activity.insights
      notes.push(`Based on ${recentCount} ${noun} activities in the last 4 weeks.`)
      notes.push(
        `Fitness level ${fitnessLevel}: ${weeklyLoadHours} h over ${weeklySessions} sessions per week (${trainingFrequency} frequency).`,
      )
    }
    if (goals) notes.push(`Goals: ${goals}`)

    return {
      provider: 'stub',
      weekStartDate,
      weekEndDate,
      summary: `Weekly ${label} plan for ${athleteName} (${weekStartDate} to ${weekEndDate}): ${sessions} sessions, ${totalMin} min in total.`,
      notes: notes.join('\n'),
      workouts,
    }
  }

  /** Monday strictly after today (UTC) through the following Sunday. */
  upcomingWeek(): { weekStartDate: string; weekEndDate: string } {
    const now = this.clock.now()
    const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
    const daysUntilMonday = (8 - now.getUTCDay()) % 7 || 7
    const start = new Date(today + daysUntilMonday * DAY_MS)
    const end = new Date(start.getTime() + 6 * DAY_MS)
    return { weekStartDate: isoDate(start), weekEndDate: isoDate(end) }
  }

  private async draftWithOpenAi(request: DraftRequest, apiKey: string): Promise<TrainingWeek> {
    const { model, maxOutputTokens } = this.config.aiPlan
    const { weekStartDate, weekEndDate } = this.upcomingWeek()
    const client = new OpenAI({ apiKey })

    const instructions =
      'You are a professional training planner. Create a personalised weekly workout program ' +
      "based on the athlete's recent activity statistics and goals. " +
      'Balance intensity and recovery, and prefer the sport the athlete trains most. ' +
      'Scale volume and intensity to activity.insights (fitness level, weekly load and frequency). ' +
      'Return ONLY valid JSON (no markdown, no surrounding text) of exactly this shape: ' +
      '{"summary":string,"notes":string|null,"workouts":{"day":"Monday"|"Tuesday"|"Wednesday"|"Thursday"|"Friday"|"Saturday"|"Sunday",' +
      '"title":string,"type":"Run"|"Bike"|"Swim"|"Strength"|"Rest","intensity":"Easy"|"Moderate"|"Hard",' +
      '"durationMin":number,"description":string}[]} with one workout per weekday.'

    const input = JSON.stringify({
      athleteName: request.athleteName,
      goals: request.goals,
      weekStartDate,
      weekEndDate,
      activity: request.activity,
    })

    const response = await client.responses.create({
      model,
      instructions,
      input,
      max_output_tokens: maxOutputTokens,
    })

    const outputText = response.output_text
    if (typeof outputText !== 'string' || outputText.trim().length === 0) {
      throw new Error('OpenAI response missing text')
    }

    let json: unknown
    try {
      json = JSON.parse(stripMarkdownFences(outputText))
    } catch {
      throw new Error('OpenAI returned non-JSON content')
    }

    const parsed = draftedWeekSchema.safeParse(json)
    if (!parsed.success) {
      throw new Error('OpenAI returned JSON with invalid shape')
    }

    const workouts = [...parsed.data.workouts].sort(
      (a, b) => WEEKDAYS.indexOf(a.day) - WEEKDAYS.indexOf(b.day),
    )

    return {
      provider: 'openai',
      weekStartDate,
      weekEndDate,
      summary: parsed.data.summary,
      notes: parsed.data.notes ?? null,
      workouts,
    }
  }
}

const DAY_MS = 24 * 60 * 60 * 1000

export function primarySport(activity: ActivitySummary): Sport {
  let best: Sport = 'run'
  for (const sport of SPORT_PRIORITY) {
    if (activity.recent[sport].count > activity.recent[best].count) best = sport
  }
  return best
}

export function stripMarkdownFences(raw: string): string {
  const trimmed = raw.trim()
  if (!trimmed.startsWith('```')) return trimmed
  return trimmed.replace(/^```[a-zA-Z]*\n?/, '').replace(/```$/, '').trim()
}

// Beginners get a steady session in place of intervals.
function qualitySession(activity: ActivitySummary, sport: Sport, durationMin: number): PlannedWorkout {
  const { type, noun } = SPORT_WORDING[sport]
  if (activity.insights.fitnessLevel === 'Beginner') {
    return {
      day: 'Thursday',
      title: `Steady ${noun}`,
      type,
      intensity: 'Moderate',
      durationMin,
      description: `Continuous ${noun} at a comfortably firm effort, finishing with something left.`,
    }
  }
  return {
    day: 'Thursday',
    title: `${capitalize(noun)} intervals`,
    type,
    intensity: 'Hard',
    durationMin,
    description: 'Warm up, then 5 x 3 min hard with 2 min easy recoveries, cool down.',
  }
}

function restDay(day: PlannedWorkout['day']): PlannedWorkout {
  return {
    day,
    title: 'Rest day',
    type: 'Rest',
    intensity: 'Easy',
    durationMin: 0,
    description: 'Full rest or light mobility work.',
  }
}

function roundTo5(minutes: number): number {
  return Math.round(minutes / 5) * 5
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n))
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1)
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10)
}
