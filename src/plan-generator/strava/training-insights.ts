import type {
  FitnessLevel,
  Sport,
  SportTotals,
  TrainingFrequency,
  TrainingInsights,
  WeeklyAverage,
} from './strava.types'

const RECENT_WEEKS = 4

export function trainingInsights(recent: Record<Sport, SportTotals>): TrainingInsights {
  const weeklyAverages: Record<Sport, WeeklyAverage> = {
    ride: weeklyAverage(recent.ride),
    run: weeklyAverage(recent.run),
    swim: weeklyAverage(recent.swim),
  }
  const averages = Object.values(weeklyAverages)
  const hours = averages.reduce((sum, a) => sum + a.hours, 0)
  const sessions = averages.reduce((sum, a) => sum + a.sessions, 0)

  return {
    weeklyAverages,
    weeklyLoadHours: round1(hours),
    weeklySessions: round1(sessions),
    fitnessLevel: fitnessLevelFor(hours),
    trainingFrequency: trainingFrequencyFor(sessions),
  }
}

export function fitnessLevelFor(weeklyHours: number): FitnessLevel {
  if (weeklyHours < 3) return 'Beginner'
  if (weeklyHours < 7) return 'Intermediate'
  if (weeklyHours < 12) return 'Advanced'
  return 'Elite'
}

export function trainingFrequencyFor(weeklySessions: number): TrainingFrequency {
  if (weeklySessions < 3) return 'Low'
  if (weeklySessions < 6) return 'Moderate'
  return 'High'
}

function weeklyAverage(totals: SportTotals): WeeklyAverage {
  return {
    sessions: round1(totals.count / RECENT_WEEKS),
    distanceKm: round1(totals.distanceKm / RECENT_WEEKS),
    hours: round1(totals.movingTimeHours / RECENT_WEEKS),
  }
}

function round1(n: number): number {
  return Math.round(n * 10) / 10
}
