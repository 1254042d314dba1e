export type Sport = 'ride' | 'run' | 'swim'

export type SportTotals = {
  count: number
  distanceKm: number
  movingTimeHours: number
  elevationGainM: number
}

export type AthleteProfile = {
  id: number
  firstname: string | null
  lastname: string | null
  city: string | null
  country: string | null
  sex: string | null
  weightKg: number | null
}

export type WeeklyAverage = {
  sessions: number
  distanceKm: number
  hours: number
}

export type FitnessLevel = 'Beginner' | 'Intermediate' | 'Advanced' | 'Elite'
export type TrainingFrequency = 'Low' | 'Moderate' | 'High'

/** Per-week figures derived from the four-week totals, rounded to one decimal. */
export type TrainingInsights = {
  weeklyAverages: Record<Sport, WeeklyAverage>
  weeklyLoadHours: number
  weeklySessions: number
  fitnessLevel: FitnessLevel
  trainingFrequency: TrainingFrequency
}

/** Training history the plan is drafted from. `recent` covers the last four weeks. */
export type ActivitySummary = {
  source: 'strava' | 'none'
  athlete: AthleteProfile | null
  recent: Record<Sport, SportTotals>
  yearToDate: Record<Sport, SportTotals>
  allTime: Record<Sport, SportTotals>
  insights: TrainingInsights
}
