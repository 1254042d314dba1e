export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const

export type Weekday = (typeof WEEKDAYS)[number]
export type WorkoutType = 'Run' | 'Bike' | 'Swim' | 'Strength' | 'Rest'
export type Intensity = 'Easy' | 'Moderate' | 'Hard'

export type PlannedWorkout = {
  day: Weekday
  title: string
  type: WorkoutType
  intensity: Intensity
  durationMin: number
  description: string
}

export type TrainingWeek = {
  provider: 'stub' | 'openai'
  weekStartDate: string // YYYY-MM-DD
  weekEndDate: string
  summary: string
  notes: string | null
  workouts: PlannedWorkout[]
}
