import { z } from 'zod'
import { WEEKDAYS } from './training-week.types'

export const plannedWorkoutSchema = z.object({
  day: z.enum(WEEKDAYS),
  title: z.string().trim().min(1),
  type: z.enum(['Run', 'Bike', 'Swim', 'Strength', 'Rest']),
  intensity: z.enum(['Easy', 'Moderate', 'Hard']),
  durationMin: z.number().int().min(0).max(600),
  description: z.string().trim().min(1),
})

/** Shape the language model must return. One workout per weekday. */
export const draftedWeekSchema = z
  .object({
    summary: z.string().trim().min(1),
    notes: z.string().trim().nullish(),
    workouts: z.array(plannedWorkoutSchema).length(WEEKDAYS.length),
  })
  .superRefine((week, ctx) => {
    const days = new Set(week.workouts.map((w) => w.day))
    if (days.size !== WEEKDAYS.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['workouts'], message: 'each weekday must appear once' })
    }
  })

export type DraftedWeek = z.infer<typeof draftedWeekSchema>
