import { z } from 'zod'

const optionalText = z.string().nullish().transform((v) => v ?? null)

export const stravaAthleteSchema = z.object({
  id: z.number().int(),
  firstname: optionalText,
  lastname: optionalText,
  city: optionalText,
  country: optionalText,
  sex: optionalText,
  weight: z.number().nullish().transform((v) => v ?? null),
})

export const stravaTotalsSchema = z
  .object({
    count: z.number().default(0),
    distance: z.number().default(0),
    moving_time: z.number().default(0),
    elevation_gain: z.number().default(0),
  })
  .default({})

export const stravaStatsSchema = z.object({
  recent_ride_totals: stravaTotalsSchema,
  recent_run_totals: stravaTotalsSchema,
  recent_swim_totals: stravaTotalsSchema,
  ytd_ride_totals: stravaTotalsSchema,
  ytd_run_totals: stravaTotalsSchema,
  ytd_swim_totals: stravaTotalsSchema,
  all_ride_totals: stravaTotalsSchema,
  all_run_totals: stravaTotalsSchema,
  all_swim_totals: stravaTotalsSchema,
})

export const stravaTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_at: z.number().optional(),
})

export type StravaAthlete = z.infer<typeof stravaAthleteSchema>
export type StravaTotals = z.infer<typeof stravaTotalsSchema>
export type StravaStats = z.infer<typeof stravaStatsSchema>
