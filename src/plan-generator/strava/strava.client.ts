import { isAxiosError, type AxiosInstance } from 'axios'
import { Logger } from '@nestjs/common'
import type { ZodType, ZodTypeDef } from 'zod'
import type { AppConfig } from '../../config/app-config'
import { PlanGenerationError } from '../plan-generator.types'
import {
  stravaAthleteSchema,
  stravaStatsSchema,
  stravaTokenSchema,
  type StravaAthlete,
  type StravaStats,
  type StravaTotals,
} from './strava.schema'
import type { ActivitySummary, Sport, SportTotals } from './strava.types'
import { trainingInsights } from './training-insights'

export type StravaSettings = AppConfig['activity']['strava']
export type StravaHttp = Pick<AxiosInstance, 'get' | 'post'>

const REQUIRED_SCOPES = ['read', 'activity:read_all', 'profile:read_all']

export class StravaClient {
  private readonly logger = new Logger(StravaClient.name)
  private accessToken: string | undefined
  private refreshToken: string | undefined
  private refreshing: Promise<void> | null = null

  constructor(
    private readonly settings: StravaSettings,
    private readonly http: StravaHttp,
  ) {
    this.accessToken = settings.accessToken
    this.refreshToken = settings.refreshToken
  }

  async fetchActivitySummary(): Promise<ActivitySummary> {
    if (!this.accessToken && !this.canRefresh()) {
      throw new PlanGenerationError('activity', 'Missing Strava API credentials')
    }
    if (!this.accessToken) {
      await this.refreshAccessToken()
    }

    const tokenUsed = this.accessToken
    try {
      return await this.loadSummary()
    } catch (err) {
      if (statusOf(err) === 401 && this.canRefresh()) {
        // Another job may already have replaced the token this request used.
        if (this.accessToken === tokenUsed) await this.refreshAccessToken()
        try {
          return await this.loadSummary()
        } catch (retryErr) {
          throw toGenerationError(retryErr)
        }
      }
      throw toGenerationError(err)
    }
  }

  private canRefresh(): boolean {
    return Boolean(this.refreshToken && this.settings.clientId && this.settings.clientSecret)
  }

  private async loadSummary(): Promise<ActivitySummary> {
    const athlete = await this.getJson('/athlete', stravaAthleteSchema)
    const stats = await this.getJson(`/athletes/${athlete.id}/stats`, stravaStatsSchema)
    return toActivitySummary(athlete, stats)
  }

  private async getJson<T>(path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const res = await this.http.get<unknown>(`${this.settings.apiBaseUrl}${path}`, {
      headers: { Authorization: `Bearer ${this.accessToken}` },
      timeout: this.settings.timeoutMs,
    })
    const parsed = schema.safeParse(res.data)
    if (!parsed.success) {
      throw new PlanGenerationError('activity', `Unexpected Strava response for ${path}`)
    }
    return parsed.data
  }

  /** Concurrent callers share one token exchange. */
  private refreshAccessToken(): Promise<void> {
    if (!this.refreshing) {
      this.refreshing = this.exchangeRefreshToken().finally(() => {
        this.refreshing = null
      })
    }
    return this.refreshing
  }

  private async exchangeRefreshToken(): Promise<void> {
    try {
      const res = await this.http.post<unknown>(
        this.settings.oauthUrl,
        {
          client_id: this.settings.clientId,
          client_secret: this.settings.clientSecret,
          grant_type: 'refresh_token',
          refresh_token: this.refreshToken,
        },
        { timeout: this.settings.timeoutMs },
      )
      const parsed = stravaTokenSchema.safeParse(res.data)
      if (!parsed.success) {
        throw new PlanGenerationError('activity', 'Strava token refresh returned no access token')
      }
      this.accessToken = parsed.data.access_token
      this.refreshToken = parsed.data.refresh_token ?? this.refreshToken
      this.logger.log('Refreshed Strava access token')
    } catch (err) {
      throw toGenerationError(err)
    }
  }
}

export function emptyActivitySummary(): ActivitySummary {
  const zero = (): Record<Sport, SportTotals> => ({
    ride: zeroTotals(),
    run: zeroTotals(),
    swim: zeroTotals(),
  })
  const recent = zero()
  return {
    source: 'none',
    athlete: null,
    recent,
    yearToDate: zero(),
    allTime: zero(),
    insights: trainingInsights(recent),
  }
}

export function toActivitySummary(athlete: StravaAthlete, stats: StravaStats): ActivitySummary {
  const recent: Record<Sport, SportTotals> = {
    ride: toSportTotals(stats.recent_ride_totals),
    run: toSportTotals(stats.recent_run_totals),
    swim: toSportTotals(stats.recent_swim_totals),
  }
  return {
    source: 'strava',
    athlete: {
      id: athlete.id,
      firstname: athlete.firstname,
      lastname: athlete.lastname,
      city: athlete.city,
      country: athlete.country,
      sex: athlete.sex,
      weightKg: athlete.weight,
    },
    recent,
    yearToDate: {
      ride: toSportTotals(stats.ytd_ride_totals),
      run: toSportTotals(stats.ytd_run_totals),
      swim: toSportTotals(stats.ytd_swim_totals),
    },
    allTime: {
      ride: toSportTotals(stats.all_ride_totals),
      run: toSportTotals(stats.all_run_totals),
      swim: toSportTotals(stats.all_swim_totals),
    },
    insights: trainingInsights(recent),
  }
}

function toSportTotals(t: StravaTotals): SportTotals {
  return {
    count: t.count,
    distanceKm: round2(t.distance / 1000),
    movingTimeHours: round2(t.moving_time / 3600),
    elevationGainM: round2(t.elevation_gain),
  }
}

function zeroTotals(): SportTotals {
  return { count: 0, distanceKm: 0, movingTimeHours: 0, elevationGainM: 0 }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100
}

function statusOf(err: unknown): number | undefined {
  return isAxiosError(err) ? err.response?.status : undefined
}

function toGenerationError(err: unknown): PlanGenerationError {
  if (err instanceof PlanGenerationError) return err
  const status = statusOf(err)
  if (status === 401 || status === 403) {
    return new PlanGenerationError(
      'activity',
      `Strava authorization failed (HTTP ${status}); required scopes: ${REQUIRED_SCOPES.join(', ')}`,
      { cause: err },
    )
  }
  const detail = err instanceof Error ? err.message : String(err)
  return new PlanGenerationError(
    'activity',
    status ? `Strava request failed (HTTP ${status}): ${detail}` : `Strava request failed: ${detail}`,
    { cause: err },
  )
}
