import { Inject, Injectable } from '@nestjs/common'
import { APP_CONFIG, type AppConfig } from '../config/app-config'
import { StravaClient, emptyActivitySummary } from './strava/strava.client'
import type { ActivitySummary } from './strava/strava.types'

@Injectable()
export class ActivityService {
  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    private readonly strava: StravaClient,
  ) {}

  async getSummary(): Promise<ActivitySummary> {
    if (this.config.activity.provider === 'none') return emptyActivitySummary()
    return this.strava.fetchActivitySummary()
  }
}
