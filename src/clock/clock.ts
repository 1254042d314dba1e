export interface Clock {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }
}

/** Mutable clock for specs: `advance` moves time forward without waiting. */
export class ManualClock implements Clock {
  private current: Date

  constructor(startIso: string) {
    this.current = new Date(startIso)
  }

  now(): Date {
    return new Date(this.current.getTime())
  }

  set(iso: string): void {
    this.current = new Date(iso)
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms)
  }
}
