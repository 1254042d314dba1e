import { mkdir, rename, rm, writeFile } from 'fs/promises'
import path from 'path'
import { Inject, Injectable } from '@nestjs/common'
import * as XLSX from 'xlsx'
import { CLOCK, type Clock } from '../clock/clock'
import type { TrainingWeek } from './training-week.types'

export type WorkbookInput = {
  athleteName: string
  goals: string | null
  week: TrainingWeek
}

const PLAN_COLUMNS = ['Day', 'Title', 'Type', 'Intensity', 'Duration', 'Description'] as const

@Injectable()
export class PlanWorkbookWriter {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  build({ athleteName, goals, week }: WorkbookInput): XLSX.WorkBook {
    const workbook = XLSX.utils.book_new()

    const overviewRows: string[][] = [
      [`Training Plan for: ${athleteName}`],
      [`Week: ${week.weekStartDate} to ${week.weekEndDate}`],
      [],
      [`Generated on: ${this.clock.now().toISOString()}`],
    ]
    if (goals) overviewRows.push([`Goals: ${goals}`])
    overviewRows.push([], [week.summary])
    const overview = XLSX.utils.aoa_to_sheet(overviewRows)
    overview['!cols'] = [{ wch: 100 }]
    XLSX.utils.book_append_sheet(workbook, overview, 'Overview')

    const planRows: Array<Array<string>> = [
      [...PLAN_COLUMNS],
      ...week.workouts.map((w) => [
        w.day,
        w.title,
        w.type,
        w.intensity,
        w.durationMin > 0 ? `${w.durationMin} min` : '-',
        w.description,
      ]),
    ]
    const plan = XLSX.utils.aoa_to_sheet(planRows)
    plan['!cols'] = columnWidths(planRows)
    XLSX.utils.book_append_sheet(workbook, plan, 'Weekly Plan')

    if (week.notes) {
      const notes = XLSX.utils.aoa_to_sheet([['Training Week Notes:'], [week.notes]])
      notes['!cols'] = [{ wch: 100 }]
      XLSX.utils.book_append_sheet(workbook, notes, 'Notes')
    }

    return workbook
  }

  /** Writes next to the target and renames, so readers never see a partial file. */
  async write(targetPath: string, input: WorkbookInput): Promise<void> {
    const buffer: Buffer = XLSX.write(this.build(input), { type: 'buffer', bookType: 'xlsx' })
    await mkdir(path.dirname(targetPath), { recursive: true })

    const tmpPath = `${targetPath}.${process.pid}.${Date.now()}.tmp`
    try {
      await writeFile(tmpPath, buffer)
      await rename(tmpPath, targetPath)
    } catch (err) {
      await rm(tmpPath, { force: true })
      throw err
    }
  }
}

function columnWidths(rows: string[][]): XLSX.ColInfo[] {
  const widths: number[] = []
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length)
    })
  }
  return widths.map((w) => ({ wch: w + 2 }))
}
