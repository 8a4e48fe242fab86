/**
 * Event Dump
 *
 * Lists every record's normalized interval, for checking how a calendar
 * export is read. Nothing is filtered out of the listing.
 */

import type { DateTime } from 'luxon'
import { normalizeEventTimes } from '../calendar/normalize.js'
import type { RawEvent } from '../calendar/types.js'
import { computeDayWindow, overlapsWindow } from '../calendar/window.js'
import { UNTITLED } from './formatter.js'

const DEFAULT_DUMP_LIMIT = 200

export interface DumpReport {
  /** "start, end, allDay, title" per usable record, up to the limit */
  lines: string[]
  total: number
  repaired: number
  matched: number
}

export function dumpEvents(
  events: readonly RawEvent[],
  timeZone: string,
  reference?: DateTime | Date,
  limit: number = DEFAULT_DUMP_LIMIT,
): DumpReport {
  const window = computeDayWindow(timeZone, reference)
  const report: DumpReport = { lines: [], total: 0, repaired: 0, matched: 0 }

  events.forEach((event, index) => {
    report.total++

    const interval = normalizeEventTimes(event, timeZone)
    if (!interval) return

    if (interval.repaired) report.repaired++
    if (overlapsWindow(interval, window)) report.matched++

    if (index < limit) {
      const title = (event.title || UNTITLED).replace(/\r?\n/g, ' ')
      report.lines.push(
        `${interval.start.toISO() ?? ''}, ${interval.end.toISO() ?? ''}, ${interval.allDay}, ${title}`,
      )
    }
  })

  return report
}
