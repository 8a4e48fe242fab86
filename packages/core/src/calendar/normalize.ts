/**
 * Time Normalization
 *
 * Fixes an event's raw start/end to the target zone and repairs
 * missing or non-positive durations.
 */

import { DateTime } from 'luxon'
import type { EventTime, NormalizedInterval, RawEvent } from './types.js'

/**
 * Coerce a raw time value to a DateTime in `zone`.
 *
 * - date: 00:00 of that day in `zone`
 * - local: the wall-clock time read as already being in `zone`
 * - zoned: the instant converted to `zone`
 */
export function toZone(time: EventTime, zone: string): DateTime {
  switch (time.kind) {
    case 'date':
      return DateTime.fromObject({ year: time.year, month: time.month, day: time.day }, { zone })
    case 'local':
      return DateTime.fromObject(
        {
          year: time.year,
          month: time.month,
          day: time.day,
          hour: time.hour,
          minute: time.minute,
          second: time.second,
        },
        { zone },
      )
    case 'zoned':
      return DateTime.fromObject(
        {
          year: time.year,
          month: time.month,
          day: time.day,
          hour: time.hour,
          minute: time.minute,
          second: time.second,
        },
        { zone: time.zone },
      ).setZone(zone)
    default: {
      const unhandled: never = time
      throw new Error(`Unsupported event time: ${JSON.stringify(unhandled)}`)
    }
  }
}

/**
 * True if either bound is a bare date. Drives repair granularity.
 */
export function isAllDayLike(event: Pick<RawEvent, 'start' | 'end'>): boolean {
  return event.start?.kind === 'date' || event.end?.kind === 'date'
}

/**
 * Normalize one event's time range.
 *
 * Returns null when the event has no usable start. A missing end, or an
 * end at or before the start, is replaced by start + 1 day (all-day-like)
 * or start + 1 hour (timed) and flagged as repaired.
 */
export function normalizeEventTimes(
  event: Pick<RawEvent, 'start' | 'end'>,
  zone: string,
): NormalizedInterval | null {
  if (!event.start) {
    return null
  }

  const start = toZone(event.start, zone)
  if (!start.isValid) {
    return null
  }

  const allDay = isAllDayLike(event)
  const end = event.end ? toZone(event.end, zone) : null

  if (end && end.isValid && end.toMillis() > start.toMillis()) {
    return { start, end, allDay, repaired: false }
  }

  return {
    start,
    end: allDay ? start.plus({ days: 1 }) : start.plus({ hours: 1 }),
    allDay,
    repaired: true,
  }
}
