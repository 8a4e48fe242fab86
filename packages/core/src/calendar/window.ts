/**
 * Day Window
 *
 * The target day as a half-open [00:00, 00:00 + 24h) range in the
 * target zone, and the overlap/clip helpers used against it.
 */

import { DateTime } from 'luxon'
import type { DayWindow, NormalizedInterval } from './types.js'

/**
 * Compute the window of the day containing `reference` (default: now)
 * as seen in `zone`.
 */
export function computeDayWindow(zone: string, reference: DateTime | Date = new Date()): DayWindow {
  const local =
    reference instanceof Date ? DateTime.fromJSDate(reference, { zone }) : reference.setZone(zone)
  const start = local.startOf('day')

  return {
    date: start.toFormat('yyyy-MM-dd'),
    start,
    end: start.plus({ hours: 24 }),
  }
}

/**
 * Half-open overlap test: an interval ending exactly at the window start,
 * or starting exactly at the window end, does not overlap.
 */
export function overlapsWindow(
  interval: Pick<NormalizedInterval, 'start' | 'end'>,
  window: DayWindow,
): boolean {
  return (
    interval.start.toMillis() < window.end.toMillis() &&
    interval.end.toMillis() > window.start.toMillis()
  )
}

/**
 * Intersect an interval with the window, for display only.
 */
export function clipToWindow(
  interval: Pick<NormalizedInterval, 'start' | 'end'>,
  window: DayWindow,
): { start: DateTime; end: DateTime } {
  const start = interval.start.toMillis() > window.start.toMillis() ? interval.start : window.start
  const end = interval.end.toMillis() < window.end.toMillis() ? interval.end : window.end
  return { start, end }
}
