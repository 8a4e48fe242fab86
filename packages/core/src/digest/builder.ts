/**
 * Digest Builder
 *
 * Runs the pipeline for one day: normalize → filter → shape → format.
 * Each record is handled independently; the day window is the only
 * value shared across records.
 */

import type { DateTime } from 'luxon'
import { normalizeEventTimes } from '../calendar/normalize.js'
import type { RawEvent } from '../calendar/types.js'
import { clipToWindow, computeDayWindow, overlapsWindow } from '../calendar/window.js'
import { shapeContent } from './content.js'
import { formatDigest, UNTITLED } from './formatter.js'
import type { DigestBuild, DigestOptions, DigestStats, DisplayEvent } from './types.js'

/**
 * Build the digest of events overlapping the day of `reference` (default: now).
 *
 * Records without a start are skipped and counted; repaired intervals are
 * counted. Neither is an error.
 */
export function buildDigest(
  events: readonly RawEvent[],
  options: DigestOptions,
  reference?: DateTime | Date,
): DigestBuild {
  const window = computeDayWindow(options.timeZone, reference)
  const stats: DigestStats = { total: 0, skipped: 0, repaired: 0, matched: 0 }
  const display: DisplayEvent[] = []

  for (const event of events) {
    stats.total++

    const interval = normalizeEventTimes(event, options.timeZone)
    if (!interval) {
      stats.skipped++
      continue
    }
    if (interval.repaired) {
      stats.repaired++
    }
    if (!overlapsWindow(interval, window)) {
      continue
    }

    const clipped = clipToWindow(interval, window)
    const { link, memo } = shapeContent(event, interval.allDay, options)

    display.push({
      clippedStart: clipped.start,
      clippedEnd: clipped.end,
      title: event.title?.trim() || UNTITLED,
      location: event.location?.trim() ?? '',
      link,
      memo,
      allDay: interval.allDay,
      repaired: interval.repaired,
    })
  }

  stats.matched = display.length

  return { digest: formatDigest(window, display, options), stats }
}
