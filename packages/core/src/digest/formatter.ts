/**
 * Digest Formatting
 *
 * Turns display events into the header and per-event message texts.
 */

import type { DayWindow } from '../calendar/types.js'
import type { Digest, DigestOptions, DisplayEvent } from './types.js'

export const BULLET = '・'
export const ALL_DAY_LABEL = '終日'
export const UNTITLED = '(無題)'
export const LINK_PREFIX = 'link: '
export const MEMO_LABEL = 'メモ:'
export const NO_EVENTS_LINE = '本日の予定はありません。'

const PREVIEW_COUNT = 3

/**
 * "終日" for all-day-like events, else HH:mm of the clipped start.
 */
export function timeLabel(event: Pick<DisplayEvent, 'allDay' | 'clippedStart'>): string {
  return event.allDay ? ALL_DAY_LABEL : event.clippedStart.toFormat('HH:mm')
}

/**
 * Order by clipped start, then title by code unit. Total and stable.
 */
export function compareDisplayEvents(a: DisplayEvent, b: DisplayEvent): number {
  const byStart = a.clippedStart.toMillis() - b.clippedStart.toMillis()
  if (byStart !== 0) return byStart
  if (a.title < b.title) return -1
  if (a.title > b.title) return 1
  return 0
}

export function formatEventMessage(
  event: DisplayEvent,
  options: Pick<DigestOptions, 'showMemo' | 'showLinks'>,
): string {
  const lines = [
    `${BULLET}${timeLabel(event)}`,
    event.location ? `${event.title}（${event.location}）` : event.title,
  ]

  if (options.showLinks && event.link) {
    lines.push(`${LINK_PREFIX}${event.link}`)
  }
  if (options.showMemo && event.memo) {
    lines.push(MEMO_LABEL, event.memo)
  }

  return lines.join('\n')
}

/**
 * 【本日の予定 2024-06-01（土） 3件】
 */
export function formatHeader(
  window: Pick<DayWindow, 'date' | 'start'>,
  count: number,
  locale: string,
): string {
  const weekday = window.start.setLocale(locale).toFormat('ccc')
  const header = `【本日の予定 ${window.date}（${weekday}） ${count}件】`
  return count === 0 ? `${header}\n${NO_EVENTS_LINE}` : header
}

export function formatDigest(
  window: Pick<DayWindow, 'date' | 'start'>,
  events: DisplayEvent[],
  options: Pick<DigestOptions, 'showMemo' | 'showLinks' | 'locale'>,
): Digest {
  const sorted = [...events].sort(compareDisplayEvents)

  return {
    date: window.date,
    header: formatHeader(window, sorted.length, options.locale),
    messages: sorted.map((event) => formatEventMessage(event, options)),
    events: sorted,
  }
}

/**
 * Short one-line preview of the first few events, for logs.
 */
export function formatPreview(events: DisplayEvent[], count: number = PREVIEW_COUNT): string {
  return events
    .slice(0, count)
    .map((event) => `${timeLabel(event)}:${event.title}`)
    .join(' / ')
}
