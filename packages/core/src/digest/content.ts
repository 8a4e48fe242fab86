/**
 * Content Shaping
 *
 * Pulls a meeting link out of an event's URL/description and turns the
 * description into a short memo block. Both are pure functions of their
 * inputs; shapeMemo is idempotent.
 */

import type { RawEvent } from '../calendar/types.js'
import { codePointLength, sliceCodePoints } from '../utils/text.js'
import type { DigestOptions } from './types.js'

/**
 * Hosted-meeting URL shapes, highest priority first.
 */
export const MEETING_LINK_PATTERNS: readonly RegExp[] = [
  /https?:\/\/(?:[\w-]+\.)*zoom\.us\/(?:j|my|w|s)\/\S+/i,
  /https?:\/\/meet\.google\.com\/[a-z]{3}-[a-z]{4}-[a-z]{3}\S*/i,
  /https?:\/\/teams\.microsoft\.com\/l\/meetup-join\/\S+/i,
  /https?:\/\/(?:[\w-]+\.)*webex\.com\/\S+/i,
]

const BARE_URL_PATTERN = /https?:\/\/\S+/i

/** Leading token of a time line in exported notes */
export const TIME_LABEL = '時間:'

/** Time line that only repeats what an all-day event already says */
export const ALL_DAY_TIME_LINE = `${TIME_LABEL} 終日`

/** Appended to a memo that was cut short */
export const CONTINUES_MARKER = '…（続く）'

const ALL_DAY_LINE_SCAN = 3

/**
 * Find the meeting link for an event.
 *
 * Known meeting providers win over any other URL; within a provider the
 * first match wins. Falls back to the first http(s) token, then "".
 */
export function extractLink(url?: string, description?: string): string {
  const haystack = [url ?? '', description ?? ''].join('\n')

  for (const pattern of MEETING_LINK_PATTERNS) {
    const match = pattern.exec(haystack)
    if (match) {
      return match[0]
    }
  }

  return BARE_URL_PATTERN.exec(haystack)?.[0] ?? ''
}

/**
 * Cut `text` to `maxLength` characters and mark it as continued.
 * Text that was already cut this way is returned unchanged.
 */
export function truncateMemo(text: string, maxLength: number): string {
  if (maxLength <= 0) {
    return text
  }

  const length = codePointLength(text)
  if (length <= maxLength) {
    return text
  }
  if (text.endsWith(CONTINUES_MARKER) && length - codePointLength(CONTINUES_MARKER) <= maxLength) {
    return text
  }

  return sliceCodePoints(text, maxLength).trimEnd() + CONTINUES_MARKER
}

function applyLineRules(lines: string[], allDay: boolean): string[] {
  const squeezed = lines.map((line) => line.replace(/\s{2,}/g, ' ').trim())

  const withoutAllDayLine = allDay
    ? squeezed.filter((line, i) => !(i < ALL_DAY_LINE_SCAN && line === ALL_DAY_TIME_LINE))
    : squeezed

  const withoutRepeatedTimes = withoutAllDayLine.filter(
    (line, i, all) => !(i > 0 && line.startsWith(TIME_LABEL) && all[i - 1].startsWith(TIME_LABEL)),
  )

  const withoutBlankRuns = withoutRepeatedTimes.filter(
    (line, i, all) => !(line === '' && i > 0 && all[i - 1] === ''),
  )

  let first = 0
  let last = withoutBlankRuns.length
  while (first < last && withoutBlankRuns[first] === '') first++
  while (last > first && withoutBlankRuns[last - 1] === '') last--

  return withoutBlankRuns.slice(first, last)
}

/**
 * Normalize free-text notes into a memo block.
 *
 * Line rules are repeated until nothing changes, since dropping a line
 * can bring another one into the first few lines.
 */
export function shapeMemo(
  text: string,
  options: { allDay?: boolean; maxLength?: number } = {},
): string {
  const allDay = options.allDay ?? false
  const maxLength = options.maxLength ?? 180

  let lines = text.split(/\r\n|\r|\n/)
  for (;;) {
    const next = applyLineRules(lines, allDay)
    if (next.join('\n') === lines.join('\n')) {
      break
    }
    lines = next
  }

  return truncateMemo(lines.join('\n'), maxLength)
}

/**
 * Derive the link and memo shown for an event.
 */
export function shapeContent(
  event: Pick<RawEvent, 'url' | 'description'>,
  allDay: boolean,
  options: Pick<DigestOptions, 'showMemo' | 'showLinks' | 'memoMaxLength'>,
): { link: string; memo: string } {
  return {
    link: options.showLinks ? extractLink(event.url, event.description) : '',
    memo: options.showMemo
      ? shapeMemo(event.description ?? '', { allDay, maxLength: options.memoMaxLength })
      : '',
  }
}
