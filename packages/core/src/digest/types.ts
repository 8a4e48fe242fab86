/**
 * Digest Types
 */

import type { DateTime } from 'luxon'

/**
 * Options that shape the digest text.
 */
export interface DigestOptions {
  /** IANA zone every time is coerced to */
  timeZone: string
  /** Locale used for the weekday name */
  locale: string
  showMemo: boolean
  showLinks: boolean
  /** Memo limit in characters; 0 or less disables truncation */
  memoMaxLength: number
}

export const DEFAULT_DIGEST_OPTIONS: DigestOptions = {
  timeZone: 'Asia/Tokyo',
  locale: 'ja',
  showMemo: true,
  showLinks: true,
  memoMaxLength: 180,
}

/**
 * One surviving event, ready for formatting.
 */
export interface DisplayEvent {
  clippedStart: DateTime
  clippedEnd: DateTime
  title: string
  location: string
  link: string
  memo: string
  allDay: boolean
  repaired: boolean
}

export interface Digest {
  /** ISO date of the target day */
  date: string
  header: string
  /** One message per event, same order as `events` */
  messages: string[]
  events: DisplayEvent[]
}

/**
 * Per-run counters, for diagnostics only.
 */
export interface DigestStats {
  total: number
  skipped: number
  repaired: number
  matched: number
}

export interface DigestBuild {
  digest: Digest
  stats: DigestStats
}
