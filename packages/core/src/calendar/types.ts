/**
 * Calendar Types
 *
 * Raw event records as read from a calendar source, and the intervals
 * and windows the digest pipeline derives from them.
 */

import type { DateTime } from 'luxon'

/** A bare calendar date with no time of day (iCalendar VALUE=DATE) */
export interface DateOnlyTime {
  kind: 'date'
  year: number
  month: number
  day: number
}

/** Wall-clock time with no zone attached (iCalendar "floating" time) */
export interface LocalTime {
  kind: 'local'
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

/** Wall-clock time in an explicit IANA zone ("UTC" for Z timestamps) */
export interface ZonedTime {
  kind: 'zoned'
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  zone: string
}

/**
 * A raw start/end value. The three shapes are kept apart so the
 * normalizer can tell an all-day date from a midnight timestamp.
 */
export type EventTime = DateOnlyTime | LocalTime | ZonedTime

/**
 * Event record as supplied by a calendar source.
 * Records without a start are skipped by the pipeline.
 */
export interface RawEvent {
  readonly start?: EventTime
  readonly end?: EventTime
  readonly title?: string
  readonly location?: string
  readonly url?: string
  readonly description?: string
}

/**
 * An event's time range fixed to the target zone.
 * `end` is always strictly after `start`.
 */
export interface NormalizedInterval {
  start: DateTime
  end: DateTime
  /** True when start or end was a bare date */
  allDay: boolean
  /** True when `end` was synthesized (missing or non-positive duration) */
  repaired: boolean
}

/**
 * The half-open [start, end) range of the target day.
 */
export interface DayWindow {
  /** ISO date of the target day (yyyy-MM-dd) */
  date: string
  start: DateTime
  end: DateTime
}

/**
 * Anything that can supply the run's raw events.
 */
export interface CalendarSource {
  loadEvents(): Promise<RawEvent[]>
}

/**
 * Raised when the calendar source itself is unavailable.
 * Fatal: the pipeline never starts.
 */
export class CalendarSourceError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(message)
    this.name = 'CalendarSourceError'
  }
}
