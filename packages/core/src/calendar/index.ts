/**
 * Calendar
 *
 * Raw event records, their normalization to the target zone, and the
 * day window they are matched against.
 */

// Types
export type {
  EventTime,
  DateOnlyTime,
  LocalTime,
  ZonedTime,
  RawEvent,
  NormalizedInterval,
  DayWindow,
  CalendarSource,
} from './types.js'
export { CalendarSourceError } from './types.js'

// Implementation
export { toZone, isAllDayLike, normalizeEventTimes } from './normalize.js'
export { computeDayWindow, overlapsWindow, clipToWindow } from './window.js'
export { IcsCalendarSource, parseIcs } from './ics-source.js'
