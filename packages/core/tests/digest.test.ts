/**
 * Tests for digest building and formatting, from raw events to the
 * header and per-event message texts.
 */

import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { buildDigest } from '../src/digest/builder.js'
import { dumpEvents } from '../src/digest/dump.js'
import { formatHeader, formatPreview } from '../src/digest/formatter.js'
import { computeDayWindow } from '../src/calendar/window.js'
import { DEFAULT_DIGEST_OPTIONS, type DigestOptions } from '../src/digest/types.js'
import type { EventTime, RawEvent } from '../src/calendar/types.js'

const ZONE = 'Asia/Tokyo'
const REFERENCE = DateTime.fromISO('2024-06-01T12:00', { zone: ZONE })
const OPTIONS: DigestOptions = { ...DEFAULT_DIGEST_OPTIONS, timeZone: ZONE }

function local(day: number, hour: number, minute = 0, month = 6): EventTime {
  return { kind: 'local', year: 2024, month, day, hour, minute, second: 0 }
}

const EVENTS: RawEvent[] = [
  { start: local(1, 9), end: local(1, 10), title: 'B' },
  { start: local(1, 9), end: local(1, 10), title: 'A', location: '会議室1' },
  { start: { kind: 'date', year: 2024, month: 6, day: 1 }, title: '運動会' },
  { start: local(1, 23, 30), end: local(2, 0, 15), title: '夜行バス' },
  { end: local(1, 10), title: 'broken' },
  { start: local(31, 0, 0, 5), end: local(31, 1, 0, 5), title: '昨日' },
  { start: local(1, 12), title: '   ' },
]

// -------------------------------------------------------------------
// buildDigest
// -------------------------------------------------------------------

describe('buildDigest', () => {
  const { digest, stats } = buildDigest(EVENTS, OPTIONS, REFERENCE)

  it('counts seen, skipped, repaired and matched records', () => {
    expect(stats).toEqual({ total: 7, skipped: 1, repaired: 2, matched: 5 })
  })

  it('puts the matched count and weekday in the header', () => {
    expect(digest.date).toBe('2024-06-01')
    expect(digest.header).toBe('【本日の予定 2024-06-01（土） 5件】')
  })

  it('orders by start, then title', () => {
    expect(digest.events.map((e) => e.title)).toEqual(['運動会', 'A', 'B', '(無題)', '夜行バス'])
  })

  it('formats one message per event', () => {
    expect(digest.messages).toEqual([
      '・終日\n運動会',
      '・09:00\nA（会議室1）',
      '・09:00\nB',
      '・12:00\n(無題)',
      '・23:30\n夜行バス',
    ])
  })

  it('marks the repaired all-day event and clips the overnight one', () => {
    const [allDay] = digest.events
    expect(allDay.allDay).toBe(true)
    expect(allDay.repaired).toBe(true)
    expect(allDay.clippedEnd.toISO()).toBe('2024-06-02T00:00:00.000+09:00')

    const overnight = digest.events[4]
    expect(overnight.clippedEnd.toISO()).toBe('2024-06-02T00:00:00.000+09:00')
    expect(overnight.repaired).toBe(false)
  })

  it('adds link and memo lines when present', () => {
    const { digest: withNotes } = buildDigest(
      [
        {
          start: local(1, 14),
          end: local(1, 15),
          title: '打ち合わせ',
          description: 'Zoom: https://zoom.us/j/999\n\n\n持ち物: 筆記用具',
        },
      ],
      OPTIONS,
      REFERENCE,
    )
    expect(withNotes.messages).toEqual([
      '・14:00\n打ち合わせ\nlink: https://zoom.us/j/999\nメモ:\nZoom: https://zoom.us/j/999\n\n持ち物: 筆記用具',
    ])
  })

  it('omits link and memo lines when switched off', () => {
    const { digest: plain } = buildDigest(
      [{ start: local(1, 14), title: '打ち合わせ', url: 'https://zoom.us/j/999', description: 'memo' }],
      { ...OPTIONS, showLinks: false, showMemo: false },
      REFERENCE,
    )
    expect(plain.messages).toEqual(['・14:00\n打ち合わせ'])
  })

  it('shows times in the configured zone', () => {
    const { digest: converted } = buildDigest(
      [
        {
          start: { kind: 'zoned', year: 2024, month: 6, day: 1, hour: 0, minute: 30, second: 0, zone: 'UTC' },
          title: 'sync',
        },
      ],
      OPTIONS,
      REFERENCE,
    )
    expect(converted.messages).toEqual(['・09:30\nsync'])
  })

  it('reports an empty day without messages', () => {
    const { digest: empty, stats: emptyStats } = buildDigest([], OPTIONS, REFERENCE)
    expect(empty.header).toBe('【本日の予定 2024-06-01（土） 0件】\n本日の予定はありません。')
    expect(empty.messages).toEqual([])
    expect(emptyStats.matched).toBe(0)
  })
})

// -------------------------------------------------------------------
// Formatting helpers
// -------------------------------------------------------------------

describe('formatHeader', () => {
  it('localizes the weekday', () => {
    const window = computeDayWindow(ZONE, REFERENCE)
    expect(formatHeader(window, 2, 'en')).toBe('【本日の予定 2024-06-01（Sat） 2件】')
  })
})

describe('formatPreview', () => {
  it('lists the first three events', () => {
    const { digest } = buildDigest(EVENTS, OPTIONS, REFERENCE)
    expect(formatPreview(digest.events)).toBe('終日:運動会 / 09:00:A / 09:00:B')
  })
})

// -------------------------------------------------------------------
// dumpEvents
// -------------------------------------------------------------------

describe('dumpEvents', () => {
  it('lists every usable record with its normalized interval', () => {
    const report = dumpEvents(
      [
        { start: { kind: 'date', year: 2024, month: 6, day: 1 }, title: '運動会' },
        { title: 'no start' },
        { start: local(2, 9), end: local(2, 10), title: 'two\nlines' },
      ],
      ZONE,
      REFERENCE,
    )
    expect(report.lines).toEqual([
      '2024-06-01T00:00:00.000+09:00, 2024-06-02T00:00:00.000+09:00, true, 運動会',
      '2024-06-02T09:00:00.000+09:00, 2024-06-02T10:00:00.000+09:00, false, two lines',
    ])
    expect(report.total).toBe(3)
    expect(report.repaired).toBe(1)
    expect(report.matched).toBe(1)
  })

  it('stops listing at the limit but keeps counting', () => {
    const events: RawEvent[] = [1, 2, 3].map((hour) => ({ start: local(1, hour), title: `e${hour}` }))
    const report = dumpEvents(events, ZONE, REFERENCE, 2)
    expect(report.lines).toHaveLength(2)
    expect(report.total).toBe(3)
    expect(report.matched).toBe(3)
  })
})
