import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { clipToWindow, computeDayWindow, overlapsWindow } from '../src/calendar/window.js'

const ZONE = 'Asia/Tokyo'

function at(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: ZONE })
}

describe('computeDayWindow', () => {
  it('spans the reference day from local midnight', () => {
    const window = computeDayWindow(ZONE, at('2024-06-01T12:00'))
    expect(window.date).toBe('2024-06-01')
    expect(window.start.toISO()).toBe('2024-06-01T00:00:00.000+09:00')
    expect(window.end.toISO()).toBe('2024-06-02T00:00:00.000+09:00')
  })

  it('takes the date as seen in the zone, not in UTC', () => {
    const window = computeDayWindow(ZONE, new Date('2024-05-31T20:00:00Z'))
    expect(window.date).toBe('2024-06-01')
  })

  it('is exactly 24 hours long across a DST change', () => {
    const window = computeDayWindow(
      'America/New_York',
      DateTime.fromISO('2024-03-10T12:00', { zone: 'America/New_York' }),
    )
    expect(window.start.toISO()).toBe('2024-03-10T00:00:00.000-05:00')
    expect(window.end.toISO()).toBe('2024-03-11T01:00:00.000-04:00')
  })
})

describe('overlapsWindow', () => {
  const window = computeDayWindow(ZONE, at('2024-06-01T12:00'))

  it('includes an event inside the day', () => {
    expect(overlapsWindow({ start: at('2024-06-01T10:00'), end: at('2024-06-01T11:00') }, window)).toBe(true)
  })

  it('excludes an event on the previous day', () => {
    expect(overlapsWindow({ start: at('2024-05-31T00:00'), end: at('2024-05-31T01:00') }, window)).toBe(false)
  })

  it('excludes an event ending exactly at the window start', () => {
    expect(overlapsWindow({ start: at('2024-05-31T23:00'), end: at('2024-06-01T00:00') }, window)).toBe(false)
  })

  it('excludes an event starting exactly at the window end', () => {
    expect(overlapsWindow({ start: at('2024-06-02T00:00'), end: at('2024-06-02T01:00') }, window)).toBe(false)
  })

  it('includes an event covering the whole day', () => {
    expect(overlapsWindow({ start: at('2024-05-31T00:00'), end: at('2024-06-03T00:00') }, window)).toBe(true)
  })
})

describe('clipToWindow', () => {
  const window = computeDayWindow(ZONE, at('2024-06-01T12:00'))

  it('cuts an event running past midnight at the window end', () => {
    const clipped = clipToWindow({ start: at('2024-06-01T23:30'), end: at('2024-06-02T00:15') }, window)
    expect(clipped.start.toISO()).toBe('2024-06-01T23:30:00.000+09:00')
    expect(clipped.end.toISO()).toBe('2024-06-02T00:00:00.000+09:00')
  })

  it('moves an earlier start up to the window start', () => {
    const clipped = clipToWindow({ start: at('2024-05-31T22:00'), end: at('2024-06-01T02:00') }, window)
    expect(clipped.start.toISO()).toBe('2024-06-01T00:00:00.000+09:00')
    expect(clipped.end.toISO()).toBe('2024-06-01T02:00:00.000+09:00')
  })
})
