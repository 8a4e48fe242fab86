/**
 * iCalendar File Source
 *
 * Reads a .ics export and turns each VEVENT into a RawEvent.
 * Recurrence rules are not expanded: one VEVENT, one record.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import IcalExpander, {
  type IcalComponent,
  type IcalDuration,
  type IcalProperty,
  type IcalTime,
} from 'ical-expander'
import { IANAZone } from 'luxon'
import { CalendarSourceError, type CalendarSource, type EventTime, type RawEvent } from './types.js'

function isIcalTime(value: unknown): value is IcalTime {
  return typeof value === 'object' && value !== null && 'isDate' in value && 'year' in value
}

function isIcalDuration(value: unknown): value is IcalDuration {
  return typeof value === 'object' && value !== null && 'toSeconds' in value
}

function readText(component: IcalComponent, name: string): string | undefined {
  const value = component.getFirstPropertyValue(name)
  return typeof value === 'string' ? value : undefined
}

function readTzid(prop: IcalProperty): string | undefined {
  const tzid = prop.getParameter('tzid')
  return typeof tzid === 'string' ? tzid : undefined
}

/**
 * Map an ical.js time to the matching EventTime shape.
 * A TZID luxon cannot resolve (e.g. a Windows zone name) is read as floating.
 */
function toEventTime(time: IcalTime, tzid: string | undefined): EventTime {
  if (time.isDate) {
    return { kind: 'date', year: time.year, month: time.month, day: time.day }
  }

  const parts = {
    year: time.year,
    month: time.month,
    day: time.day,
    hour: time.hour,
    minute: time.minute,
    second: time.second,
  }

  if (time.zone?.tzid === 'UTC') {
    return { kind: 'zoned', ...parts, zone: 'UTC' }
  }
  if (tzid && IANAZone.isValidZone(tzid)) {
    return { kind: 'zoned', ...parts, zone: tzid }
  }
  return { kind: 'local', ...parts }
}

function readTime(component: IcalComponent, name: string): { time: IcalTime; tzid?: string } | null {
  const prop = component.getFirstProperty(name)
  if (!prop) return null

  const value = prop.getFirstValue()
  if (!isIcalTime(value)) return null

  return { time: value, tzid: readTzid(prop) }
}

function veventToRawEvent(vevent: IcalComponent): RawEvent {
  const dtstart = readTime(vevent, 'dtstart')
  const dtend = readTime(vevent, 'dtend')

  let end: EventTime | undefined
  if (dtend) {
    end = toEventTime(dtend.time, dtend.tzid)
  } else if (dtstart) {
    // No DTEND: fall back to DTSTART + DURATION when one is given
    const duration = vevent.getFirstPropertyValue('duration')
    if (isIcalDuration(duration)) {
      const computed = dtstart.time.clone()
      computed.addDuration(duration)
      end = toEventTime(computed, dtstart.tzid)
    }
  }

  return {
    start: dtstart ? toEventTime(dtstart.time, dtstart.tzid) : undefined,
    end,
    title: readText(vevent, 'summary'),
    location: readText(vevent, 'location'),
    url: readText(vevent, 'url'),
    description: readText(vevent, 'description'),
  }
}

/**
 * Parse iCalendar text into raw event records, in file order.
 */
export function parseIcs(ics: string): RawEvent[] {
  const expander = new IcalExpander({ ics, maxIterations: 0 })
  return expander.component.getAllSubcomponents('vevent').map(veventToRawEvent)
}

/**
 * CalendarSource backed by a .ics file on disk.
 */
export class IcsCalendarSource implements CalendarSource {
  constructor(private readonly path: string) {}

  async loadEvents(): Promise<RawEvent[]> {
    if (!existsSync(this.path)) {
      throw new CalendarSourceError(`Calendar file not found: ${this.path}`, this.path)
    }

    const ics = await readFile(this.path, 'utf-8')
    try {
      return parseIcs(ics)
    } catch (err) {
      throw new CalendarSourceError(
        `Could not parse calendar file ${this.path}: ${err instanceof Error ? err.message : String(err)}`,
        this.path,
      )
    }
  }
}
