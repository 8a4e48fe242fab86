import { CalendarSourceError, type CalendarSource, type RawEvent } from '@daybrief/core'

/**
 * Read the run's events. A missing or unreadable calendar is reported
 * and yields null; anything else propagates.
 */
export async function loadEventsOrReport(source: CalendarSource): Promise<RawEvent[] | null> {
  try {
    return await source.loadEvents()
  } catch (err) {
    if (err instanceof CalendarSourceError) {
      console.error(`[Runner] ${err.message}`)
      return null
    }
    throw err
  }
}
