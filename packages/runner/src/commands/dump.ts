/**
 * --dump: print how each record is read, without sending anything.
 */

import { dumpEvents, type CalendarSource, type DaybriefConfig } from '@daybrief/core'
import { loadEventsOrReport } from './load-events.js'

export async function runDump(config: DaybriefConfig, source: CalendarSource): Promise<number> {
  const events = await loadEventsOrReport(source)
  if (!events) return 1

  const report = dumpEvents(events, config.timeZone, config.referenceInstant)
  for (const line of report.lines) {
    console.log(line)
  }
  console.log(`repaired: ${report.repaired}`)
  console.log(`totals: all=${report.total}, matched=${report.matched}`)
  return 0
}
