/**
 * Default command: build today's digest and send it.
 */

import {
  buildDigest,
  DispatchCoordinator,
  formatPreview,
  type CalendarSource,
  type DaybriefConfig,
  type Notifier,
} from '@daybrief/core'
import { loadEventsOrReport } from './load-events.js'

export interface TodayDeps {
  source: CalendarSource
  notifier: Notifier
  sleep?: (ms: number) => Promise<unknown>
}

/**
 * @returns exit status: 0 when every send succeeded
 */
export async function runToday(config: DaybriefConfig, deps: TodayDeps): Promise<number> {
  const events = await loadEventsOrReport(deps.source)
  if (!events) return 1

  const { digest, stats } = buildDigest(events, config, config.referenceInstant)

  console.log(
    `[Digest] today=${digest.date} events_total=${stats.total} skipped=${stats.skipped} normalized=${stats.repaired} matched=${stats.matched}`,
  )
  const preview = formatPreview(digest.events)
  if (preview) {
    console.log(`[Digest] preview: ${preview}`)
  }

  const coordinator = new DispatchCoordinator(deps.notifier, {
    interMessageDelayMs: config.interMessageDelayMs,
    sleep: deps.sleep,
  })
  const result = await coordinator.dispatchDigest(digest)
  return result.ok ? 0 : 1
}
