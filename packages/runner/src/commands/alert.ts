/**
 * alert: tell the channel that a scheduled run failed.
 *
 * Always exits 0 so the alert step never hides the failure that
 * triggered it.
 */

import { clipText, type Notifier } from '@daybrief/core'
import { missingCredential, type LineConfig } from '@daybrief/channel-line'

export const ALERT_MAX_LENGTH = 1000
export const EMPTY_ALERT = '(empty)'

export function alertText(message: string | undefined): string {
  const text = (message ?? '').trim()
  return text ? clipText(text, ALERT_MAX_LENGTH) : EMPTY_ALERT
}

export async function runAlert(
  message: string | undefined,
  config: LineConfig,
  notifier: Notifier,
): Promise<number> {
  const missing = missingCredential(config)
  if (missing) {
    console.log(`[alert] missing ${missing}; skip`)
    return 0
  }

  try {
    const result = await notifier.send(alertText(message))
    console.log(`[alert] route=${config.route} status=${result.status} summary=${result.summary}`)
  } catch (err) {
    console.error(`[alert] send failed: ${err instanceof Error ? err.message : String(err)}`)
  }
  return 0
}
