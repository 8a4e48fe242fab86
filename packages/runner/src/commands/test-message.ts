import { DispatchCoordinator, type DaybriefConfig, type Notifier } from '@daybrief/core'

/**
 * Send a single free-form message through the configured route.
 */
export async function runTestMessage(
  message: string,
  config: Pick<DaybriefConfig, 'interMessageDelayMs'>,
  notifier: Notifier,
): Promise<number> {
  const coordinator = new DispatchCoordinator(notifier, {
    interMessageDelayMs: config.interMessageDelayMs,
  })
  const result = await coordinator.dispatch([{ text: message, hint: 'test' }])
  return result.ok ? 0 : 1
}
