/**
 * Dispatch Coordinator
 *
 * Sends the digest header and each event message as separate messages,
 * one at a time, with a fixed pause between sends. Failures are tallied
 * and logged; they never stop the remaining sends, and nothing is retried.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { Digest } from '../digest/types.js'
import { codePointLength, sliceCodePoints } from '../utils/text.js'
import type {
  DispatchFailure,
  DispatchResult,
  Notifier,
  OutboundMessage,
  SendResult,
} from './types.js'

/** Messages longer than this are cut before sending */
export const MAX_MESSAGE_LENGTH = 5000

/** Length a too-long message is cut to, before the suffix */
export const TRUNCATED_MESSAGE_LENGTH = 4800

export const OMITTED_SUFFIX = '\n…（以下省略）'

const DEFAULT_INTER_MESSAGE_DELAY_MS = 250

export interface DispatchCoordinatorConfig {
  /** Pause between two consecutive sends (default: 250) */
  interMessageDelayMs?: number
  /** Override the pause implementation (tests) */
  sleep?: (ms: number) => Promise<unknown>
}

/**
 * Cut a message that exceeds the transport limit.
 */
export function capMessageLength(text: string): string {
  if (codePointLength(text) <= MAX_MESSAGE_LENGTH) {
    return text
  }
  return sliceCodePoints(text, TRUNCATED_MESSAGE_LENGTH) + OMITTED_SUFFIX
}

export class DispatchCoordinator {
  private notifier: Notifier
  private interMessageDelayMs: number
  private sleep: (ms: number) => Promise<unknown>

  constructor(notifier: Notifier, config: DispatchCoordinatorConfig = {}) {
    this.notifier = notifier
    this.interMessageDelayMs = config.interMessageDelayMs ?? DEFAULT_INTER_MESSAGE_DELAY_MS
    this.sleep = config.sleep ?? ((ms) => delay(ms))
  }

  /**
   * Send the header first, then every event message in digest order.
   */
  async dispatchDigest(digest: Pick<Digest, 'header' | 'messages' | 'events'>): Promise<DispatchResult> {
    const messages: OutboundMessage[] = [
      { text: digest.header, hint: 'header' },
      ...digest.messages.map((text, i) => ({ text, hint: digest.events[i]?.title })),
    ]
    return this.dispatch(messages)
  }

  /**
   * Send messages in order, pausing between consecutive sends.
   *
   * @returns ok only when every send succeeded
   */
  async dispatch(messages: readonly OutboundMessage[]): Promise<DispatchResult> {
    const failures: DispatchFailure[] = []

    for (const [index, message] of messages.entries()) {
      if (index > 0 && this.interMessageDelayMs > 0) {
        await this.sleep(this.interMessageDelayMs)
      }

      const result = await this.sendOne(message.text)
      if (!result.ok) {
        failures.push({
          index,
          hint: message.hint,
          status: result.status,
          summary: result.summary,
        })
        console.error(
          `[Dispatch] Message ${index + 1}/${messages.length} failed (${message.hint ?? 'untitled'}): status=${result.status} summary=${result.summary}`,
        )
      }
    }

    const result: DispatchResult = {
      ok: failures.length === 0,
      attempted: messages.length,
      failed: failures.length,
      failures,
    }

    if (result.ok) {
      console.log(`[Dispatch] Sent ${result.attempted} message(s) via ${this.notifier.name}`)
    } else {
      console.warn(
        `[Dispatch] ${result.failed} of ${result.attempted} message(s) failed via ${this.notifier.name}`,
      )
    }

    return result
  }

  /**
   * A send that throws counts as a failed send.
   */
  private async sendOne(text: string): Promise<SendResult> {
    try {
      return await this.notifier.send(capMessageLength(text))
    } catch (err) {
      return {
        status: 0,
        ok: false,
        summary: err instanceof Error ? err.message : String(err),
      }
    }
  }
}
