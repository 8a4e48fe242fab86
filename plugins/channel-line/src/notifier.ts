/**
 * LINE Notifier
 *
 * Sends plain-text messages through the LINE Messaging API, either to
 * one recipient (push) or to every follower (broadcast). Without
 * credentials it logs the message and reports a simulated success.
 */

import type { Notifier, SendResult } from "@daybrief/core";
import { missingCredential, type LineConfig, type LineRoute } from "./config.js";

// ─────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────

export const LINE_PUSH_URL = "https://api.line.me/v2/bot/message/push";
export const LINE_BROADCAST_URL = "https://api.line.me/v2/bot/message/broadcast";

const REQUEST_TIMEOUT_MS = 15_000;
const SUMMARY_MAX_LENGTH = 200;

export const DRY_RUN_RESULT: SendResult = { status: 0, ok: true, summary: "dry-run" };

interface TextMessage {
  type: "text";
  text: string;
}

interface LineRequest {
  url: string;
  body: { to?: string; messages: TextMessage[] };
}

// ─────────────────────────────────────────────────────────────────
// Notifier
// ─────────────────────────────────────────────────────────────────

export class LineNotifier implements Notifier {
  readonly name: string;
  private readonly config: LineConfig;

  constructor(config: LineConfig) {
    this.config = config;
    this.name = `line:${config.route}`;
  }

  get route(): LineRoute {
    return this.config.route;
  }

  /** False when sends would be simulated */
  isConfigured(): boolean {
    return missingCredential(this.config) === null;
  }

  async send(text: string): Promise<SendResult> {
    const missing = missingCredential(this.config);
    if (missing || !this.config.accessToken) {
      console.log(
        `[DRY RUN] ${this.config.route.toUpperCase()} (${missing ?? "credentials"} not set)\n${text}`,
      );
      return { ...DRY_RUN_RESULT };
    }

    const request = this.buildRequest(text);

    try {
      const response = await fetch(request.url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
      const body = await response.text();
      const result: SendResult = {
        status: response.status,
        ok: response.ok,
        summary: body.slice(0, SUMMARY_MAX_LENGTH),
      };
      console.log(
        `[LINE] route=${this.config.route} status=${result.status} summary=${result.summary}`,
      );
      return result;
    } catch (err) {
      const summary = err instanceof Error ? err.message : String(err);
      console.error(`[LINE] route=${this.config.route} request failed: ${summary}`);
      return { status: 0, ok: false, summary };
    }
  }

  private buildRequest(text: string): LineRequest {
    const messages: TextMessage[] = [{ type: "text", text }];
    if (this.config.route === "broadcast") {
      return { url: LINE_BROADCAST_URL, body: { messages } };
    }
    return { url: LINE_PUSH_URL, body: { to: this.config.to, messages } };
  }
}

// ─────────────────────────────────────────────────────────────────
// Factory function
// ─────────────────────────────────────────────────────────────────

export function createLineNotifier(config: LineConfig): LineNotifier {
  return new LineNotifier(config);
}
