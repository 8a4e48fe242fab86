/**
 * Notification Types
 *
 * The outbound side of a run: what a notifier accepts and returns, and
 * what the dispatcher reports back.
 */

/**
 * Outcome of a single send, as reported by the transport.
 */
export interface SendResult {
  /** Transport status code (0 when nothing was sent over the wire) */
  status: number;
  ok: boolean;
  /** Short transport-provided detail, e.g. a truncated response body */
  summary: string;
}

/**
 * Delivery channel for digest messages.
 * Implementations simulate a successful send when they lack credentials.
 */
export interface Notifier {
  /** Route or plugin name, for logs */
  readonly name: string;
  send(text: string): Promise<SendResult>;
}

/**
 * A message queued for dispatch.
 */
export interface OutboundMessage {
  text: string;
  /** Shown in failure diagnostics (usually the event title) */
  hint?: string;
}

export interface DispatchFailure {
  /** Position in the send order, 0 = first message */
  index: number;
  hint?: string;
  status: number;
  summary: string;
}

export interface DispatchResult {
  /** True only when no send failed */
  ok: boolean;
  attempted: number;
  failed: number;
  failures: DispatchFailure[];
}
