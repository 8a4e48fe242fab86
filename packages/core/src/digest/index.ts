/**
 * Digest module exports
 */

export { buildDigest } from './builder.js'
export { dumpEvents } from './dump.js'
export type { DumpReport } from './dump.js'
export {
  extractLink,
  shapeMemo,
  shapeContent,
  truncateMemo,
  MEETING_LINK_PATTERNS,
  TIME_LABEL,
  ALL_DAY_TIME_LINE,
  CONTINUES_MARKER,
} from './content.js'
export {
  formatDigest,
  formatEventMessage,
  formatHeader,
  formatPreview,
  compareDisplayEvents,
  timeLabel,
  ALL_DAY_LABEL,
  UNTITLED,
  MEMO_LABEL,
  LINK_PREFIX,
  NO_EVENTS_LINE,
} from './formatter.js'

export { DEFAULT_DIGEST_OPTIONS } from './types.js'
export type {
  DigestOptions,
  DisplayEvent,
  Digest,
  DigestStats,
  DigestBuild,
} from './types.js'
