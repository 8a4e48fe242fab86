// Public API for consumption by other packages (runner, plugins)

// Calendar
export {
  CalendarSourceError,
  IcsCalendarSource,
  parseIcs,
  toZone,
  isAllDayLike,
  normalizeEventTimes,
  computeDayWindow,
  overlapsWindow,
  clipToWindow,
} from './calendar/index.js'
export type {
  EventTime,
  DateOnlyTime,
  LocalTime,
  ZonedTime,
  RawEvent,
  NormalizedInterval,
  DayWindow,
  CalendarSource,
} from './calendar/index.js'

// Digest
export {
  buildDigest,
  dumpEvents,
  extractLink,
  shapeMemo,
  shapeContent,
  truncateMemo,
  formatDigest,
  formatEventMessage,
  formatHeader,
  formatPreview,
  compareDisplayEvents,
  timeLabel,
  DEFAULT_DIGEST_OPTIONS,
} from './digest/index.js'
export type {
  DigestOptions,
  DisplayEvent,
  Digest,
  DigestStats,
  DigestBuild,
  DumpReport,
} from './digest/index.js'

// Notifications
export { DispatchCoordinator, capMessageLength } from './notifications/index.js'
export type {
  DispatchCoordinatorConfig,
  SendResult,
  Notifier,
  OutboundMessage,
  DispatchFailure,
  DispatchResult,
} from './notifications/index.js'

// Config
export { loadConfig } from './config.js'
export type { DaybriefConfig, Env, LoadConfigOptions } from './config.js'

// Utilities
export { clipText, codePointLength, isTruthy, parseSwitch } from './utils/text.js'
