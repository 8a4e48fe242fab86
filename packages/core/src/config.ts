import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { DateTime, IANAZone } from 'luxon'
import { parse } from 'yaml'
import { z } from 'zod'
import { DEFAULT_DIGEST_OPTIONS, type DigestOptions } from './digest/types.js'
import { parseSwitch } from './utils/text.js'

const DEFAULT_CALENDAR_PATH = 'data/timetree.ics'
const DEFAULT_INTER_MESSAGE_DELAY_MS = 250
const CONFIG_FILENAME = 'daybrief.yaml'

/**
 * Run configuration, built once at the process boundary.
 */
export interface DaybriefConfig extends DigestOptions {
  /** Pause between consecutive sends */
  interMessageDelayMs: number
  /** Replaces "now" when set */
  referenceInstant?: DateTime
  /** Path of the .ics export to read */
  calendarPath: string
}

export type Env = Record<string, string | undefined>

export interface LoadConfigOptions {
  /** Defaults to process.env */
  env?: Env
  /** Defaults to $DAYBRIEF_CONFIG, then ./daybrief.yaml */
  configPath?: string
}

const integer = z
  .union([z.number(), z.string().trim().regex(/^[+-]?\d+$/).transform(Number)])
  .pipe(z.number().int())

const nonNegativeInteger = integer.pipe(z.number().min(0))

const onOff = z.union([
  z.boolean(),
  z.string().transform((value, ctx) => {
    const parsed = parseSwitch(value)
    if (parsed === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an on/off value' })
      return z.NEVER
    }
    return parsed
  }),
])

const timeZone = z
  .string()
  .trim()
  .refine((zone) => IANAZone.isValidZone(zone), 'unknown time zone')

const nonEmpty = z.string().trim().min(1)

function instantIn(zone: string) {
  return z.string().transform((value, ctx) => {
    const instant = DateTime.fromISO(value.trim(), { zone })
    if (!instant.isValid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an ISO 8601 timestamp' })
      return z.NEVER
    }
    return instant
  })
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function loadYamlConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {}
  }
  try {
    const parsed: unknown = parse(readFileSync(configPath, 'utf-8'))
    return isRecord(parsed) ? parsed : {}
  } catch (err) {
    console.warn(
      `[Config] Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return {}
  }
}

/**
 * Resolve one option: the first value present (env, then yaml) is
 * validated; an invalid value falls back to the default.
 */
function resolve<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  candidates: unknown[],
  fallback: T,
): T {
  const raw = candidates.find((value) => value !== undefined && value !== null && value !== '')
  if (raw === undefined) {
    return fallback
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return result.data
  }

  console.warn(
    `[Config] Invalid ${name} ${JSON.stringify(raw)} (${result.error.issues[0]?.message ?? 'invalid'}), using default`,
  )
  return fallback
}

export function loadConfig(options: LoadConfigOptions = {}): DaybriefConfig {
  const env = options.env ?? process.env
  const configPath =
    options.configPath ?? env.DAYBRIEF_CONFIG ?? path.resolve(process.cwd(), CONFIG_FILENAME)
  const yaml = loadYamlConfig(configPath)

  const zone = resolve(
    'timeZone',
    timeZone,
    [env.DAYBRIEF_TIMEZONE, yaml.timeZone],
    DEFAULT_DIGEST_OPTIONS.timeZone,
  )

  return {
    timeZone: zone,
    locale: resolve('locale', nonEmpty, [env.DAYBRIEF_LOCALE, yaml.locale], DEFAULT_DIGEST_OPTIONS.locale),
    showMemo: resolve('showMemo', onOff, [env.SHOW_MEMO, yaml.showMemo], DEFAULT_DIGEST_OPTIONS.showMemo),
    showLinks: resolve(
      'showLinks',
      onOff,
      [env.SHOW_LINKS, yaml.showLinks],
      DEFAULT_DIGEST_OPTIONS.showLinks,
    ),
    memoMaxLength: resolve(
      'memoMaxLength',
      integer,
      [env.MEMO_MAX_LENGTH, yaml.memoMaxLength],
      DEFAULT_DIGEST_OPTIONS.memoMaxLength,
    ),
    interMessageDelayMs: resolve(
      'interMessageDelayMs',
      nonNegativeInteger,
      [env.INTER_MESSAGE_DELAY_MS, yaml.interMessageDelayMs],
      DEFAULT_INTER_MESSAGE_DELAY_MS,
    ),
    referenceInstant: resolve<DateTime | undefined>(
      'referenceInstant',
      instantIn(zone),
      [env.DAYBRIEF_NOW, yaml.referenceInstant],
      undefined,
    ),
    calendarPath: resolve(
      'calendarPath',
      nonEmpty,
      [env.ICS_PATH, yaml.calendarPath],
      DEFAULT_CALENDAR_PATH,
    ),
  }
}
