/**
 * Argument parsing for the daybrief command.
 *
 *   daybrief [--dump] [--test <message>] [--date YYYY-MM-DD]
 *   daybrief alert [message]
 */

import { DateTime } from 'luxon'

export type CliCommand =
  | { kind: 'today'; date?: string }
  | { kind: 'dump'; date?: string }
  | { kind: 'test'; message: string }
  | { kind: 'alert'; message?: string }
  | { kind: 'help' }

export const USAGE = [
  'Usage:',
  '  daybrief [--date YYYY-MM-DD]           send today\'s digest',
  '  daybrief --test <message>              send one test message',
  '  daybrief --dump [--date YYYY-MM-DD]    print normalized events, send nothing',
  '  daybrief alert [message]               send a failure alert (or $ALERT_MESSAGE)',
].join('\n')

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Accept only real calendar dates written as YYYY-MM-DD.
 */
export function parseDateArg(value: string): string {
  if (!DATE_PATTERN.test(value) || !DateTime.fromISO(value, { zone: 'UTC' }).isValid) {
    throw new UsageError(`Invalid --date "${value}", expected YYYY-MM-DD`)
  }
  return value
}

/**
 * Reference instant for a --date run: local noon of that day in `zone`.
 */
export function referenceForDate(date: string, zone: string): DateTime {
  return DateTime.fromISO(date, { zone }).set({ hour: 12 })
}

function splitFlag(arg: string): { flag: string; inline?: string } {
  const eq = arg.indexOf('=')
  if (arg.startsWith('--') && eq > 0) {
    return { flag: arg.slice(0, eq), inline: arg.slice(eq + 1) }
  }
  return { flag: arg }
}

export function parseArgs(argv: readonly string[]): CliCommand {
  if (argv[0] === 'alert') {
    const message = argv.slice(1).join(' ')
    return message ? { kind: 'alert', message } : { kind: 'alert' }
  }

  let dump = false
  let test: string | undefined
  let date: string | undefined

  let i = 0
  while (i < argv.length) {
    const { flag, inline } = splitFlag(argv[i])
    i++

    const takeValue = (): string => {
      if (inline !== undefined) return inline
      if (i >= argv.length) {
        throw new UsageError(`${flag} requires a value`)
      }
      return argv[i++]
    }

    switch (flag) {
      case '--help':
      case '-h':
        return { kind: 'help' }
      case '--dump':
        dump = true
        break
      case '--test':
        test = takeValue()
        if (!test.trim()) {
          throw new UsageError('--test requires a non-empty message')
        }
        break
      case '--date':
        date = parseDateArg(takeValue())
        break
      default:
        throw new UsageError(`Unknown argument: ${flag}`)
    }
  }

  if (dump) return date ? { kind: 'dump', date } : { kind: 'dump' }
  if (test !== undefined) return { kind: 'test', message: test }
  return date ? { kind: 'today', date } : { kind: 'today' }
}
