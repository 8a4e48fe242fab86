/**
 * Command dispatch for the daybrief CLI.
 */

import {
  IcsCalendarSource,
  loadConfig,
  type CalendarSource,
  type Env,
  type Notifier,
} from '@daybrief/core'
import { createLineNotifier, loadLineConfig, type LineConfig } from '@daybrief/channel-line'
import { parseArgs, referenceForDate, UsageError, USAGE, type CliCommand } from './cli.js'
import { runAlert } from './commands/alert.js'
import { runDump } from './commands/dump.js'
import { runTestMessage } from './commands/test-message.js'
import { runToday } from './commands/today.js'

export interface RunnerDeps {
  env: Env
  /** Path to daybrief.yaml (default: $DAYBRIEF_CONFIG or ./daybrief.yaml) */
  configPath?: string
  createSource?: (calendarPath: string) => CalendarSource
  createNotifier?: (config: LineConfig) => Notifier
  sleep?: (ms: number) => Promise<unknown>
}

function parseOrReport(argv: readonly string[]): CliCommand | null {
  try {
    return parseArgs(argv)
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message)
      console.error(USAGE)
      return null
    }
    throw err
  }
}

/**
 * Run one command and return its exit status.
 * 2 = usage error, 1 = calendar missing or a send failed, 0 = success.
 */
export async function run(
  argv: readonly string[],
  deps: RunnerDeps = { env: process.env },
): Promise<number> {
  const command = parseOrReport(argv)
  if (!command) return 2

  const createSource = deps.createSource ?? ((calendarPath) => new IcsCalendarSource(calendarPath))
  const createNotifier = deps.createNotifier ?? createLineNotifier
  const lineConfig = loadLineConfig(deps.env)

  switch (command.kind) {
    case 'help':
      console.log(USAGE)
      return 0

    case 'alert':
      return runAlert(
        command.message ?? deps.env.ALERT_MESSAGE,
        lineConfig,
        createNotifier(lineConfig),
      )

    case 'test': {
      const config = loadConfig({ env: deps.env, configPath: deps.configPath })
      return runTestMessage(command.message, config, createNotifier(lineConfig))
    }

    case 'dump':
    case 'today': {
      const loaded = loadConfig({ env: deps.env, configPath: deps.configPath })
      const config = command.date
        ? { ...loaded, referenceInstant: referenceForDate(command.date, loaded.timeZone) }
        : loaded
      const source = createSource(config.calendarPath)

      if (command.kind === 'dump') {
        return runDump(config, source)
      }
      return runToday(config, {
        source,
        notifier: createNotifier(lineConfig),
        sleep: deps.sleep,
      })
    }
  }
}
