#!/usr/bin/env node
/**
 * daybrief: send today's calendar digest to LINE.
 */

import { run } from './run.js'

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2))
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
