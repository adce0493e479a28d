#!/usr/bin/env node
/**
 * harvester CLI
 *
 * Sums the Golden Eagle cost (Talisman + Aces) of every unit in the
 * War Thunder wiki tech trees and prints the total.
 */

import { parseFlags, toSettingsInput, unknownFlags } from './cli/parse-flags.js'
import { loggers } from './config/logger.js'
import { ConfigError, loadSettings } from './config/settings.js'
import type { HarvesterSettings } from './config/settings.js'
import { createHarvester } from './harvester.js'

const log = loggers.cli

function formatResultLine(total: number): string {
  return `Total GE cost of all units: ${total}`
}

function printHelp(): void {
  console.log('Usage: harvester [options]')
  console.log('')
  console.log('Options:')
  console.log('  --category <name...>   Tech trees to sum (default: aviation helicopters ground ships boats)')
  console.log('  --concurrency <n>      Unit pages fetched in parallel (default: 3)')
  console.log('  --delay-ms <n>         Pause before each unit page fetch (default: 1500)')
  console.log('  --max-attempts <n>     Attempts per request (default: 5)')
  console.log('  --help, -h             Show this help')
}

async function main(): Promise<number> {
  const flags = parseFlags(process.argv.slice(2))
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  const unknown = unknownFlags(flags)
  if (unknown.length > 0) {
    log.error('Unknown options', { options: unknown.map(key => `--${key}`) })
    printHelp()
    return 2
  }

  let settings: HarvesterSettings
  try {
    settings = loadSettings(toSettingsInput(flags))
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(error.message, { issues: error.issues })
      return 2
    }
    throw error
  }

  log.info('Starting run', { categories: settings.categories, concurrency: settings.concurrency })
  const summary = await createHarvester(settings).run()
  console.log(formatResultLine(summary.total))
  return 0
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch(error => {
    log.fatal('Run aborted', {}, error)
    process.exitCode = 1
  })
