#!/usr/bin/env -S npx tsx
/**
 * stockprobe CLI
 *
 *   probe --url <url> [--browser] [--no-solver] [--keep-language] [--proxy <url>] [--body]
 *   scan --site <key> --url-template <url with {id}> --marker "<text>" [...]
 *
 * Common: --config <path> (default config/config.json or STOCKPROBE_CONFIG), --verbose
 */

import '../env.js'
import { setLogLevel } from '@stockprobe/logger'
import { runProbeCommand } from './commands/probe.js'
import { runScanCommand } from './commands/scan.js'
import { asNumber, asString, parseFlags } from './parse-flags.js'
import { loggers } from '../config/logger.js'
import { ConfigurationError, loadSettings } from '../config/settings.js'
import { createFetchLayer } from '../fetch/index.js'
import { describeError } from '../fetch/errors.js'
import { ScanRunner } from '../scan/scan-runner.js'

const log = loggers.cli

function printHelp(): void {
  console.log('stockprobe CLI')
  console.log('')
  console.log('Commands:')
  console.log('  probe --url <url> [--browser] [--no-solver] [--keep-language] [--proxy <url>] [--body]')
  console.log('  scan --site <key> --url-template "<url with {id}>" --marker "<text>" [--absent-marker "<text>"]')
  console.log('       [--hard-max 2000] [--learned-high N] [--start-id N] [--floor N] [--tail N] [--streak N]')
  console.log('       [--batch N] [--workers N] [--browser]')
  console.log('')
  console.log('Options:')
  console.log('  --config <path>   config file (default config/config.json, or STOCKPROBE_CONFIG)')
  console.log('  --verbose         debug logging')
}

function installProcessHandlers(): void {
  process.on('unhandledRejection', reason => {
    log.fatal('Unhandled rejection', {}, reason)
    process.exit(1)
  })
  process.on('uncaughtException', error => {
    log.fatal('Uncaught exception', {}, error)
    process.exit(1)
  })
}

async function main(): Promise<number> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    return 0
  }

  const flags = parseFlags(rest)
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }
  if (flags.verbose === true) {
    setLogLevel('debug')
  }

  const configPath = asString(flags.config)
  const settings = configPath ? loadSettings(configPath) : loadSettings()
  const layer = createFetchLayer(settings)

  try {
    switch (command) {
      case 'probe':
        return await runProbeCommand(
          {
            url: asString(flags.url),
            allowBrowser: flags.browser === true,
            allowChallengeSolver: flags['no-solver'] !== true,
            forceEnglish: flags['keep-language'] !== true,
            proxyUrl: asString(flags.proxy) || undefined,
            showBody: flags.body === true,
          },
          { fetcher: layer.orchestrator, markers: settings.challengeMarkers }
        )
      case 'scan':
        return await runScanCommand(
          {
            site: asString(flags.site),
            urlTemplate: asString(flags['url-template']),
            marker: asString(flags.marker),
            absentMarker: asString(flags['absent-marker']) || undefined,
            hardMax: asNumber(flags['hard-max']),
            learnedHigh: asNumber(flags['learned-high']),
            startId: asNumber(flags['start-id']),
            initialFloor: asNumber(flags.floor),
            tailWindow: asNumber(flags.tail),
            inactiveStreakLimit: asNumber(flags.streak),
            batchSize: asNumber(flags.batch),
            maxWorkers: asNumber(flags.workers),
            allowBrowser: flags.browser === true,
          },
          { fetcher: layer.orchestrator, runner: new ScanRunner(settings.scanner) }
        )
      default:
        console.error(`Unknown command: ${command}`)
        printHelp()
        return 2
    }
  } finally {
    await layer.close()
  }
}

installProcessHandlers()

main()
  .then(exitCode => process.exit(exitCode))
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(error.message)
      process.exit(2)
    }
    log.error('Command failed', { error: describeError(error) }, error)
    process.exit(1)
  })
