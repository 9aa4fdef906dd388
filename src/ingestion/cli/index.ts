#!/usr/bin/env npx tsx

/**
 * Loader CLI Entry Point
 *
 * Reads protocol messages from stdin and loads them into Postgres.
 * The final checkpoint is the only thing written to stdout.
 *
 * Usage:
 *   tap-something | target-postgres --config config.json
 */

import * as readline from 'node:readline'
import { Command } from 'commander'
import { loadTargetConfig } from '@/config/targetConfig'
import { isTargetError, persistLines } from '../core'
import { PostgresSink } from '../sinks/postgres'
import { createLogger } from '@/utils/logger'
import { runWithNewContext } from '@/utils/run-context'

const log = createLogger('cli')

interface CliOptions {
  config: string
}

async function run(options: CliOptions): Promise<void> {
  const config = await loadTargetConfig(options.config)
  log.debug('Loaded configuration', { config })

  const sink = PostgresSink.connect(config)
  const input = readline.createInterface({
    input: process.stdin,
    crlfDelay: Infinity,
    terminal: false,
  })

  try {
    const summary = await persistLines(input, {
      sink,
      batchSize: config.batch_size,
    })
    log.info('Exiting normally', { records: summary.records })
  } finally {
    input.close()
    await sink.close()
  }
}

const program = new Command()

program
  .name('target-postgres')
  .description('Load line-delimited stream messages from stdin into Postgres')
  .version('1.0.0')
  .requiredOption('-c, --config <path>', 'Config file (JSON)')
  .action(async (options: CliOptions) => {
    try {
      await runWithNewContext(() => run(options))
    } catch (error) {
      log.error(
        'Load failed',
        { kind: isTargetError(error) ? error.kind : 'unexpected' },
        error,
      )
      process.exitCode = 1
    }
  })

program.parseAsync().catch((error: unknown) => {
  log.error('Unhandled CLI error', {}, error)
  process.exitCode = 1
})
