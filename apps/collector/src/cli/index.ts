#!/usr/bin/env node
import '../env.js'
import { loggers } from '../config/logger.js'
import { loadSettings } from '../config/settings.js'
import { CollectionError } from '../collection/errors.js'
import { runCollectCommand } from './commands/collect.js'
import { runHealthCommand } from './commands/health.js'
import { runSourcesCommand } from './commands/sources.js'
import { asNumber, asString, parseFlags } from './parse-flags.js'
import { createRegistry, createRuntime } from './runtime.js'

function printHelp(): void {
  console.log('Macro data collector')
  console.log('')
  console.log('Commands:')
  console.log('  sources')
  console.log('  health --source <id|all>')
  console.log('  collect --source <id|all> [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--full] [--deadline <ms>]')
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

  const settings = loadSettings()

  switch (command) {
    case 'sources':
      return runSourcesCommand(createRegistry(settings))
    case 'health':
    case 'collect': {
      const runtime = createRuntime(settings)
      try {
        if (command === 'health') {
          return await runHealthCommand({ sourceId: asString(flags.source) }, runtime)
        }
        return await runCollectCommand(
          {
            sourceId: asString(flags.source),
            start: asString(flags.start),
            end: asString(flags.end),
            full: flags.full === true,
            deadlineMs: asNumber(flags.deadline),
          },
          runtime
        )
      } finally {
        await runtime.close()
      }
    }
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      return 2
  }
}

main()
  .then(exitCode => {
    process.exit(exitCode)
  })
  .catch((error: unknown) => {
    if (error instanceof CollectionError) {
      console.error(`${error.kind}: ${error.message}`)
      process.exit(1)
    }
    loggers.cli.fatal('Collector crashed', {}, error)
    process.exit(1)
  })
