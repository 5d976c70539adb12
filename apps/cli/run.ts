#!/usr/bin/env node
/**
 * CLI runner
 *
 * Usage:
 *   node apps/cli/run.js serve              - Run a cycle now and then on the interval
 *   node apps/cli/run.js cycle              - Run one cycle and exit
 *   node apps/cli/run.js source <id>        - Run one adapter (plus the expiry sweep)
 *   node apps/cli/run.js list               - List adapters and whether they are enabled
 *
 * Add --dry-run to any command to write to an in-memory store instead of Supabase.
 */

import 'dotenv/config'
import { createDatabase } from '../../packages/core/database.js'
import type { Database } from '../../packages/core/database.js'
import { ConfigError, describeError } from '../../packages/core/errors.js'
import { InMemoryDatabase } from '../../packages/core/memory-database.js'
import { loadSettings } from '../../packages/core/settings.js'
import type { Settings } from '../../packages/core/settings.js'
import { createPipeline } from '../../packages/orchestrator/pipeline.js'
import { loadAllAdapters } from '../../packages/orchestrator/registry.js'

const argv = process.argv.slice(2)
const flags = new Set(argv.filter(value => value.startsWith('--')))
const [command, arg] = argv.filter(value => !value.startsWith('--'))
const dryRun = flags.has('--dry-run')

function usage(): void {
  console.error('Usage: node apps/cli/run.js <command> [args] [--dry-run]')
  console.error('')
  console.error('Commands:')
  console.error('  serve        - Run a cycle now, then every SCRAPE_INTERVAL_MINUTES')
  console.error('  cycle        - Run a single cycle and exit')
  console.error('  source <id>  - Run one adapter by id (e.g. eventbrite)')
  console.error('  list         - List all adapters')
}

function openStore(): Database {
  if (dryRun) {
    console.log('🧪 Dry run: events are kept in memory and discarded on exit\n')
    return new InMemoryDatabase()
  }
  return createDatabase()
}

async function serve(settings: Readonly<Settings>): Promise<void> {
  const scheduler = await createPipeline(settings, { db: openStore() })

  let stopping = false
  const shutdown = (signal: string) => {
    if (stopping) return
    stopping = true
    console.log(`\n${signal} received, shutting down...`)
    scheduler.stop().then(
      () => process.exit(0),
      error => {
        console.error('❌ Shutdown failed:', describeError(error))
        process.exit(1)
      }
    )
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  scheduler.start()
}

async function main(): Promise<void> {
  try {
    if (!command) {
      usage()
      process.exit(1)
    }

    const settings = loadSettings()

    if (command === 'serve') {
      await serve(settings)
    }

    else if (command === 'cycle') {
      const scheduler = await createPipeline(settings, { db: openStore() })
      await scheduler.runCycle()
    }

    else if (command === 'source') {
      if (!arg) {
        console.error('Error: adapter id required')
        console.error('Usage: node apps/cli/run.js source <id>')
        process.exit(1)
      }
      const adapters = await loadAllAdapters(settings)
      const adapter = adapters.find(a => a.id === arg)
      if (!adapter) {
        throw new ConfigError(`Unknown adapter: ${arg} (known: ${adapters.map(a => a.id).join(', ')})`)
      }
      const scheduler = await createPipeline(settings, { db: openStore(), adapters: [adapter] })
      await scheduler.runCycle()
    }

    else if (command === 'list') {
      const adapters = await loadAllAdapters(settings)

      console.log('\n📋 Available adapters:\n')
      adapters.forEach(adapter => {
        const enabled = settings.enabledSources.includes(adapter.id)
        console.log(`  ${adapter.id}${enabled ? '' : ' (disabled)'}`)
        console.log(`    ${adapter.name} - ${adapter.baseUrl}`)
        console.log()
      })
      console.log(`Total: ${adapters.length} adapter(s)`)
    }

    else {
      console.error(`Unknown command: ${command}`)
      usage()
      process.exit(1)
    }

  } catch (error) {
    console.error('\n❌ Error:', describeError(error))
    if (!(error instanceof ConfigError) && error instanceof Error) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
