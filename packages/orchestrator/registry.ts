/**
 * Adapter registry
 *
 * Discovers packages/sources/<name>/adapter.{ts,js} and builds each default
 * export against the current settings. Adding a source means adding a
 * directory; nothing here changes.
 */

import { glob } from 'glob'
import path from 'path'
import { fileURLToPath, pathToFileURL } from 'url'
import type { Settings } from '../core/settings.js'
import type { AdapterFactory, SourceAdapter } from '../sources/types.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
const SOURCES_DIR = path.join(__dirname, '../sources')

function isAdapterFactory(value: unknown): value is AdapterFactory {
  return typeof value === 'function'
}

/**
 * Every adapter found on disk, ordered by id
 */
export async function loadAllAdapters(settings: Readonly<Settings>): Promise<SourceAdapter[]> {
  const files = await glob('*/adapter.{ts,js}', {
    cwd: SOURCES_DIR,
    absolute: true,
    ignore: ['**/*.test.*', '**/*.d.ts']
  })

  const adapters: SourceAdapter[] = []
  const seen = new Set<string>()

  for (const file of files.sort()) {
    const module: { default?: unknown } = await import(pathToFileURL(file).href)
    if (!isAdapterFactory(module.default)) {
      console.error(`[registry] ${file} has no default adapter factory, ignoring`)
      continue
    }

    const adapter = module.default(settings)
    if (seen.has(adapter.id)) continue
    seen.add(adapter.id)
    adapters.push(adapter)
  }

  return adapters.sort((a, b) => a.id.localeCompare(b.id))
}

/**
 * Adapters the settings leave enabled
 */
export async function loadEnabledAdapters(settings: Readonly<Settings>): Promise<SourceAdapter[]> {
  const adapters = await loadAllAdapters(settings)
  return adapters.filter(adapter => settings.enabledSources.includes(adapter.id))
}
