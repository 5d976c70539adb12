/**
 * Console report for a finished cycle
 */

import type { CycleSummary } from '../core/types.js'

function pad(value: string | number, width: number): string {
  return String(value).padEnd(width)
}

export function formatCycleSummary(summary: CycleSummary): string[] {
  const lines = [
    `✨ Cycle complete in ${(summary.duration / 1000).toFixed(1)}s${summary.stoppedEarly ? ' (stopped early)' : ''}`,
    `   ${pad('source', 12)}${pad('seen', 7)}${pad('new', 7)}${pad('updated', 9)}${pad('skipped', 9)}errors`
  ]

  for (const adapter of summary.adapters) {
    const mark = adapter.failed ? '✗' : '✓'
    lines.push(
      ` ${mark} ${pad(adapter.source, 12)}${pad(adapter.listingsSeen, 7)}${pad(adapter.inserted, 7)}` +
        `${pad(adapter.updated, 9)}${pad(adapter.skipped, 9)}${adapter.errors}` +
        (adapter.error ? `  (${adapter.error})` : '')
    )
  }

  const { totals } = summary
  lines.push(
    `   Total: ${totals.listingsSeen} seen, ${totals.inserted} new, ${totals.updated} updated, ` +
      `${totals.skipped} skipped, ${totals.errors} errors; ${summary.expired} expired`
  )
  return lines
}

export function printCycleSummary(summary: CycleSummary): void {
  console.log('\n' + formatCycleSummary(summary).join('\n'))
}
