/**
 * CLI UI utilities
 *
 * - Data (e.g. `test-config --json`) goes to stdout
 * - Everything for humans goes to stderr
 */

import type { InstanceReport, RunReport } from '../domain/report.js'
import { formatInstanceRef } from '../types.js'
import { c, symbols } from './lib/colors.js'

export const isTTY = process.stdout.isTTY ?? false

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  console.error(message)
}

export function error(message: string): void {
  console.error(`Error: ${message}`)
}

export function warn(message: string): void {
  console.error(`Warning: ${message}`)
}

function statusSymbol(instance: InstanceReport): string {
  switch (instance.outcome) {
    case 'ok':
      return symbols.success
    case 'partial':
      return symbols.warning
    case 'failed':
      return symbols.error
    case 'skipped':
      return symbols.skipped
  }
}

function describeOutcome(instance: InstanceReport, dryRun: boolean): string {
  if (instance.outcome === 'failed' || instance.outcome === 'skipped') {
    const text = `${instance.outcome} at ${instance.stage ?? 'unknown stage'}${instance.reason ? `: ${instance.reason}` : ''}`
    return instance.outcome === 'failed' ? c.error(text) : c.label(text)
  }

  const count = instance.changes.length
  if (count === 0 && instance.deletions.length === 0 && instance.errors.length === 0) {
    return c.muted('up to date')
  }
  const parts = [`${count} ${count === 1 ? 'change' : 'changes'} ${dryRun ? 'planned' : 'applied'}`]
  if (instance.deletions.length > 0) {
    parts.push(`${instance.deletions.length} ${dryRun ? 'to delete' : 'deleted'}`)
  }
  if (instance.errors.length > 0) {
    parts.push(c.warning(`${instance.errors.length} ${instance.errors.length === 1 ? 'error' : 'errors'}`))
  }
  return parts.join(', ')
}

/**
 * Coloured run summary, one block per instance
 */
export function formatReport(report: RunReport): string[] {
  const lines: string[] = []
  const title = report.mode === 'validate'
    ? 'Validation'
    : report.dryRun ? 'Planned changes' : 'Run summary'
  lines.push(c.header(title))

  for (const instance of report.instances) {
    const name = formatInstanceRef(instance.ref)
    lines.push(`  ${statusSymbol(instance)} ${c.instance(name)}  ${describeOutcome(instance, report.dryRun)}`)

    for (const change of instance.changes) {
      lines.push(`      ${symbols.tilde} ${c.path(change.display)}`)
    }
    for (const deletion of instance.deletions) {
      lines.push(`      ${symbols.minus} ${deletion}`)
    }
    for (const err of instance.errors) {
      lines.push(`      ${symbols.error} ${err.resource} ${err.operation}: ${c.error(err.message)}`)
    }
  }

  const seconds = (report.durationMs / 1000).toFixed(1)
  switch (report.status) {
    case 'success':
      lines.push(`${symbols.success} ${c.success(`Finished in ${seconds}s`)}`)
      break
    case 'cancelled':
      lines.push(`${symbols.warning} ${c.warning(`Cancelled after ${seconds}s`)}`)
      break
    case 'partial':
      lines.push(`${symbols.error} ${c.error(`Finished with failures in ${seconds}s`)}`)
      break
    case 'fatal':
      lines.push(`${symbols.error} ${c.error(`Failed: ${report.error ?? 'unknown error'}`)}`)
      break
  }

  return lines
}

export function printReport(report: RunReport): void {
  for (const line of formatReport(report)) {
    log(line)
  }
}
