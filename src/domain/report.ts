/**
 * Run reports
 */

import type { Change } from './attributes.js'
import { errorMessage } from '../lib/errors.js'
import { formatInstanceRef, type InstanceRef, type RunMode, type RunStage } from '../types.js'

export type RunStatus = 'success' | 'partial' | 'fatal' | 'cancelled'

export type InstanceOutcome = 'ok' | 'partial' | 'failed' | 'skipped'

export interface ResourceError {
  resource: string
  operation: 'fetch' | 'apply' | 'delete'
  message: string
}

export interface InstanceReport {
  ref: InstanceRef
  outcome: InstanceOutcome
  /** Stage at which the instance failed or was skipped */
  stage?: RunStage
  reason?: string
  /** Changes applied, or only planned in a dry run */
  changes: Change[]
  /** Remote items deleted (or planned for deletion in a dry run) */
  deletions: string[]
  errors: ResourceError[]
}

export interface RunReport {
  status: RunStatus
  mode: RunMode
  dryRun: boolean
  startedAt: Date
  finishedAt: Date
  durationMs: number
  /** Instances in execution order */
  instances: InstanceReport[]
  /** Set when the run aborted before it started */
  error?: string
}

export function deriveStatus(instances: readonly InstanceReport[], cancelled: boolean): RunStatus {
  if (cancelled) return 'cancelled'
  return instances.every(instance => instance.outcome === 'ok') ? 'success' : 'partial'
}

/**
 * Report for a run that never started, e.g. because of a configuration error
 */
export function createFatalReport(error: unknown, options: { mode: RunMode; dryRun: boolean; startedAt: Date; finishedAt: Date }): RunReport {
  return {
    status: 'fatal',
    mode: options.mode,
    dryRun: options.dryRun,
    startedAt: options.startedAt,
    finishedAt: options.finishedAt,
    durationMs: options.finishedAt.getTime() - options.startedAt.getTime(),
    instances: [],
    error: errorMessage(error)
  }
}

/**
 * Process exit code for a finished run
 */
export function exitCodeFor(report: RunReport): number {
  switch (report.status) {
    case 'success':
      return 0
    case 'cancelled':
      return 2
    default:
      return 1
  }
}

const STATUS_TEXT: Record<RunStatus, string> = {
  success: 'Run finished successfully',
  partial: 'Run finished with failures',
  fatal: 'Run failed before it started',
  cancelled: 'Run cancelled'
}

/**
 * Plain-text summary lines, one per instance plus a final status line
 */
export function summarizeReport(report: RunReport): string[] {
  const lines: string[] = []

  for (const instance of report.instances) {
    const name = formatInstanceRef(instance.ref)
    const changeCount = instance.changes.length
    const verb = report.dryRun ? 'planned' : 'applied'
    let line = `${name}: ${instance.outcome}`

    if (instance.outcome === 'failed' || instance.outcome === 'skipped') {
      line += ` at ${instance.stage ?? 'unknown stage'}`
      if (instance.reason) line += `: ${instance.reason}`
    } else {
      line += ` (${changeCount} ${changeCount === 1 ? 'change' : 'changes'} ${verb}`
      if (instance.deletions.length > 0) {
        line += `, ${instance.deletions.length} deleted`
      }
      line += ')'
    }
    lines.push(line)

    for (const err of instance.errors) {
      lines.push(`  ${err.resource} ${err.operation} failed: ${err.message}`)
    }
  }

  const seconds = (report.durationMs / 1000).toFixed(1)
  let status = `${STATUS_TEXT[report.status]} in ${seconds}s`
  if (report.error) status += `: ${report.error}`
  lines.push(status)

  return lines
}
