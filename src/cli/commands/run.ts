/**
 * Declarr Run Command
 *
 * One reconciliation pass over every configured instance, then exit.
 *
 * @example
 * declarr run
 * declarr run ./declarr.yml --plugin sonarr --dry-run
 */

import { processSignals, type DaemonSignal } from '../../daemon/daemon.js'
import { runPipeline } from '../../domain/pipeline.js'
import { createFatalReport, exitCodeFor } from '../../domain/report.js'
import { formatErrorForCli } from '../../lib/errors.js'
import type { CommandContext } from '../lib/context.js'
import { loadProject } from '../lib/project.js'
import * as ui from '../ui.js'

export interface RunCommandOptions {
  dryRun?: boolean
}

const STOP_SIGNALS: DaemonSignal[] = ['SIGINT', 'SIGTERM']

/**
 * Run command handler. Resolves to the process exit code.
 */
export async function runRun(context: CommandContext, options: RunCommandOptions = {}): Promise<number> {
  const { logger } = context
  const signals = context.signals ?? processSignals
  const dryRun = options.dryRun ?? false
  const startedAt = new Date()

  const controller = new AbortController()
  const onSignal = (): void => {
    if (controller.signal.aborted) return
    logger.warn('Stop requested, finishing operations already in progress')
    controller.abort()
  }
  for (const signal of STOP_SIGNALS) {
    signals.on(signal, onSignal)
  }

  try {
    const project = loadProject({ configPath: context.configPath, cwd: context.cwd, env: context.env })
    logger.info(`Loaded configuration from ${project.config.files.join(', ')}`)
    if (dryRun) {
      logger.info('Dry run: no changes will be made')
    }

    const report = await runPipeline({
      document: project.config.document,
      plugins: context.plugins,
      settings: project.settings,
      logger,
      dryRun,
      pluginFilter: context.pluginFilter,
      signal: controller.signal
    })
    ui.printReport(report)
    return exitCodeFor(report)
  } catch (error) {
    logger.error(formatErrorForCli(error))
    ui.printReport(createFatalReport(error, { mode: 'apply', dryRun, startedAt, finishedAt: new Date() }))
    return 1
  } finally {
    for (const signal of STOP_SIGNALS) {
      signals.off(signal, onSignal)
    }
  }
}
