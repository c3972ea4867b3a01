/**
 * Declarr Daemon Command
 *
 * Runs once at startup, then on the configured schedule and whenever a
 * watched configuration file changes. SIGHUP reloads, SIGINT/SIGTERM stop.
 *
 * @example
 * declarr daemon
 * declarr daemon --watch --update-day monday --update-day friday --update-time 04:30
 */

import { Daemon, type Timers } from '../../daemon/daemon.js'
import { runPipeline } from '../../domain/pipeline.js'
import { formatErrorForCli } from '../../lib/errors.js'
import type { ScheduleOverrides } from '../../lib/settings.js'
import type { WatcherFactory } from '../../lib/watcher.js'
import type { CommandContext } from '../lib/context.js'
import { loadProject, type Project } from '../lib/project.js'
import * as ui from '../ui.js'

export interface DaemonCommandOptions extends ScheduleOverrides {
  timers?: Timers
  createWatcher?: WatcherFactory
  now?: () => Date
}

/**
 * Daemon command handler. Resolves to the process exit code once stopped.
 */
export async function runDaemon(context: CommandContext, options: DaemonCommandOptions = {}): Promise<number> {
  const { logger } = context
  const { timers, createWatcher, now, ...overrides } = options

  const daemon = new Daemon<Project>({
    load: async () => loadProject({
      configPath: context.configPath,
      cwd: context.cwd,
      env: context.env,
      overrides
    }),
    run: async (project, signal) => {
      const report = await runPipeline({
        document: project.config.document,
        plugins: context.plugins,
        settings: project.settings,
        logger,
        pluginFilter: context.pluginFilter,
        signal,
        now
      })
      ui.printReport(report)
      return report
    },
    logger,
    now,
    timers,
    createWatcher,
    signals: context.signals
  })

  try {
    await daemon.start()
    return 0
  } catch (error) {
    logger.error(formatErrorForCli(error))
    return 1
  }
}
