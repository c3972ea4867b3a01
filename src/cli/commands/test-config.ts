/**
 * Declarr Test Config Command
 *
 * Loads and validates the configuration without contacting any instance:
 * schemas, the pre-init render, instance links and dependency cycles.
 *
 * @example
 * declarr test-config
 * declarr test-config ./declarr.yml --json
 */

import { runPipeline } from '../../domain/pipeline.js'
import { describeSchedule } from '../../domain/schedule.js'
import { formatErrorForCli, isDeclarrError } from '../../lib/errors.js'
import { formatInstanceRef } from '../../types.js'
import { c, print, symbols } from '../lib/colors.js'
import type { CommandContext } from '../lib/context.js'
import { loadProject } from '../lib/project.js'
import * as ui from '../ui.js'

export interface TestConfigCommandOptions {
  /** Print the result as JSON on stdout */
  json?: boolean
}

export async function runTestConfig(context: CommandContext, options: TestConfigCommandOptions = {}): Promise<number> {
  const { logger } = context

  try {
    const project = loadProject({ configPath: context.configPath, cwd: context.cwd, env: context.env })
    const report = await runPipeline({
      document: project.config.document,
      plugins: context.plugins,
      settings: project.settings,
      logger,
      mode: 'validate',
      pluginFilter: context.pluginFilter
    })

    const failed = report.instances.filter(instance => instance.outcome !== 'ok')

    if (options.json) {
      ui.output(JSON.stringify({
        valid: failed.length === 0,
        files: project.config.files,
        order: report.instances.map(instance => formatInstanceRef(instance.ref)),
        failures: failed.map(instance => ({
          instance: formatInstanceRef(instance.ref),
          reason: instance.reason ?? null
        }))
      }, null, 2))
    } else {
      ui.log(c.header('Files'))
      for (const file of project.config.files) {
        print.item(c.path(file))
      }
      ui.log(c.header('Execution order'))
      report.instances.forEach((instance, index) => {
        const mark = instance.outcome === 'ok' ? symbols.success : symbols.error
        const reason = instance.reason ? ` ${c.error(instance.reason)}` : ''
        ui.log(`  ${index + 1}. ${mark} ${c.instance(formatInstanceRef(instance.ref))}${reason}`)
      })
      ui.log(c.header('Schedule'))
      for (const line of describeSchedule(project.schedule)) {
        print.item(line)
      }
    }

    if (failed.length > 0) {
      print.error('Configuration is invalid')
      return 1
    }
    print.success('Configuration is valid')
    return 0
  } catch (error) {
    if (options.json) {
      ui.output(JSON.stringify({
        valid: false,
        error: isDeclarrError(error) ? error.toJSON() : { message: formatErrorForCli(error) }
      }, null, 2))
    }
    logger.error(formatErrorForCli(error))
    print.error('Configuration is invalid')
    return 1
  }
}
