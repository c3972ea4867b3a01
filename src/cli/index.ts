#!/usr/bin/env node
/**
 * Declarr CLI
 *
 * Declarative configuration reconciler for self-hosted application instances
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command, InvalidArgumentError, Option } from 'commander'
import { formatErrorForCli } from '../lib/errors.js'
import { Logger, resolveLogLevel } from '../lib/logger.js'
import { parseTimeOfDay, parseWeekday } from '../lib/settings.js'
import { loadInstalledPlugins } from '../plugins/index.js'
import type { LogLevel, TimeOfDay, Weekday } from '../types.js'
import { canDumpConfig } from '../domain/dump.js'
import { runDaemon } from './commands/daemon.js'
import { runDumpConfig } from './commands/dump-config.js'
import { runRun } from './commands/run.js'
import { runTestConfig } from './commands/test-config.js'
import type { CommandContext } from './lib/context.js'
import * as ui from './ui.js'

const VERSION = process.env.DECLARR_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli or src/cli to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

// ============================================================================
// Option parsers
// ============================================================================

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

function collectWeekday(value: string, previous: Weekday[] = []): Weekday[] {
  const day = parseWeekday(value)
  if (!day) {
    throw new InvalidArgumentError(`"${value}" is not a weekday name.`)
  }
  return [...previous, day]
}

function collectTime(value: string, previous: TimeOfDay[] = []): TimeOfDay[] {
  const time = parseTimeOfDay(value)
  if (!time) {
    throw new InvalidArgumentError(`"${value}" is not a time of day (HH:MM).`)
  }
  return [...previous, time]
}

interface GlobalOptions {
  plugin?: string[]
  logLevel?: string
}

/**
 * Build the handler context from global options.
 * Returns undefined (after reporting) when the options are invalid.
 */
function createContext(configPath: string | undefined, options: GlobalOptions): CommandContext | undefined {
  let level: LogLevel
  try {
    level = resolveLogLevel(options.logLevel)
  } catch (error) {
    ui.error(formatErrorForCli(error))
    return undefined
  }

  return {
    configPath,
    plugins: loadInstalledPlugins(),
    pluginFilter: options.plugin,
    logger: new Logger({ level })
  }
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(): Command {
  const program = new Command()

  program
    .name('declarr')
    .description('Declarative configuration reconciler for self-hosted application instances')
    .version(VERSION)
    .showHelpAfterError()

  const withGlobalOptions = (command: Command): Command => command
    .argument('[config]', 'configuration file (default: declarr.yml)')
    .option('-p, --plugin <name>', 'only process this plugin (repeatable)', collect)
    .addOption(new Option('-l, --log-level <level>', 'log level').choices(['trace', 'debug', 'info', 'warn', 'warning', 'error']))

  withGlobalOptions(program.command('run'))
    .description('reconcile every configured instance once and exit')
    .option('--dry-run', 'compute and report changes without applying them', false)
    .action(async (configPath: string | undefined, options: GlobalOptions & { dryRun: boolean }) => {
      const context = createContext(configPath, options)
      process.exitCode = context ? await runRun(context, { dryRun: options.dryRun }) : 1
    })

  withGlobalOptions(program.command('daemon'))
    .description('run now, then on a schedule and on configuration changes')
    .option('--watch', 'reload and run when a configuration file changes')
    .option('--no-watch', 'do not watch configuration files')
    .option('--update-day <day>', 'weekday to run on (repeatable, overrides the file)', collectWeekday)
    .option('--update-time <HH:MM>', 'time of day to run at (repeatable, overrides the file)', collectTime)
    .action(async (
      configPath: string | undefined,
      options: GlobalOptions & { watch?: boolean; updateDay?: Weekday[]; updateTime?: TimeOfDay[] }
    ) => {
      const context = createContext(configPath, options)
      process.exitCode = context
        ? await runDaemon(context, {
          watchConfig: options.watch,
          updateDays: options.updateDay,
          updateTimes: options.updateTime
        })
        : 1
    })

  withGlobalOptions(program.command('test-config'))
    .description('validate the configuration without contacting any instance')
    .option('--json', 'print the result as JSON', false)
    .action(async (configPath: string | undefined, options: GlobalOptions & { json: boolean }) => {
      const context = createContext(configPath, options)
      process.exitCode = context ? await runTestConfig(context, { json: options.json }) : 1
    })

  // Ad-hoc commands against a live instance, one group per plugin
  for (const plugin of loadInstalledPlugins().filter(canDumpConfig)) {
    program.command(plugin.name)
      .description(`${plugin.name} instance ad-hoc commands`)
      .command('dump-config')
      .description('print the configuration of a live instance as YAML')
      .argument('<url>', 'instance URL, e.g. http://localhost:5000')
      .option('-k, --api-key <key>', 'instance API key (fetched from the instance when omitted)')
      .addOption(new Option('-l, --log-level <level>', 'log level').choices(['trace', 'debug', 'info', 'warn', 'warning', 'error']))
      .action(async (url: string, options: { apiKey?: string; logLevel?: string }) => {
        const context = createContext(undefined, { logLevel: options.logLevel })
        process.exitCode = context ? await runDumpConfig(context, plugin.name, url, { apiKey: options.apiKey }) : 1
      })
  }

  return program
}

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  ui.error(formatErrorForCli(error))
  process.exitCode = 1
})
