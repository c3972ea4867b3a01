/**
 * Configuration loading shared by the CLI commands
 */

import { loadConfig, resolveConfigPath, type LoadedConfig } from '../../lib/config-loader.js'
import { SETTINGS_SECTION, parseSettings, toScheduleSpec, type DeclarrSettings, type ScheduleOverrides } from '../../lib/settings.js'
import type { DaemonConfig } from '../../daemon/daemon.js'
import type { ScheduleSpec } from '../../types.js'

export interface Project extends DaemonConfig {
  config: LoadedConfig
  settings: DeclarrSettings
  schedule: ScheduleSpec
}

export interface LoadProjectOptions {
  configPath?: string
  cwd?: string
  env?: NodeJS.ProcessEnv
  overrides?: ScheduleOverrides
}

/**
 * Resolve, load and validate the configuration file and the `declarr` section
 */
export function loadProject(options: LoadProjectOptions = {}): Project {
  const env = options.env ?? process.env
  const path = resolveConfigPath(options.configPath, options.cwd)
  const config = loadConfig(path, env)
  const settings = parseSettings(config.document[SETTINGS_SECTION])

  return {
    config,
    settings,
    schedule: toScheduleSpec(settings, options.overrides),
    files: config.files
  }
}
