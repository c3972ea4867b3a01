/**
 * Declarr
 *
 * Programmatic API: load a configuration, run the pipeline once or as a
 * daemon, and write plugins against the same contract the CLI uses.
 */

export * from './types.js'
export * from './lib/errors.js'
export { Logger, createSilentLogger, parseLogLevel, resolveLogLevel, type LogSink, type LoggerOptions } from './lib/logger.js'
export { loadConfig, resolveConfigPath, expandEnvVars, type ConfigDocument, type LoadedConfig } from './lib/config-loader.js'
export { parseSettings, toScheduleSpec, type DeclarrSettings, type ScheduleOverrides } from './lib/settings.js'

export { defineEnum, isEnumMember, type EnumMember, type EnumType } from './domain/enum.js'
export {
  attributes,
  computeDiff,
  dumpAttributes,
  setEquals,
  setPath,
  getPath,
  getField,
  setField,
  type AttributeMapping,
  type Change,
  type ResourceDiff
} from './domain/attributes.js'
export { resolveDependencies, validateLinks, type DependencyGraph } from './domain/graph.js'
export { runPipeline, type PipelineOptions } from './domain/pipeline.js'
export { dumpRemoteConfig, type DumpOptions } from './domain/dump.js'
export { exitCodeFor, summarizeReport, type RunReport, type InstanceReport, type RunStatus } from './domain/report.js'
export { nextRunTime, describeSchedule, formatRunTime } from './domain/schedule.js'

export { Daemon, type DaemonOptions, type DaemonState } from './daemon/daemon.js'

export {
  definePlugin,
  defineResource,
  instanceConfigSchema,
  type AnyPlugin,
  type Instance,
  type InstanceAddress,
  type InstanceConfig,
  type InstanceView,
  type Plugin,
  type Resource,
  type ResourceDeletion
} from './plugins/types.js'
export { loadInstalledPlugins } from './plugins/index.js'
export { createDummyPlugin } from './plugins/dummy/index.js'
