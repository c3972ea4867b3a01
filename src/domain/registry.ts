/**
 * Instance Registry
 *
 * Turns the merged configuration document into validated instance records,
 * one per (plugin, instance). Built fresh for every run.
 */

import { ZodError } from 'zod'
import {
  InvalidConfigError,
  NoPluginsConfiguredError,
  ReservedInstanceNameError,
  UnknownPluginError,
  isDeclarrError
} from '../lib/errors.js'
import { INCLUDES_KEY, deepMerge, isPlainObject, type ConfigDocument } from '../lib/config-loader.js'
import { SETTINGS_SECTION } from '../lib/settings.js'
import type { AnyPlugin, InstanceConfig } from '../plugins/types.js'
import {
  DEFAULT_INSTANCE_NAME,
  compareInstanceRefs,
  formatInstanceRef,
  instanceKey,
  type InstanceConnection,
  type InstanceRef
} from '../types.js'

const RESERVED_SECTIONS = [SETTINGS_SECTION, INCLUDES_KEY]

export interface InstanceRecord {
  ref: InstanceRef
  plugin: AnyPlugin
  config: InstanceConfig
}

export interface InstanceRegistry {
  /** Active plugins, sorted by name */
  plugins: AnyPlugin[]
  /** Every instance of every active plugin, sorted by (plugin, instance) */
  instances: InstanceRecord[]
  get(ref: InstanceRef): InstanceRecord | undefined
}

export interface RegistryOptions {
  /** Only use these plugins (all configured plugins when empty) */
  pluginFilter?: readonly string[]
}

/**
 * Connection parameters of an instance
 */
export function connectionOf(config: InstanceConfig, requestTimeoutSeconds: number): InstanceConnection {
  return {
    hostname: config.hostname,
    port: config.port,
    protocol: config.protocol,
    url: `${config.protocol}://${config.hostname}:${config.port}`,
    timeoutMs: Math.round(requestTimeoutSeconds * 1000)
  }
}

function parseInstanceConfig(plugin: AnyPlugin, ref: InstanceRef, raw: Record<string, unknown>): InstanceConfig {
  const location = formatInstanceRef(ref)
  try {
    return plugin.parseConfig(raw)
  } catch (error) {
    if (error instanceof ZodError) {
      throw InvalidConfigError.fromZodIssues(location, error.issues)
    }
    if (isDeclarrError(error)) {
      throw error
    }
    throw new InvalidConfigError(error instanceof Error ? error.message : String(error), {
      location,
      cause: error
    })
  }
}

/**
 * Merge order for a named instance: `{ hostname: <name> }`, then the
 * plugin-wide keys, then the instance's own keys.
 */
function buildPluginInstances(plugin: AnyPlugin, rawSection: unknown): InstanceRecord[] {
  const section = rawSection ?? {}
  if (!isPlainObject(section)) {
    throw new InvalidConfigError('plugin section must be a mapping', { location: plugin.name })
  }

  const { instances: rawInstances, ...globalConfig } = section
  const instances = rawInstances === undefined || rawInstances === null ? {} : rawInstances
  if (!isPlainObject(instances)) {
    throw new InvalidConfigError('"instances" must be a mapping of instance names to configurations', {
      location: plugin.name
    })
  }

  if (Object.keys(instances).length === 0) {
    const ref = { plugin: plugin.name, instance: DEFAULT_INSTANCE_NAME }
    return [{ ref, plugin, config: parseInstanceConfig(plugin, ref, globalConfig) }]
  }

  const records: InstanceRecord[] = []
  for (const [name, instanceSection] of Object.entries(instances)) {
    if (name === DEFAULT_INSTANCE_NAME) {
      throw new ReservedInstanceNameError(plugin.name, name)
    }
    const ref = { plugin: plugin.name, instance: name }
    const own = instanceSection === null || instanceSection === undefined ? {} : instanceSection
    if (!isPlainObject(own)) {
      throw new InvalidConfigError('instance section must be a mapping', { location: formatInstanceRef(ref) })
    }
    const merged = deepMerge(deepMerge({ hostname: name }, globalConfig), own)
    records.push({ ref, plugin, config: parseInstanceConfig(plugin, ref, merged) })
  }
  return records
}

/**
 * Validate the configuration document against the installed plugins
 */
export function buildRegistry(
  document: ConfigDocument,
  installed: readonly AnyPlugin[],
  options: RegistryOptions = {}
): InstanceRegistry {
  const byName = new Map(installed.map(plugin => [plugin.name, plugin]))
  const available = [...byName.keys()].sort()

  for (const section of Object.keys(document)) {
    if (!RESERVED_SECTIONS.includes(section) && !byName.has(section)) {
      throw new UnknownPluginError(section, available)
    }
  }

  const filter = options.pluginFilter ?? []
  for (const name of filter) {
    if (!byName.has(name)) {
      throw new UnknownPluginError(name, available)
    }
  }

  const plugins = installed
    .filter(plugin => plugin.name in document)
    .filter(plugin => filter.length === 0 || filter.includes(plugin.name))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  if (plugins.length === 0) {
    throw new NoPluginsConfiguredError()
  }

  const instances = plugins
    .flatMap(plugin => buildPluginInstances(plugin, document[plugin.name]))
    .sort((a, b) => compareInstanceRefs(a.ref, b.ref))
  const index = new Map(instances.map(record => [instanceKey(record.ref), record]))

  return {
    plugins,
    instances,
    get(ref: InstanceRef): InstanceRecord | undefined {
      return index.get(instanceKey(ref))
    }
  }
}
