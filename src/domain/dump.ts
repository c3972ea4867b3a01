/**
 * Dump a live instance as configuration
 *
 * Connects to an instance given by address, fetches every resource and reads
 * each dumpable attribute back into its configuration path: the reverse of
 * the attribute mappings the pipeline applies.
 */

import { ZodError } from 'zod'
import {
  ConnectionTestError,
  InvalidConfigError,
  SecretsError,
  errorMessage,
  isDeclarrError
} from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import type { AnyPlugin, Instance, InstanceAddress, InstanceConfig } from '../plugins/types.js'
import { DEFAULT_INSTANCE_NAME, formatInstanceRef, type InstanceRef } from '../types.js'
import { dumpAttributes } from './attributes.js'
import { connectionOf } from './registry.js'

export interface DumpOptions {
  logger: Logger
  /** Seconds */
  requestTimeout: number
}

export function canDumpConfig(plugin: AnyPlugin): boolean {
  return plugin.configFromAddress !== undefined
}

function parseAddressConfig(plugin: AnyPlugin, ref: InstanceRef, address: InstanceAddress): InstanceConfig {
  if (!plugin.configFromAddress) {
    throw new InvalidConfigError(`Plugin ${plugin.name} cannot dump remote configuration`)
  }
  try {
    return plugin.parseConfig(plugin.configFromAddress(address))
  } catch (error) {
    if (error instanceof ZodError) {
      throw InvalidConfigError.fromZodIssues(formatInstanceRef(ref), error.issues)
    }
    throw error
  }
}

/**
 * Read the remote state of one instance as its plugin's configuration.
 * Secrets are never part of the result.
 */
export async function dumpRemoteConfig(
  plugin: AnyPlugin,
  address: InstanceAddress,
  options: DumpOptions
): Promise<Record<string, unknown>> {
  const ref: InstanceRef = { plugin: plugin.name, instance: DEFAULT_INSTANCE_NAME }
  const config = parseAddressConfig(plugin, ref, address)
  const instance: Instance = {
    ref,
    config,
    connection: connectionOf(config, options.requestTimeout),
    links: [],
    logger: options.logger.child({ plugin: plugin.name })
  }

  let secrets: unknown
  try {
    secrets = await plugin.fetchSecrets(instance)
  } catch (error) {
    throw isDeclarrError(error) ? error : new SecretsError(ref, errorMessage(error), error)
  }
  if (!(await plugin.testSecrets(instance, secrets))) {
    throw new ConnectionTestError(ref, instance.connection.url)
  }

  const dumped: Record<string, unknown> = {
    hostname: config.hostname,
    port: config.port,
    protocol: config.protocol
  }
  for (const resource of plugin.resources) {
    instance.logger.debug(`Fetching remote ${resource.name}`)
    const remote = await resource.fetchRemote(instance, secrets)
    dumpAttributes(resource.attributes, remote, dumped)
  }
  return dumped
}
