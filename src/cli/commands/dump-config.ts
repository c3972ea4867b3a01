/**
 * Declarr Dump Config Command
 *
 * Reads a live instance and prints its remote state on stdout as a YAML
 * configuration section, ready to be pasted into declarr.yml.
 *
 * @example
 * declarr dummy dump-config http://localhost:5000 --api-key test-secret
 */

import { stringify as stringifyYaml } from 'yaml'
import { dumpRemoteConfig } from '../../domain/dump.js'
import { InvalidConfigError, UnknownPluginError, formatErrorForCli } from '../../lib/errors.js'
import { parseSettings } from '../../lib/settings.js'
import type { InstanceAddress } from '../../plugins/types.js'
import type { CommandContext } from '../lib/context.js'
import * as ui from '../ui.js'

export interface DumpConfigCommandOptions {
  /** Fetched from the instance when omitted */
  apiKey?: string
}

/**
 * Parse an instance URL. The port defaults to 443 for https and 80 otherwise.
 */
export function parseInstanceUrl(input: string): InstanceAddress {
  let url: URL
  try {
    url = new URL(input)
  } catch (error) {
    throw new InvalidConfigError(`"${input}" is not a valid URL`, { cause: error })
  }

  const protocol = url.protocol.slice(0, -1)
  if (protocol !== 'http' && protocol !== 'https') {
    throw new InvalidConfigError(`Unsupported protocol "${protocol}" in ${input}`)
  }
  return {
    hostname: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
    protocol
  }
}

export async function runDumpConfig(
  context: CommandContext,
  pluginName: string,
  url: string,
  options: DumpConfigCommandOptions = {}
): Promise<number> {
  const { logger } = context

  try {
    const plugin = context.plugins.find(p => p.name === pluginName)
    if (!plugin) {
      throw new UnknownPluginError(pluginName, context.plugins.map(p => p.name))
    }

    const address = parseInstanceUrl(url)
    const dumped = await dumpRemoteConfig(
      plugin,
      options.apiKey === undefined ? address : { ...address, apiKey: options.apiKey },
      { logger, requestTimeout: parseSettings(undefined).request_timeout }
    )
    ui.output(stringifyYaml({ [plugin.name]: dumped }).trimEnd())
    return 0
  } catch (error) {
    logger.error(formatErrorForCli(error))
    return 1
  }
}
