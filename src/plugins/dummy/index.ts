/**
 * Dummy plugin
 *
 * Reference implementation of the plugin contract against a small JSON API:
 *
 * - `GET /initialize.json` returns the API key when authentication is disabled
 * - `GET /api/v1/status` checks connectivity
 * - `GET|PUT /api/v1/settings` reads and writes instance settings
 * - `GET /api/v1/tag`, `POST /api/v1/tag/bulk`, `DELETE /api/v1/tag/:id` manage tags
 */

import { RemoteApiError, SecretsError } from '../../lib/errors.js'
import { definePlugin, type Instance, type InstanceView, type Plugin } from '../types.js'
import { DummyApi, type FetchLike } from './api.js'
import { DUMMY_PLUGIN_NAME, dummyConfigSchema, type DummyConfig } from './config.js'
import { createSettingsResource, createTagsResource, type DummySecrets } from './resources.js'

export const DUMMY_PLUGIN_VERSION = '0.1.0'

export interface DummyPluginOptions {
  /** HTTP implementation, defaults to the global fetch */
  fetch?: FetchLike
}

export type DummyPlugin = Plugin<DummyConfig, DummySecrets>

export function createDummyPlugin(options: DummyPluginOptions = {}): DummyPlugin {
  const fetchImpl: FetchLike = options.fetch ?? ((url, init) => fetch(url, init))

  const apiFor = (instance: Instance<DummyConfig>, apiKey?: string): DummyApi =>
    new DummyApi({
      baseUrl: instance.connection.url,
      apiKey,
      timeoutMs: instance.connection.timeoutMs,
      fetch: fetchImpl,
      logger: instance.logger
    })

  const apiKeyOf = async (instance: Instance<DummyConfig>): Promise<string> => {
    if (instance.config.api_key) {
      return instance.config.api_key
    }
    const initialize = await apiFor(instance).getInitialize()
    if (!initialize.apiKey) {
      throw new SecretsError(instance.ref, 'no API key configured and the instance did not provide one')
    }
    return initialize.apiKey
  }

  const api = (instance: Instance<DummyConfig>, secrets: DummySecrets): DummyApi =>
    apiFor(instance, secrets.apiKey)

  return definePlugin<DummyConfig, DummySecrets>({
    name: DUMMY_PLUGIN_NAME,
    version: DUMMY_PLUGIN_VERSION,

    parseConfig: raw => dummyConfigSchema.parse(raw),

    instanceLinks: config =>
      config.import_from ? [{ plugin: DUMMY_PLUGIN_NAME, instance: config.import_from.instance }] : [],

    async renderPreInit(configs) {
      const rendered = new Map<string, DummyConfig>()
      for (const [name, config] of configs) {
        const instanceName = config.settings.instance_name
        rendered.set(name, instanceName === undefined ? config : {
          ...config,
          settings: { ...config.settings, instance_name: instanceName.replaceAll('{instance}', name) }
        })
      }
      return rendered
    },

    async renderPostInit(instance: Instance<DummyConfig>, view: InstanceView<DummyConfig>) {
      const importFrom = instance.config.import_from
      if (!importFrom) {
        return instance.config
      }

      const source = view.get(importFrom.instance)
      if (!source) {
        throw new Error(`Import source instance '${importFrom.instance}' is not defined`)
      }

      const sourceApi = apiFor(source, await apiKeyOf(source))
      const tags = await sourceApi.getTags()
      const tagIds = importFrom.tags.map(label => {
        const match = tags.find(t => t.label === label)
        if (!match) {
          throw new Error(`Tag '${label}' not found on source instance '${importFrom.instance}'`)
        }
        return match.id
      })

      return {
        ...instance.config,
        import_source: { url: source.connection.url, tag_ids: tagIds }
      }
    },

    async fetchSecrets(instance) {
      return { apiKey: await apiKeyOf(instance) }
    },

    async testSecrets(instance, secrets) {
      try {
        await api(instance, secrets).getStatus()
        return true
      } catch (error) {
        if (error instanceof RemoteApiError && error.status === 401) {
          instance.logger.debug('API key rejected by instance')
          return false
        }
        throw error
      }
    },

    resources: [
      createSettingsResource(api),
      createTagsResource(api)
    ],

    configFromAddress: address => ({
      hostname: address.hostname,
      port: address.port,
      protocol: address.protocol,
      api_key: address.apiKey
    })
  })
}
