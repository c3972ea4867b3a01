/**
 * Resources managed on a dummy instance
 */

import { attributes, setEquals } from '../../domain/attributes.js'
import { defineResource, type Instance } from '../types.js'
import { DummyLogLevel, type DummyConfig } from './config.js'
import type { DummyApi, RemoteSettings, RemoteTag } from './api.js'

export interface DummySecrets {
  apiKey: string
}

export type ApiFactory = (instance: Instance<DummyConfig>, secrets: DummySecrets) => DummyApi

// ============================================================================
// Settings
// ============================================================================

const setting = attributes<DummyConfig, RemoteSettings, RemoteSettings>()

export function createSettingsResource(api: ApiFactory) {
  return defineResource<DummyConfig, DummySecrets, RemoteSettings, RemoteSettings>({
    name: 'settings',
    attributes: [
      setting({
        path: 'settings.instance_name',
        local: config => config.settings.instance_name,
        remote: state => state.instanceName,
        toLocal: value => value,
        render: (payload, value) => {
          payload.instanceName = value
        }
      }),
      setting({
        path: 'settings.log_level',
        local: config => config.settings.log_level,
        remote: state => DummyLogLevel.tryParse(state.logLevel),
        toLocal: value => value.name,
        render: (payload, value) => {
          payload.logLevel = String(value.value)
        }
      }),
      setting({
        path: 'settings.update_automatically',
        local: config => config.settings.update_automatically,
        remote: state => state.updateAutomatically,
        toLocal: value => value,
        render: (payload, value) => {
          payload.updateAutomatically = value
        }
      }),
      setting({
        path: 'import_from.url',
        local: config => config.import_source?.url,
        remote: state => state.importSourceUrl ?? undefined,
        render: (payload, value) => {
          payload.importSourceUrl = value
        }
      }),
      setting({
        path: 'import_from.tag_ids',
        local: config => config.import_source?.tag_ids,
        remote: state => state.importSourceTagIds,
        equals: setEquals,
        render: (payload, value) => {
          payload.importSourceTagIds = [...value].sort((a, b) => a - b)
        }
      })
    ],
    fetchRemote: (instance, secrets) => api(instance, secrets).getSettings(),
    // The settings endpoint takes the whole object back
    preparePayload: remote => ({ ...remote, importSourceTagIds: [...remote.importSourceTagIds] }),
    apply: async (instance, secrets, payload) => {
      await api(instance, secrets).putSettings(payload)
    }
  })
}

// ============================================================================
// Tags
// ============================================================================

export interface TagsPayload {
  existing: string[]
  create: string[]
}

const tag = attributes<DummyConfig, RemoteTag[], TagsPayload>()

export function createTagsResource(api: ApiFactory) {
  return defineResource<DummyConfig, DummySecrets, RemoteTag[], TagsPayload, RemoteTag>({
    name: 'tags',
    attributes: [
      tag({
        path: 'tags.definitions',
        local: config => config.tags.definitions,
        remote: state => state.map(t => t.label),
        toLocal: value => value,
        // Extra remote tags are handled by deletion, not by this attribute
        equals: (local, remote) => local.every(label => remote.includes(label)),
        render: (payload, value) => {
          payload.create = value.filter(label => !payload.existing.includes(label))
        }
      })
    ],
    fetchRemote: (instance, secrets) => api(instance, secrets).getTags(),
    preparePayload: remote => ({ existing: remote.map(t => t.label), create: [] }),
    apply: async (instance, secrets, payload) => {
      if (payload.create.length === 0) return
      await api(instance, secrets).createTags(payload.create)
    },
    deletion: {
      enabled: config => config.tags.delete_unmanaged,
      findUnmanaged: (config, remote) => {
        const declared = config.tags.definitions ?? []
        return remote.filter(t => !declared.includes(t.label))
      },
      describe: item => `'${item.label}' (id ${item.id})`,
      delete: async (instance, secrets, item) => {
        await api(instance, secrets).deleteTag(item.id)
      }
    }
  })
}
