/**
 * In-memory plugin for pipeline and daemon tests.
 *
 * Each configured instance talks to a host in a FakeBackend (looked up by
 * hostname). Every plugin call is recorded so tests can assert ordering and
 * that nothing was mutated.
 */

import { z } from 'zod'
import { attributes } from '../../src/domain/attributes.js'
import { defineEnum } from '../../src/domain/enum.js'
import {
  definePlugin,
  defineResource,
  instanceConfigSchema,
  type Instance,
  type Plugin
} from '../../src/plugins/types.js'

export const FakeLogLevel = defineEnum('FakeLogLevel', {
  info: { value: 0 },
  debug: { value: 1 },
  trace: { value: 2, aliases: ['verbose'] }
})

export const fakeConfigSchema = instanceConfigSchema.extend({
  hostname: z.string().min(1).default('sonarr'),
  port: z.number().int().default(8989),
  api_key: z.string().optional(),
  settings: z.object({
    instance_name: z.string().optional(),
    log_level: FakeLogLevel.schema().optional()
  }).strict().default({}),
  tags: z.array(z.string()).optional(),
  delete_unmanaged_tags: z.boolean().default(false),
  /** Other instances of the same plugin this one references */
  depends_on: z.array(z.string()).default([])
}).strict()

export type FakeConfig = z.infer<typeof fakeConfigSchema>

export interface FakeSecrets {
  apiKey: string
}

export interface FakeTag {
  id: number
  label: string
}

export interface FakeSettings {
  instanceName: string
  logLevel: number
}

export interface FakeHost {
  apiKey: string
  settings: FakeSettings
  tags: FakeTag[]
}

export type FakeOperation =
  | 'initialize'
  | 'fetchSecrets'
  | 'testSecrets'
  | 'fetch:settings'
  | 'apply:settings'
  | 'fetch:tags'
  | 'apply:tags'
  | 'delete:tags'

export interface FakeCall {
  host: string
  op: FakeOperation
  detail?: unknown
}

const MUTATIONS: FakeOperation[] = ['apply:settings', 'apply:tags', 'delete:tags']

export class FakeBackend {
  readonly hosts = new Map<string, FakeHost>()
  readonly calls: FakeCall[] = []
  /** `host:operation` -> error message */
  readonly failures = new Map<string, string>()
  /** Called before every recorded operation */
  onCall?: (call: FakeCall) => Promise<void> | void

  addHost(hostname: string, host: Partial<FakeHost> = {}): FakeHost {
    const entry: FakeHost = {
      apiKey: host.apiKey ?? 'test-secret',
      settings: host.settings ?? { instanceName: 'Sonarr', logLevel: 0 },
      tags: host.tags ?? []
    }
    this.hosts.set(hostname, entry)
    return entry
  }

  failOn(hostname: string, op: FakeOperation, message: string): void {
    this.failures.set(`${hostname}:${op}`, message)
  }

  async record(hostname: string, op: FakeOperation, detail?: unknown): Promise<FakeHost> {
    const call: FakeCall = { host: hostname, op, detail }
    this.calls.push(call)
    await this.onCall?.(call)

    const failure = this.failures.get(`${hostname}:${op}`)
    if (failure) {
      throw new Error(failure)
    }
    const host = this.hosts.get(hostname)
    if (!host) {
      throw new Error(`connection refused: ${hostname}`)
    }
    return host
  }

  hostsFor(op: FakeOperation): string[] {
    return this.calls.filter(call => call.op === op).map(call => call.host)
  }

  mutations(): FakeCall[] {
    return this.calls.filter(call => MUTATIONS.includes(call.op))
  }
}

export interface FakePluginOptions {
  name?: string
  initialize?: boolean
}

const setting = attributes<FakeConfig, FakeSettings, FakeSettings>()

interface TagsPayload {
  labels: string[]
  create: string[]
}

const tag = attributes<FakeConfig, FakeTag[], TagsPayload>()

export function createFakePlugin(backend: FakeBackend, options: FakePluginOptions = {}): Plugin<FakeConfig, FakeSecrets> {
  const name = options.name ?? 'sonarr'
  const host = (instance: Instance<FakeConfig>): string => instance.config.hostname

  const settings = defineResource<FakeConfig, FakeSecrets, FakeSettings, FakeSettings>({
    name: 'settings',
    attributes: [
      setting({
        path: 'settings.instance_name',
        local: config => config.settings.instance_name,
        remote: state => state.instanceName,
        render: (payload, value) => {
          payload.instanceName = value
        }
      }),
      setting({
        path: 'settings.log_level',
        local: config => config.settings.log_level,
        remote: state => FakeLogLevel.tryParse(state.logLevel),
        render: (payload, value) => {
          payload.logLevel = Number(value.value)
        }
      })
    ],
    fetchRemote: async instance => {
      const state = await backend.record(host(instance), 'fetch:settings')
      return { ...state.settings }
    },
    preparePayload: remote => ({ ...remote }),
    apply: async (instance, _secrets, payload) => {
      const state = await backend.record(host(instance), 'apply:settings', { ...payload })
      state.settings = { ...payload }
    }
  })

  const tags = defineResource<FakeConfig, FakeSecrets, FakeTag[], TagsPayload, FakeTag>({
    name: 'tags',
    attributes: [
      tag({
        path: 'tags',
        local: config => config.tags,
        remote: state => state.map(t => t.label),
        equals: (local, remote) => local.every(label => remote.includes(label)),
        render: (payload, value) => {
          payload.create = value.filter(label => !payload.labels.includes(label))
        }
      })
    ],
    fetchRemote: async instance => {
      const state = await backend.record(host(instance), 'fetch:tags')
      return state.tags.map(t => ({ ...t }))
    },
    preparePayload: remote => ({ labels: remote.map(t => t.label), create: [] }),
    apply: async (instance, _secrets, payload) => {
      const state = await backend.record(host(instance), 'apply:tags', [...payload.create])
      for (const label of payload.create) {
        const id = state.tags.reduce((max, t) => Math.max(max, t.id), 0) + 1
        state.tags.push({ id, label })
      }
    },
    deletion: {
      enabled: config => config.delete_unmanaged_tags,
      findUnmanaged: (config, remote) => remote.filter(t => !(config.tags ?? []).includes(t.label)),
      describe: item => `'${item.label}'`,
      delete: async (instance, _secrets, item) => {
        const state = await backend.record(host(instance), 'delete:tags', item.label)
        state.tags = state.tags.filter(t => t.id !== item.id)
      }
    }
  })

  return definePlugin<FakeConfig, FakeSecrets>({
    name,
    version: '1.0.0',
    parseConfig: raw => fakeConfigSchema.parse(raw),
    instanceLinks: config => config.depends_on.map(instance => ({ plugin: name, instance })),
    initialize: options.initialize
      ? async instance => {
        await backend.record(host(instance), 'initialize')
      }
      : undefined,
    fetchSecrets: async instance => {
      const state = await backend.record(host(instance), 'fetchSecrets')
      return { apiKey: instance.config.api_key ?? state.apiKey }
    },
    testSecrets: async (instance, secrets) => {
      const state = await backend.record(host(instance), 'testSecrets')
      return state.apiKey === secrets.apiKey
    },
    resources: [settings, tags]
  })
}
