/**
 * In-process fake of the dummy application's HTTP API, used as the plugin's
 * injected fetch. Every request is recorded.
 */

import { z } from 'zod'
import {
  remoteSettingsSchema,
  type FetchLike,
  type RemoteSettings,
  type RemoteTag
} from '../../src/plugins/dummy/api.js'

export interface DummyHost {
  apiKey: string
  /** Whether /initialize.json hands out the API key */
  exposeApiKey: boolean
  settings: RemoteSettings
  tags: RemoteTag[]
}

export interface RecordedRequest {
  method: string
  url: string
  body?: unknown
}

const bulkSchema = z.object({ labels: z.array(z.string()) })

export const json = (status: number, value: unknown) =>
  new Response(JSON.stringify(value), { status, headers: { 'Content-Type': 'application/json' } })

export class FakeDummyServer {
  readonly hosts = new Map<string, DummyHost>()
  readonly requests: RecordedRequest[] = []

  addHost(hostname: string, host: Partial<DummyHost> = {}): DummyHost {
    const entry: DummyHost = {
      apiKey: host.apiKey ?? 'test-secret',
      exposeApiKey: host.exposeApiKey ?? false,
      settings: host.settings ?? {
        instanceName: 'Dummy',
        logLevel: 'INFO',
        updateAutomatically: false,
        importSourceUrl: null,
        importSourceTagIds: []
      },
      tags: host.tags ?? []
    }
    this.hosts.set(hostname, entry)
    return entry
  }

  mutations(): RecordedRequest[] {
    return this.requests.filter(request => request.method !== 'GET')
  }

  readonly fetch: FetchLike = async (url, init) => {
    const method = init?.method ?? 'GET'
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined
    this.requests.push(body === undefined ? { method, url } : { method, url, body })

    const { hostname, pathname } = new URL(url)
    const host = this.hosts.get(hostname)
    if (!host) {
      throw new TypeError('fetch failed')
    }

    if (pathname === '/initialize.json') {
      return json(200, { apiRoot: '/api/v1', apiKey: host.exposeApiKey ? host.apiKey : undefined, version: '1.0.0' })
    }
    if (new Headers(init?.headers).get('X-Api-Key') !== host.apiKey) {
      return new Response('', { status: 401 })
    }

    const route = `${method} ${pathname}`
    if (route === 'GET /api/v1/status') {
      return json(200, { version: '1.0.0' })
    }
    if (route === 'GET /api/v1/settings') {
      return json(200, host.settings)
    }
    if (route === 'PUT /api/v1/settings') {
      host.settings = remoteSettingsSchema.parse(body)
      return json(200, host.settings)
    }
    if (route === 'GET /api/v1/tag') {
      return json(200, host.tags)
    }
    if (route === 'POST /api/v1/tag/bulk') {
      const created = bulkSchema.parse(body).labels.map(label => {
        const tag = { id: host.tags.reduce((max, t) => Math.max(max, t.id), 0) + 1, label }
        host.tags.push(tag)
        return tag
      })
      return json(201, created)
    }
    const deleteMatch = /^\/api\/v1\/tag\/(\d+)$/.exec(pathname)
    if (method === 'DELETE' && deleteMatch) {
      const id = Number(deleteMatch[1])
      host.tags = host.tags.filter(t => t.id !== id)
      return new Response('', { status: 200 })
    }
    return new Response('not found', { status: 404 })
  }
}
