/**
 * Dummy API client
 */

import { z } from 'zod'
import { RemoteApiError, errorMessage } from '../../lib/errors.js'
import type { Logger } from '../../lib/logger.js'
import { withTimeout } from '../../lib/timeout.js'

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export interface DummyApiOptions {
  baseUrl: string
  apiKey?: string
  timeoutMs: number
  fetch: FetchLike
  logger?: Logger
}

export const initializeSchema = z.object({
  apiRoot: z.string(),
  apiKey: z.string().optional(),
  version: z.string()
})

export const statusSchema = z.object({
  version: z.string()
}).passthrough()

export const remoteSettingsSchema = z.object({
  instanceName: z.string(),
  logLevel: z.string(),
  updateAutomatically: z.boolean(),
  importSourceUrl: z.string().nullable(),
  importSourceTagIds: z.array(z.number().int())
}).passthrough()

export type RemoteSettings = z.infer<typeof remoteSettingsSchema>

export const remoteTagSchema = z.object({
  id: z.number().int(),
  label: z.string()
})

export type RemoteTag = z.infer<typeof remoteTagSchema>

export class DummyApi {
  private readonly options: DummyApiOptions

  constructor(options: DummyApiOptions) {
    this.options = options
  }

  get baseUrl(): string {
    return this.options.baseUrl
  }

  /**
   * Send a request and validate the JSON response.
   * Any status other than `expectedStatus` raises a RemoteApiError.
   */
  async request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { body?: unknown; expectedStatus?: number; authenticate?: boolean } = {}
  ): Promise<T> {
    const { body, expectedStatus = 200, authenticate = true } = options
    const url = `${this.options.baseUrl}/${path.replace(/^\/+/, '')}`

    const headers: Record<string, string> = { Accept: 'application/json' }
    if (authenticate && this.options.apiKey) {
      headers['X-Api-Key'] = this.options.apiKey
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    this.options.logger?.debug(`${method} ${url}${body !== undefined ? ` <- ${JSON.stringify(body)}` : ''}`)

    let response: Response
    try {
      response = await withTimeout(
        this.options.fetch(url, {
          method,
          headers,
          body: body !== undefined ? JSON.stringify(body) : undefined
        }),
        this.options.timeoutMs,
        `${method} ${url}`
      )
    } catch (error) {
      throw new RemoteApiError(method, url, errorMessage(error), { cause: error })
    }

    const text = await response.text()
    this.options.logger?.debug(`${method} ${url} -> status=${response.status} res=${text}`)

    if (response.status !== expectedStatus) {
      const reason = response.status === 401
        ? 'Unauthorized'
        : `Unexpected response with status ${response.status}: ${text}`
      throw new RemoteApiError(method, url, reason, { status: response.status })
    }

    let parsed: unknown = null
    if (text.length > 0) {
      try {
        parsed = JSON.parse(text)
      } catch (error) {
        throw new RemoteApiError(method, url, `Invalid JSON response: ${errorMessage(error)}`, {
          status: response.status,
          cause: error
        })
      }
    }

    const result = schema.safeParse(parsed)
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')
      throw new RemoteApiError(method, url, `Unexpected response body: ${issues}`, { status: response.status })
    }
    return result.data
  }

  getInitialize() {
    return this.request('GET', '/initialize.json', initializeSchema, { authenticate: false })
  }

  getStatus() {
    return this.request('GET', '/api/v1/status', statusSchema)
  }

  getSettings() {
    return this.request('GET', '/api/v1/settings', remoteSettingsSchema)
  }

  putSettings(settings: RemoteSettings) {
    return this.request('PUT', '/api/v1/settings', remoteSettingsSchema, { body: settings })
  }

  getTags() {
    return this.request('GET', '/api/v1/tag', z.array(remoteTagSchema))
  }

  createTags(labels: string[]) {
    return this.request('POST', '/api/v1/tag/bulk', z.array(remoteTagSchema), {
      body: { labels },
      expectedStatus: 201
    })
  }

  async deleteTag(id: number): Promise<void> {
    await this.request('DELETE', `/api/v1/tag/${id}`, z.unknown())
  }
}
