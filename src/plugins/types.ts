/**
 * Plugin contract
 *
 * The orchestration core only talks to plugins through these interfaces.
 * Members are declared as methods so that a plugin typed over its own
 * configuration and secrets can be held as an `AnyPlugin`.
 */

import { z } from 'zod'
import type { AttributeMapping } from '../domain/attributes.js'
import type { Logger } from '../lib/logger.js'
import type { InstanceConnection, InstanceRef } from '../types.js'

// ============================================================================
// Instance Configuration
// ============================================================================

/**
 * Connection fields every plugin configuration carries.
 * Plugins extend this schema with their own defaults and sections.
 */
export const instanceConfigSchema = z.object({
  hostname: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  protocol: z.enum(['http', 'https']).default('http')
})

export type InstanceConfig = z.infer<typeof instanceConfigSchema>

/**
 * One configured instance as seen by plugin hooks during a run
 */
export interface Instance<TConfig extends InstanceConfig = InstanceConfig> {
  ref: InstanceRef
  config: TConfig
  connection: InstanceConnection
  /** Instances this one references */
  links: InstanceRef[]
  logger: Logger
}

/**
 * Read-only access to the other instances of the current run
 */
export interface InstanceView<TConfig extends InstanceConfig = InstanceConfig> {
  /** Instance of the same plugin by name */
  get(name: string): Instance<TConfig> | undefined
  /** Instance of any plugin */
  find(ref: InstanceRef): Instance | undefined
  /** Every instance of a plugin, in execution order */
  list(plugin: string): Instance[]
}

// ============================================================================
// Resources
// ============================================================================

/**
 * Removal of remote items that the configuration does not declare.
 * Only runs when `enabled` returns true for the instance configuration.
 */
export interface ResourceDeletion<TConfig extends InstanceConfig, TSecrets, TRemote, TItem> {
  enabled(config: TConfig): boolean
  findUnmanaged(config: TConfig, remote: TRemote): TItem[]
  describe(item: TItem): string
  delete(instance: Instance<TConfig>, secrets: TSecrets, item: TItem): Promise<void>
}

/**
 * A remote object type managed by a plugin, e.g. "settings" or "tags"
 */
export interface Resource<TConfig extends InstanceConfig, TSecrets, TRemote, TPayload, TItem = never> {
  name: string
  attributes: readonly AttributeMapping<TConfig, TRemote, TPayload, unknown>[]
  fetchRemote(instance: Instance<TConfig>, secrets: TSecrets): Promise<TRemote>
  /** Initial payload built from the remote state (defaults to an empty object) */
  preparePayload?(remote: TRemote): TPayload
  /** Send the rendered payload in a single request */
  apply(instance: Instance<TConfig>, secrets: TSecrets, payload: TPayload, remote: TRemote): Promise<void>
  deletion?: ResourceDeletion<TConfig, TSecrets, TRemote, TItem>
}

export type AnyResource<TConfig extends InstanceConfig = InstanceConfig, TSecrets = unknown> =
  Resource<TConfig, TSecrets, unknown, unknown, unknown>

/**
 * Identity helper that infers a resource's type parameters
 */
export function defineResource<TConfig extends InstanceConfig, TSecrets, TRemote, TPayload, TItem = never>(
  resource: Resource<TConfig, TSecrets, TRemote, TPayload, TItem>
): Resource<TConfig, TSecrets, TRemote, TPayload, TItem> {
  return resource
}

// ============================================================================
// Plugins
// ============================================================================

/**
 * A live instance given on the command line rather than in configuration
 */
export interface InstanceAddress {
  hostname: string
  port: number
  protocol: 'http' | 'https'
  apiKey?: string
}

export interface Plugin<TConfig extends InstanceConfig, TSecrets> {
  name: string
  version: string

  /** Validate one merged instance configuration (throws ZodError) */
  parseConfig(raw: unknown): TConfig

  /** Instances referenced by this configuration */
  instanceLinks?(config: TConfig): InstanceRef[]

  /**
   * Render values that need no instance connectivity.
   * Called once per plugin with every instance configuration keyed by name.
   */
  renderPreInit?(configs: ReadonlyMap<string, TConfig>, logger: Logger): Promise<Map<string, TConfig>>

  /** One-time bootstrap before the instance API is usable */
  initialize?(instance: Instance<TConfig>): Promise<void>

  /** Render values that need a live instance, e.g. names resolved to IDs */
  renderPostInit?(instance: Instance<TConfig>, view: InstanceView<TConfig>): Promise<TConfig>

  fetchSecrets(instance: Instance<TConfig>): Promise<TSecrets>

  /** Connectivity check with the fetched secrets */
  testSecrets(instance: Instance<TConfig>, secrets: TSecrets): Promise<boolean>

  resources: readonly AnyResource<TConfig, TSecrets>[]

  /**
   * Raw instance configuration for an address, used to dump a live
   * instance as configuration. Plugins without it cannot be dumped.
   */
  configFromAddress?(address: InstanceAddress): unknown
}

export type AnyPlugin = Plugin<InstanceConfig, unknown>

/**
 * Identity helper that infers a plugin's type parameters
 */
export function definePlugin<TConfig extends InstanceConfig, TSecrets>(
  plugin: Plugin<TConfig, TSecrets>
): Plugin<TConfig, TSecrets> {
  return plugin
}
