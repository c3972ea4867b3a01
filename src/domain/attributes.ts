/**
 * Attribute Reconciliation Map
 *
 * One mapping per managed attribute: how to read the declared value from the
 * local configuration, how to read the current value from the fetched remote
 * state, how to compare them, and how to write the declared value into the
 * payload sent back to the remote API.
 *
 * Diff computation is pure. Network I/O happens once per resource in the
 * pipeline, never per attribute.
 */

import { isDeepStrictEqual } from 'node:util'
import { ReconcileError } from '../lib/errors.js'
import type { Logger } from '../lib/logger.js'
import { isEnumMember } from './enum.js'

// ============================================================================
// Types
// ============================================================================

export interface AttributeMapping<TConfig, TRemote, TPayload, TValue> {
  /** Dotted path of the attribute in the local configuration */
  path: string
  /** Declared value, or undefined when the configuration leaves it unset */
  local(config: TConfig): TValue | undefined
  /** Current remote value, or undefined when the remote has none */
  remote(state: TRemote): TValue | undefined
  /** Normal form used by the default equality check */
  canonicalize?(value: TValue): unknown
  /** Custom equality, e.g. ignoring order */
  equals?(local: TValue, remote: TValue): boolean
  /** Write the declared value into the pending payload */
  render(payload: TPayload, value: TValue): void
  format?(value: TValue): string
  /**
   * Local configuration form of a remote value, for dumping a live instance
   * as configuration. Attributes without it are left out of dumps.
   */
  toLocal?(value: TValue): unknown
}

export type AttributeComparison<TValue> =
  | { status: 'unset' }
  | { status: 'unchanged'; value: TValue }
  | { status: 'changed'; old: TValue | undefined; new: TValue }

/**
 * One attribute-level difference
 */
export interface Change {
  resource: string
  path: string
  old: unknown
  new: unknown
  /** `path: old -> new` */
  display: string
}

export interface ResourceDiff<TPayload = unknown> {
  resource: string
  changes: Change[]
  payload: TPayload
  requiresApply: boolean
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Returns a builder that fixes the config/remote/payload types of a resource
 * and infers each attribute's value type from its `local` reader.
 *
 * @example
 * ```ts
 * const attr = attributes<SettingsConfig, RemoteSettings, RemoteSettings>()
 * const instanceName = attr({
 *   path: 'settings.instance_name',
 *   local: config => config.settings.instance_name,
 *   remote: state => state.instanceName,
 *   render: (payload, value) => { payload.instanceName = value }
 * })
 * ```
 */
export function attributes<TConfig, TRemote, TPayload>() {
  return <TValue>(
    mapping: AttributeMapping<TConfig, TRemote, TPayload, TValue>
  ): AttributeMapping<TConfig, TRemote, TPayload, TValue> => mapping
}

// ============================================================================
// Canonicalization and Equality
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function compareCanonical(a: unknown, b: unknown): number {
  const left = JSON.stringify(a) ?? ''
  const right = JSON.stringify(b) ?? ''
  return left < right ? -1 : left > right ? 1 : 0
}

/**
 * Default normal form:
 * - enum members compare by name
 * - sets become sorted arrays
 * - object keys are sorted
 * - dates become ISO strings
 */
export function defaultCanonicalize(value: unknown): unknown {
  if (isEnumMember(value)) {
    return value.name
  }
  if (value instanceof Set) {
    return Array.from(value, item => defaultCanonicalize(item)).sort(compareCanonical)
  }
  if (Array.isArray(value)) {
    return value.map(item => defaultCanonicalize(item))
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const key of Object.keys(value).sort()) {
      const entry = value[key]
      if (entry !== undefined) {
        result[key] = defaultCanonicalize(entry)
      }
    }
    return result
  }
  return value
}

/**
 * Order-insensitive equality for list attributes
 */
export function setEquals<T>(local: readonly T[], remote: readonly T[]): boolean {
  const left = local.map(item => defaultCanonicalize(item)).sort(compareCanonical)
  const right = remote.map(item => defaultCanonicalize(item)).sort(compareCanonical)
  return isDeepStrictEqual(left, right)
}

export function compareAttribute<TConfig, TRemote, TPayload, TValue>(
  mapping: AttributeMapping<TConfig, TRemote, TPayload, TValue>,
  config: TConfig,
  remote: TRemote
): AttributeComparison<TValue> {
  const localValue = mapping.local(config)
  if (localValue === undefined) {
    return { status: 'unset' }
  }

  const remoteValue = mapping.remote(remote)
  if (remoteValue === undefined) {
    return { status: 'changed', old: undefined, new: localValue }
  }

  let equal: boolean
  if (mapping.equals) {
    equal = mapping.equals(localValue, remoteValue)
  } else {
    const canonicalize = (value: TValue): unknown =>
      mapping.canonicalize ? mapping.canonicalize(value) : defaultCanonicalize(value)
    equal = isDeepStrictEqual(canonicalize(localValue), canonicalize(remoteValue))
  }

  return equal
    ? { status: 'unchanged', value: localValue }
    : { status: 'changed', old: remoteValue, new: localValue }
}

// ============================================================================
// Formatting
// ============================================================================

export function defaultFormat(value: unknown): string {
  if (value === undefined) return '(unset)'
  if (isEnumMember(value)) return value.name
  if (typeof value === 'string') return `'${value}'`
  if (value instanceof Set) return defaultFormat(Array.from(value))
  if (Array.isArray(value)) return `[${value.map(item => defaultFormat(item)).join(', ')}]`
  if (isPlainObject(value)) return JSON.stringify(defaultCanonicalize(value))
  return String(value)
}

function formatValue<TValue>(
  mapping: { format?(value: TValue): string },
  value: TValue | undefined
): string {
  if (value !== undefined && mapping.format) {
    return mapping.format(value)
  }
  return defaultFormat(value)
}

// ============================================================================
// Diff Computation
// ============================================================================

/**
 * Run every mapping of one resource against its fetched remote state.
 *
 * Starts from `payload` (normally a copy of the remote object) and renders
 * each changed attribute into it. Unset attributes leave the payload alone.
 * A throwing reader, comparator or renderer aborts with a ReconcileError.
 */
export function computeDiff<TConfig, TRemote, TPayload>(
  resource: string,
  mappings: readonly AttributeMapping<TConfig, TRemote, TPayload, unknown>[],
  config: TConfig,
  remote: TRemote,
  payload: TPayload,
  logger?: Logger
): ResourceDiff<TPayload> {
  const changes: Change[] = []

  for (const mapping of mappings) {
    let comparison: AttributeComparison<unknown>
    try {
      comparison = compareAttribute(mapping, config, remote)
      if (comparison.status === 'changed') {
        mapping.render(payload, comparison.new)
      }
    } catch (error) {
      throw new ReconcileError(resource, mapping.path, error)
    }

    switch (comparison.status) {
      case 'unset':
        logger?.debug(`${mapping.path}: (unmanaged)`)
        break
      case 'unchanged':
        logger?.debug(`${mapping.path}: ${formatValue(mapping, comparison.value)} (up to date)`)
        break
      case 'changed': {
        const display = `${mapping.path}: ${formatValue(mapping, comparison.old)} -> ${formatValue(mapping, comparison.new)}`
        changes.push({
          resource,
          path: mapping.path,
          old: comparison.old,
          new: comparison.new,
          display
        })
        break
      }
    }
  }

  return {
    resource,
    changes,
    payload,
    requiresApply: changes.length > 0
  }
}

// ============================================================================
// Dumping
// ============================================================================

/**
 * Read every dumpable attribute from the remote state into `target`, keyed
 * by its configuration path. Attributes the remote has no value for are
 * left out.
 */
export function dumpAttributes<TConfig, TRemote, TPayload>(
  mappings: readonly AttributeMapping<TConfig, TRemote, TPayload, unknown>[],
  remote: TRemote,
  target: Record<string, unknown> = {}
): Record<string, unknown> {
  for (const mapping of mappings) {
    if (!mapping.toLocal) continue
    const value = mapping.remote(remote)
    if (value !== undefined) {
      setPath(target, mapping.path, mapping.toLocal(value))
    }
  }
  return target
}

// ============================================================================
// Payload Helpers
// ============================================================================

/**
 * Set a value at a dotted path, creating intermediate objects
 */
export function setPath(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.')
  const last = keys.pop()
  if (last === undefined || last === '') {
    throw new Error(`Invalid payload path "${path}"`)
  }

  let current = target
  for (const key of keys) {
    const next = current[key]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }
  current[last] = value
}

/**
 * Read a value at a dotted path
 */
export function getPath(source: unknown, path: string): unknown {
  let current = source
  for (const key of path.split('.')) {
    if (!isPlainObject(current)) return undefined
    current = current[key]
  }
  return current
}

/**
 * Entry of a `fields: [{ name, value }]` list, as used by the *arr APIs
 * for provider-specific settings
 */
export interface FieldEntry {
  name: string
  value?: unknown
  [key: string]: unknown
}

export function getField(fields: readonly FieldEntry[], name: string): unknown {
  return fields.find(field => field.name === name)?.value
}

/**
 * Set the value of a named field, appending the field when absent
 */
export function setField(fields: FieldEntry[], name: string, value: unknown): void {
  const existing = fields.find(field => field.name === name)
  if (existing) {
    existing.value = value
  } else {
    fields.push({ name, value })
  }
}
