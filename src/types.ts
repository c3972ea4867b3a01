/**
 * Declarr - Type Definitions
 */

// ============================================================================
// Instance Types
// ============================================================================

/**
 * Instance name used when a plugin section declares no `instances` map.
 * User-defined instances may not take this name.
 */
export const DEFAULT_INSTANCE_NAME = 'default'

/**
 * Identifies one instance of one plugin
 */
export interface InstanceRef {
  plugin: string
  instance: string
}

/**
 * Directed reference from one instance's configuration to another instance
 */
export interface InstanceLink {
  source: InstanceRef
  target: InstanceRef
}

/**
 * Connection parameters derived from an instance configuration
 */
export interface InstanceConnection {
  hostname: string
  port: number
  protocol: 'http' | 'https'
  /** Base URL, e.g. `http://sonarr:8989` */
  url: string
  /** Timeout applied to each remote request */
  timeoutMs: number
}

/**
 * Human-readable instance name, as it appears in configuration files
 */
export function formatInstanceRef(ref: InstanceRef): string {
  if (ref.instance === DEFAULT_INSTANCE_NAME) {
    return ref.plugin
  }
  return `${ref.plugin}.instances['${ref.instance}']`
}

/**
 * Stable map key for an instance
 */
export function instanceKey(ref: InstanceRef): string {
  return `${ref.plugin}/${ref.instance}`
}

/**
 * Lexicographic ordering by (plugin, instance)
 */
export function compareInstanceRefs(a: InstanceRef, b: InstanceRef): number {
  if (a.plugin !== b.plugin) {
    return a.plugin < b.plugin ? -1 : 1
  }
  if (a.instance !== b.instance) {
    return a.instance < b.instance ? -1 : 1
  }
  return 0
}

export function sameInstance(a: InstanceRef, b: InstanceRef): boolean {
  return a.plugin === b.plugin && a.instance === b.instance
}

// ============================================================================
// Run Types
// ============================================================================

/**
 * Pipeline stages, in execution order
 */
export const RUN_STAGES = [
  'RENDER_PRE_INIT',
  'INITIALIZE_INSTANCES',
  'RENDER_POST_INIT',
  'FETCH_SECRETS',
  'FETCH_REMOTE',
  'COMPUTE_DIFF',
  'APPLY_UPDATES',
  'DELETE_UNMANAGED'
] as const

export type RunStage = typeof RUN_STAGES[number]

/**
 * - apply: every stage runs
 * - validate: configuration is rendered and the dependency graph checked,
 *   no instance is contacted
 */
export type RunMode = 'apply' | 'validate'

// ============================================================================
// Schedule Types
// ============================================================================

export const WEEKDAYS = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday'
] as const

export type Weekday = typeof WEEKDAYS[number]

export interface TimeOfDay {
  hour: number
  minute: number
}

/**
 * When the daemon runs, and whether configuration changes trigger a run
 */
export interface ScheduleSpec {
  days: Weekday[]
  times: TimeOfDay[]
  watchConfig: boolean
}

// ============================================================================
// Logging Types
// ============================================================================

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const

export type LogLevel = typeof LOG_LEVELS[number]
