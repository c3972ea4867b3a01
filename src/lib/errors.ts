/**
 * Declarr Error Hierarchy
 *
 * Typed error classes shared by the CLI, the pipeline and plugins.
 *
 * Hierarchy:
 *   DeclarrError (base)
 *   ├── ConfigError (fatal, raised before any network I/O)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   ├── CircularIncludeError
 *   │   ├── UnknownPluginError
 *   │   ├── NoPluginsConfiguredError
 *   │   ├── ReservedInstanceNameError
 *   │   ├── UnresolvedInstanceLinkError
 *   │   └── DependencyCycleError
 *   ├── InstanceError (per instance, excludes it from the rest of the run)
 *   │   ├── SecretsError
 *   │   └── ConnectionTestError
 *   ├── RemoteApiError (per resource operation)
 *   └── ReconcileError (attribute compare/render failure)
 */

import type { ZodIssue } from 'zod'
import type { InstanceRef, RunStage } from '../types.js'
import { formatInstanceRef } from '../types.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all Declarr errors
 */
export class DeclarrError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'DeclarrError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Base class for configuration errors. These abort a run before it starts.
 */
export class ConfigError extends DeclarrError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(
      `Config file not found: ${searchedPath}`,
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Pass the configuration file path, or create declarr.yml in the current directory',
        context: { searchedPath }
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when a configuration file or section has invalid content
 */
export class InvalidConfigError extends ConfigError {
  readonly issues: string[]

  constructor(message: string, options: { location?: string; issues?: string[]; cause?: unknown } = {}) {
    const issues = options.issues ?? []
    const where = options.location ? ` in ${options.location}` : ''
    const details = issues.length > 0 ? `:\n${issues.map(i => `  - ${i}`).join('\n')}` : ''
    super(
      `Invalid configuration${where}: ${message}${details}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the configuration file syntax and field types',
        context: { location: options.location, issues },
        cause: options.cause
      }
    )
    this.name = 'InvalidConfigError'
    this.issues = issues
  }

  /**
   * Build from zod issues, prefixing each path with the section being parsed
   */
  static fromZodIssues(location: string, issues: ZodIssue[]): InvalidConfigError {
    return new InvalidConfigError('schema validation failed', {
      location,
      issues: issues.map(issue => {
        const pathPart = issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
        return `${pathPart}${issue.message}`
      })
    })
  }
}

/**
 * Thrown when configuration files include each other
 */
export class CircularIncludeError extends ConfigError {
  constructor(configPath: string, chain: string[]) {
    super(
      `Circular configuration include detected: ${configPath}`,
      'CIRCULAR_INCLUDE',
      {
        suggestion: 'Check the "includes" lists of your configuration files',
        context: { configPath, chain }
      }
    )
    this.name = 'CircularIncludeError'
  }
}

export class UnknownPluginError extends ConfigError {
  constructor(pluginName: string, availablePlugins: string[]) {
    super(
      `Unknown plugin or configuration section: "${pluginName}"`,
      'UNKNOWN_PLUGIN',
      {
        suggestion: availablePlugins.length > 0
          ? `Available plugins: ${availablePlugins.join(', ')}`
          : 'No plugins are installed',
        context: { pluginName, availablePlugins }
      }
    )
    this.name = 'UnknownPluginError'
  }
}

export class NoPluginsConfiguredError extends ConfigError {
  constructor() {
    super(
      'No loaded plugins configured',
      'NO_PLUGINS_CONFIGURED',
      {
        suggestion: 'Add a configuration section for at least one plugin, or check the --plugin filter'
      }
    )
    this.name = 'NoPluginsConfiguredError'
  }
}

export class ReservedInstanceNameError extends ConfigError {
  constructor(pluginName: string, instanceName: string) {
    super(
      `Instance name "${instanceName}" is reserved (plugin "${pluginName}")`,
      'RESERVED_INSTANCE_NAME',
      {
        suggestion: `Rename the instance under ${pluginName}.instances`,
        context: { pluginName, instanceName }
      }
    )
    this.name = 'ReservedInstanceNameError'
  }
}

/**
 * Thrown when an instance references another instance that is not configured
 */
export class UnresolvedInstanceLinkError extends ConfigError {
  constructor(source: InstanceRef, target: InstanceRef, reason: string) {
    super(
      `Unable to resolve instance reference "${formatInstanceRef(source)} -> ${formatInstanceRef(target)}": ${reason}`,
      'UNRESOLVED_INSTANCE_LINK',
      {
        suggestion: 'Define the referenced instance, or remove the reference',
        context: { source, target, reason }
      }
    )
    this.name = 'UnresolvedInstanceLinkError'
  }
}

/**
 * Thrown when instance references form a cycle
 */
export class DependencyCycleError extends ConfigError {
  readonly cycle: InstanceRef[]

  constructor(cycle: InstanceRef[]) {
    super(
      'Detected dependency cycle in configuration for instance references:\n'
        + cycle.map((ref, i) => `  ${i + 1}. ${formatInstanceRef(ref)}`).join('\n'),
      'DEPENDENCY_CYCLE',
      {
        suggestion: 'Remove one of the instance references in the cycle',
        context: { cycle }
      }
    )
    this.name = 'DependencyCycleError'
    this.cycle = cycle
  }
}

// =============================================================================
// Instance Errors
// =============================================================================

/**
 * Base class for errors that exclude one instance from the rest of a run
 */
export class InstanceError extends DeclarrError {
  readonly instance: InstanceRef

  constructor(instance: InstanceRef, message: string, code: string, options?: ErrorOptions) {
    super(message, code, {
      ...options,
      context: { instance: formatInstanceRef(instance), ...options?.context }
    })
    this.name = 'InstanceError'
    this.instance = instance
  }
}

export class SecretsError extends InstanceError {
  constructor(instance: InstanceRef, reason: string, cause?: unknown) {
    super(
      instance,
      `Unable to fetch secrets for instance ${formatInstanceRef(instance)}: ${reason}`,
      'SECRETS_FAILED',
      {
        suggestion: 'Check the instance credentials in the configuration',
        cause
      }
    )
    this.name = 'SecretsError'
  }
}

export class ConnectionTestError extends InstanceError {
  constructor(instance: InstanceRef, url: string) {
    super(
      instance,
      `Connection test failed for instance ${formatInstanceRef(instance)} (${url})`,
      'CONNECTION_TEST_FAILED',
      {
        suggestion: 'Check that the instance is reachable and the credentials are valid',
        context: { url }
      }
    )
    this.name = 'ConnectionTestError'
  }
}

// =============================================================================
// Remote and Reconciliation Errors
// =============================================================================

/**
 * Thrown by plugin API helpers when a remote call fails
 */
export class RemoteApiError extends DeclarrError {
  readonly method: string
  readonly url: string
  readonly status?: number

  constructor(method: string, url: string, reason: string, options: { status?: number; cause?: unknown } = {}) {
    super(
      `${method} ${url} failed: ${reason}`,
      'REMOTE_API_ERROR',
      {
        context: { method, url, status: options.status },
        cause: options.cause
      }
    )
    this.name = 'RemoteApiError'
    this.method = method
    this.url = url
    this.status = options.status
  }
}

/**
 * Thrown when an attribute mapping fails to compare or render a value
 */
export class ReconcileError extends DeclarrError {
  constructor(resource: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      `Unable to reconcile ${resource}.${path}: ${reason}`,
      'RECONCILE_FAILED',
      {
        context: { resource, path },
        cause
      }
    )
    this.name = 'ReconcileError'
  }
}

/**
 * Wraps an unexpected error raised inside a pipeline stage
 */
export class StageError extends InstanceError {
  readonly stage: RunStage

  constructor(instance: InstanceRef, stage: RunStage, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(
      instance,
      `Unexpected error in stage ${stage} for instance ${formatInstanceRef(instance)}: ${reason}`,
      'STAGE_FAILED',
      { context: { stage }, cause }
    )
    this.name = 'StageError'
    this.stage = stage
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDeclarrError(error: unknown): error is DeclarrError {
  return error instanceof DeclarrError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isInstanceError(error: unknown): error is InstanceError {
  return error instanceof InstanceError
}

export function isRemoteApiError(error: unknown): error is RemoteApiError {
  return error instanceof RemoteApiError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isDeclarrError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Short single-line message for logs and reports
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Wrap a generic error into a DeclarrError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): DeclarrError {
  if (isDeclarrError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new DeclarrError(error.message, defaultCode, { cause: error })
  }
  return new DeclarrError(String(error), defaultCode)
}
