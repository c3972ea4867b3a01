/**
 * Tests for Declarr Error Hierarchy
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  DeclarrError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  CircularIncludeError,
  UnknownPluginError,
  NoPluginsConfiguredError,
  ReservedInstanceNameError,
  UnresolvedInstanceLinkError,
  DependencyCycleError,
  InstanceError,
  SecretsError,
  ConnectionTestError,
  RemoteApiError,
  ReconcileError,
  StageError,
  isDeclarrError,
  isConfigError,
  isInstanceError,
  isRemoteApiError,
  formatErrorForCli,
  errorMessage,
  wrapError
} from '../../src/lib/errors.js'

const hd = { plugin: 'sonarr', instance: 'sonarr-hd' }
const main = { plugin: 'prowlarr', instance: 'default' }

describe('DeclarrError (base class)', () => {
  it('should create error with message and code', () => {
    const error = new DeclarrError('test message', 'TEST_CODE')
    expect(error.message).toBe('test message')
    expect(error.code).toBe('TEST_CODE')
    expect(error.name).toBe('DeclarrError')
    expect(error instanceof Error).toBe(true)
  })

  it('should keep suggestion, context and cause', () => {
    const cause = new Error('root')
    const error = new DeclarrError('msg', 'CODE', {
      suggestion: 'try again',
      context: { key: 'value' },
      cause
    })
    expect(error.suggestion).toBe('try again')
    expect(error.context).toEqual({ key: 'value' })
    expect(error.cause).toBe(cause)
  })

  it('should format for CLI with suggestion', () => {
    const error = new DeclarrError('broken', 'CODE', { suggestion: 'fix it' })
    expect(error.toCliOutput()).toBe('Error: broken\n  Suggestion: fix it')
  })

  it('should format for CLI without suggestion', () => {
    expect(new DeclarrError('broken', 'CODE').toCliOutput()).toBe('Error: broken')
  })

  it('should serialize to JSON', () => {
    const json = new DeclarrError('broken', 'CODE', { context: { a: 1 } }).toJSON()
    expect(json.name).toBe('DeclarrError')
    expect(json.code).toBe('CODE')
    expect(json.message).toBe('broken')
    expect(json.context).toEqual({ a: 1 })
  })
})

describe('Configuration errors', () => {
  it('ConfigNotFoundError should name the path', () => {
    const error = new ConfigNotFoundError('/etc/declarr/declarr.yml')
    expect(error.message).toBe('Config file not found: /etc/declarr/declarr.yml')
    expect(error.code).toBe('CONFIG_NOT_FOUND')
    expect(error).toBeInstanceOf(ConfigError)
  })

  it('InvalidConfigError should list issues under the location', () => {
    const error = new InvalidConfigError('schema validation failed', {
      location: 'declarr',
      issues: ['concurrency: Expected number', 'update_times: Required']
    })
    expect(error.message).toBe(
      'Invalid configuration in declarr: schema validation failed:\n'
      + '  - concurrency: Expected number\n'
      + '  - update_times: Required'
    )
    expect(error.issues).toHaveLength(2)
  })

  it('InvalidConfigError.fromZodIssues should prefix paths', () => {
    const result = z.object({ port: z.number() }).safeParse({ port: 'x' })
    expect(result.success).toBe(false)
    if (result.success) return

    const error = InvalidConfigError.fromZodIssues("sonarr.instances['sonarr-hd']", result.error.issues)
    expect(error.issues).toEqual(['port: Expected number, received string'])
    expect(error.message).toContain("in sonarr.instances['sonarr-hd']")
  })

  it('CircularIncludeError should keep the chain in context', () => {
    const error = new CircularIncludeError('/a.yml', ['/a.yml', '/b.yml', '/a.yml'])
    expect(error.message).toBe('Circular configuration include detected: /a.yml')
    expect(error.context?.chain).toEqual(['/a.yml', '/b.yml', '/a.yml'])
  })

  it('UnknownPluginError should suggest available plugins', () => {
    const error = new UnknownPluginError('lidarr', ['radarr', 'sonarr'])
    expect(error.message).toBe('Unknown plugin or configuration section: "lidarr"')
    expect(error.suggestion).toBe('Available plugins: radarr, sonarr')
  })

  it('UnknownPluginError should handle no installed plugins', () => {
    expect(new UnknownPluginError('x', []).suggestion).toBe('No plugins are installed')
  })

  it('NoPluginsConfiguredError should have a fixed message', () => {
    const error = new NoPluginsConfiguredError()
    expect(error.message).toBe('No loaded plugins configured')
    expect(error.code).toBe('NO_PLUGINS_CONFIGURED')
  })

  it('ReservedInstanceNameError should name plugin and instance', () => {
    const error = new ReservedInstanceNameError('sonarr', 'default')
    expect(error.message).toBe('Instance name "default" is reserved (plugin "sonarr")')
  })

  it('UnresolvedInstanceLinkError should describe the link', () => {
    const error = new UnresolvedInstanceLinkError(hd, main, "plugin 'prowlarr' is not installed")
    expect(error.message).toBe(
      "Unable to resolve instance reference \"sonarr.instances['sonarr-hd'] -> prowlarr\": plugin 'prowlarr' is not installed"
    )
  })

  it('DependencyCycleError should list every instance in the cycle', () => {
    const a = { plugin: 'sonarr', instance: 'a' }
    const b = { plugin: 'sonarr', instance: 'b' }
    const error = new DependencyCycleError([a, b, a])
    expect(error.message).toBe(
      'Detected dependency cycle in configuration for instance references:\n'
      + "  1. sonarr.instances['a']\n"
      + "  2. sonarr.instances['b']\n"
      + "  3. sonarr.instances['a']"
    )
    expect(error.cycle).toEqual([a, b, a])
  })
})

describe('Instance errors', () => {
  it('SecretsError should carry the instance', () => {
    const error = new SecretsError(hd, 'no API key')
    expect(error.message).toBe("Unable to fetch secrets for instance sonarr.instances['sonarr-hd']: no API key")
    expect(error.instance).toEqual(hd)
    expect(error.context?.instance).toBe("sonarr.instances['sonarr-hd']")
    expect(error).toBeInstanceOf(InstanceError)
  })

  it('ConnectionTestError should include the URL', () => {
    const error = new ConnectionTestError(main, 'http://prowlarr:9696')
    expect(error.message).toBe('Connection test failed for instance prowlarr (http://prowlarr:9696)')
    expect(error.context).toEqual({ instance: 'prowlarr', url: 'http://prowlarr:9696' })
  })

  it('StageError should wrap the cause', () => {
    const error = new StageError(hd, 'FETCH_REMOTE', new Error('boom'))
    expect(error.message).toBe("Unexpected error in stage FETCH_REMOTE for instance sonarr.instances['sonarr-hd']: boom")
    expect(error.stage).toBe('FETCH_REMOTE')
  })
})

describe('Remote and reconciliation errors', () => {
  it('RemoteApiError should format method, url and reason', () => {
    const error = new RemoteApiError('GET', 'http://sonarr:8989/api/v3/tag', 'Unauthorized', { status: 401 })
    expect(error.message).toBe('GET http://sonarr:8989/api/v3/tag failed: Unauthorized')
    expect(error.status).toBe(401)
    expect(error.method).toBe('GET')
  })

  it('ReconcileError should name resource and path', () => {
    const error = new ReconcileError('settings', 'settings.log_level', new Error('bad value'))
    expect(error.message).toBe('Unable to reconcile settings.settings.log_level: bad value')
  })
})

describe('Type guards', () => {
  it('should narrow by class', () => {
    const config = new NoPluginsConfiguredError()
    const instance = new SecretsError(hd, 'x')
    const remote = new RemoteApiError('GET', 'http://x', 'y')

    expect(isDeclarrError(config)).toBe(true)
    expect(isConfigError(config)).toBe(true)
    expect(isConfigError(instance)).toBe(false)
    expect(isInstanceError(instance)).toBe(true)
    expect(isRemoteApiError(remote)).toBe(true)
    expect(isDeclarrError(new Error('plain'))).toBe(false)
  })
})

describe('Formatting helpers', () => {
  it('formatErrorForCli should handle every kind of value', () => {
    expect(formatErrorForCli(new NoPluginsConfiguredError())).toBe(
      'Error: No loaded plugins configured\n'
      + '  Suggestion: Add a configuration section for at least one plugin, or check the --plugin filter'
    )
    expect(formatErrorForCli(new Error('plain'))).toBe('Error: plain')
    expect(formatErrorForCli('text')).toBe('Error: text')
  })

  it('errorMessage should return the bare message', () => {
    expect(errorMessage(new Error('plain'))).toBe('plain')
    expect(errorMessage(42)).toBe('42')
  })

  it('wrapError should keep DeclarrErrors and wrap others', () => {
    const original = new NoPluginsConfiguredError()
    expect(wrapError(original)).toBe(original)

    const wrapped = wrapError(new Error('plain'), 'CUSTOM')
    expect(wrapped).toBeInstanceOf(DeclarrError)
    expect(wrapped.code).toBe('CUSTOM')
    expect(wrapped.message).toBe('plain')

    expect(wrapError('text').code).toBe('UNKNOWN_ERROR')
  })
})
