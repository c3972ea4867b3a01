/**
 * Tests for registry.ts (instance registry)
 */

import { describe, it, expect } from 'vitest'
import { buildRegistry, connectionOf } from '../../src/domain/registry.js'
import {
  InvalidConfigError,
  NoPluginsConfiguredError,
  ReservedInstanceNameError,
  UnknownPluginError
} from '../../src/lib/errors.js'
import { FakeBackend, createFakePlugin } from '../fixtures/fake-plugin.js'

const backend = new FakeBackend()
const sonarr = createFakePlugin(backend)
const radarr = createFakePlugin(backend, { name: 'radarr' })
const installed = [sonarr, radarr]

describe('registry', () => {
  describe('buildRegistry', () => {
    it('should create a default instance when no instances are declared', () => {
      const registry = buildRegistry({ sonarr: { hostname: 'sonarr-main', api_key: 'test-secret' } }, installed)

      expect(registry.plugins.map(p => p.name)).toEqual(['sonarr'])
      expect(registry.instances).toHaveLength(1)
      expect(registry.instances[0].ref).toEqual({ plugin: 'sonarr', instance: 'default' })
      expect(registry.instances[0].config).toMatchObject({
        hostname: 'sonarr-main',
        port: 8989,
        protocol: 'http',
        api_key: 'test-secret'
      })
    })

    it('should apply schema defaults to an empty section', () => {
      const registry = buildRegistry({ sonarr: null }, installed)
      expect(registry.instances[0].config.hostname).toBe('sonarr')
    })

    it('should merge instance name, plugin-wide keys and instance keys in that order', () => {
      const registry = buildRegistry({
        sonarr: {
          port: 9000,
          api_key: 'test-secret',
          settings: { instance_name: 'Shared' },
          instances: {
            'sonarr-hd': {},
            'sonarr-4k': { port: 9001, hostname: 'uhd.local', settings: { instance_name: '4K' } }
          }
        }
      }, installed)

      const [uhd, hd] = registry.instances
      expect(hd.ref.instance).toBe('sonarr-hd')
      expect(hd.config).toMatchObject({ hostname: 'sonarr-hd', port: 9000, settings: { instance_name: 'Shared' } })
      expect(uhd.ref.instance).toBe('sonarr-4k')
      expect(uhd.config).toMatchObject({ hostname: 'uhd.local', port: 9001, settings: { instance_name: '4K' } })
    })

    it('should let plugin-wide hostname override the instance name', () => {
      const registry = buildRegistry({
        sonarr: { hostname: 'shared-host', instances: { a: {} } }
      }, installed)
      expect(registry.instances[0].config.hostname).toBe('shared-host')
    })

    it('should sort plugins and instances', () => {
      const registry = buildRegistry({
        sonarr: { instances: { b: {}, a: {} } },
        radarr: {}
      }, installed)
      expect(registry.instances.map(r => `${r.ref.plugin}/${r.ref.instance}`)).toEqual([
        'radarr/default',
        'sonarr/a',
        'sonarr/b'
      ])
      expect(registry.get({ plugin: 'sonarr', instance: 'b' })?.ref.instance).toBe('b')
      expect(registry.get({ plugin: 'sonarr', instance: 'z' })).toBeUndefined()
    })

    it('should skip the declarr and includes sections', () => {
      const registry = buildRegistry({ declarr: { concurrency: 2 }, includes: [], sonarr: {} }, installed)
      expect(registry.plugins.map(p => p.name)).toEqual(['sonarr'])
    })

    it('should reject the reserved instance name', () => {
      expect(() => buildRegistry({ sonarr: { instances: { default: {} } } }, installed))
        .toThrow(ReservedInstanceNameError)
    })

    it('should reject unknown sections', () => {
      expect(() => buildRegistry({ lidarr: {} }, installed)).toThrow(UnknownPluginError)
    })

    it('should reject an unknown plugin in the filter', () => {
      expect(() => buildRegistry({ sonarr: {} }, installed, { pluginFilter: ['lidarr'] }))
        .toThrow(UnknownPluginError)
    })

    it('should keep only filtered plugins', () => {
      const registry = buildRegistry({ sonarr: {}, radarr: {} }, installed, { pluginFilter: ['radarr'] })
      expect(registry.plugins.map(p => p.name)).toEqual(['radarr'])
    })

    it('should fail when no installed plugin is configured', () => {
      expect(() => buildRegistry({ declarr: {} }, installed)).toThrow(NoPluginsConfiguredError)
      expect(() => buildRegistry({ sonarr: {} }, installed, { pluginFilter: ['radarr'] }))
        .toThrow(NoPluginsConfiguredError)
    })

    it('should report schema errors with the instance location', () => {
      try {
        buildRegistry({ sonarr: { instances: { hd: { port: 'http' } } } }, installed)
        expect.fail('expected a validation error')
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigError)
        if (error instanceof InvalidConfigError) {
          expect(error.message).toContain("in sonarr.instances['hd']")
          expect(error.issues).toEqual(['port: Expected number, received string'])
        }
      }
    })

    it('should reject unknown keys through the plugin schema', () => {
      expect(() => buildRegistry({ sonarr: { colour: 'blue' } }, installed)).toThrow(InvalidConfigError)
    })

    it('should reject an instances value that is not a mapping', () => {
      expect(() => buildRegistry({ sonarr: { instances: ['a'] } }, installed))
        .toThrow('"instances" must be a mapping of instance names to configurations')
    })
  })

  describe('connectionOf', () => {
    it('should build the base URL and timeout', () => {
      expect(connectionOf({ hostname: 'sonarr', port: 8989, protocol: 'https' }, 2.5)).toEqual({
        hostname: 'sonarr',
        port: 8989,
        protocol: 'https',
        url: 'https://sonarr:8989',
        timeoutMs: 2500
      })
    })
  })
})
