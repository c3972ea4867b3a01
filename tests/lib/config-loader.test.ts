/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'
import os from 'node:os'
import {
  DEFAULT_CONFIG_FILE,
  deepMerge,
  expandEnvVars,
  expandEnvVarsInValue,
  loadConfig,
  resolveConfigPath
} from '../../src/lib/config-loader.js'
import {
  CircularIncludeError,
  ConfigNotFoundError,
  InvalidConfigError
} from '../../src/lib/errors.js'

describe('config-loader', () => {
  let tempDir: string

  const write = (name: string, content: string): string => {
    const file = path.join(tempDir, name)
    fs.mkdirSync(path.dirname(file), { recursive: true })
    fs.writeFileSync(file, content)
    return file
  }

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'declarr-config-test-')))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('expandEnvVars', () => {
    const env = { API_KEY: 'test-secret', HOST: 'sonarr' }

    it('should expand ${VAR}', () => {
      expect(expandEnvVars('key=${API_KEY}', env)).toBe('key=test-secret')
    })

    it('should expand ${VAR:-default} with and without the variable', () => {
      expect(expandEnvVars('${HOST:-localhost}', env)).toBe('sonarr')
      expect(expandEnvVars('${PORT:-8989}', env)).toBe('8989')
    })

    it('should expand $VAR', () => {
      expect(expandEnvVars('http://$HOST:8989', env)).toBe('http://sonarr:8989')
    })

    it('should replace unknown variables with empty strings', () => {
      expect(expandEnvVars('[${MISSING}]', env)).toBe('[]')
    })
  })

  describe('expandEnvVarsInValue', () => {
    it('should expand nested strings and keep other values', () => {
      const result = expandEnvVarsInValue(
        { a: '${X}', b: ['${X}', 1], c: { d: true } },
        { X: 'y' }
      )
      expect(result).toEqual({ a: 'y', b: ['y', 1], c: { d: true } })
    })
  })

  describe('deepMerge', () => {
    it('should merge nested objects and replace arrays', () => {
      const merged = deepMerge(
        { sonarr: { port: 8989, settings: { a: 1 }, tags: ['x'] } },
        { sonarr: { settings: { b: 2 }, tags: ['y'] } }
      )
      expect(merged).toEqual({ sonarr: { port: 8989, settings: { a: 1, b: 2 }, tags: ['y'] } })
    })

    it('should not mutate the target', () => {
      const target = { a: { b: 1 } }
      deepMerge(target, { a: { c: 2 } })
      expect(target).toEqual({ a: { b: 1 } })
    })
  })

  describe('resolveConfigPath', () => {
    it('should default to declarr.yml in the working directory', () => {
      const file = write(DEFAULT_CONFIG_FILE, 'declarr: {}\n')
      expect(resolveConfigPath(undefined, tempDir)).toBe(file)
    })

    it('should resolve relative paths against the working directory', () => {
      const file = write('conf/main.yml', 'declarr: {}\n')
      expect(resolveConfigPath('conf/main.yml', tempDir)).toBe(file)
    })

    it('should throw when the file does not exist', () => {
      expect(() => resolveConfigPath(undefined, tempDir)).toThrow(ConfigNotFoundError)
    })
  })

  describe('loadConfig', () => {
    it('should load a single file', () => {
      const file = write('declarr.yml', 'sonarr:\n  hostname: sonarr\n  port: 8989\n')
      const loaded = loadConfig(file, {})
      expect(loaded.path).toBe(file)
      expect(loaded.files).toEqual([file])
      expect(loaded.document).toEqual({ sonarr: { hostname: 'sonarr', port: 8989 } })
    })

    it('should treat an empty file as an empty document', () => {
      const file = write('declarr.yml', '')
      expect(loadConfig(file, {}).document).toEqual({})
    })

    it('should expand environment variables', () => {
      const file = write('declarr.yml', 'sonarr:\n  api_key: ${SONARR_API_KEY}\n')
      expect(loadConfig(file, { SONARR_API_KEY: 'test-secret' }).document).toEqual({
        sonarr: { api_key: 'test-secret' }
      })
    })

    it('should merge includes in load order with later files winning', () => {
      const main = write('declarr.yml', [
        'includes:',
        '  - sonarr.yml',
        '  - overrides/local.yml',
        'declarr:',
        '  concurrency: 1',
        'sonarr:',
        '  hostname: sonarr',
        ''
      ].join('\n'))
      const sonarr = write('sonarr.yml', 'sonarr:\n  port: 8989\n  settings:\n    instance_name: Sonarr\n')
      const local = write('overrides/local.yml', 'declarr:\n  concurrency: 4\nsonarr:\n  settings:\n    instance_name: Local\n')

      const loaded = loadConfig(main, {})
      expect(loaded.files).toEqual([main, sonarr, local])
      expect(loaded.document).toEqual({
        declarr: { concurrency: 4 },
        sonarr: { hostname: 'sonarr', port: 8989, settings: { instance_name: 'Local' } }
      })
    })

    it('should resolve nested includes relative to the including file', () => {
      const main = write('declarr.yml', 'includes: [conf/a.yml]\n')
      const a = write('conf/a.yml', 'includes: [b.yml]\na: 1\n')
      const b = write('conf/b.yml', 'b: 2\n')

      const loaded = loadConfig(main, {})
      expect(loaded.files).toEqual([main, a, b])
      expect(loaded.document).toEqual({ a: 1, b: 2 })
    })

    it('should reject circular includes', () => {
      const main = write('declarr.yml', 'includes: [other.yml]\n')
      write('other.yml', 'includes: [declarr.yml]\n')
      expect(() => loadConfig(main, {})).toThrow(CircularIncludeError)
    })

    it('should reject includes that are not a list of paths', () => {
      const main = write('declarr.yml', 'includes: other.yml\n')
      expect(() => loadConfig(main, {})).toThrow('"includes" must be a list of file paths')
    })

    it('should reject a missing include', () => {
      const main = write('declarr.yml', 'includes: [missing.yml]\n')
      expect(() => loadConfig(main, {})).toThrow(ConfigNotFoundError)
    })

    it('should reject invalid YAML', () => {
      const main = write('declarr.yml', 'sonarr: [unclosed\n')
      expect(() => loadConfig(main, {})).toThrow(InvalidConfigError)
    })

    it('should reject a top-level list', () => {
      const main = write('declarr.yml', '- a\n- b\n')
      expect(() => loadConfig(main, {})).toThrow('expected a mapping at the top level, got a list')
    })
  })
})
