/**
 * Declarr Config Loader
 *
 * Loads declarr.yml and every file it pulls in through `includes`,
 * expanding environment variables in string values.
 *
 * Files are merged in load order (the including file first, then its
 * includes depth-first); when the same key appears twice the later file wins.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import { CircularIncludeError, ConfigNotFoundError, InvalidConfigError } from './errors.js'

export const DEFAULT_CONFIG_FILE = 'declarr.yml'
export const INCLUDES_KEY = 'includes'
const MAX_INCLUDE_DEPTH = 10

export type ConfigDocument = Record<string, unknown>

export interface LoadedConfig {
  /** Absolute path of the root configuration file */
  path: string
  /** Every file read, in merge order */
  files: string[]
  /** Merged document, without `includes` */
  document: ConfigDocument
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
export function expandEnvVarsInValue(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(entry, env)
    }
    return result
  }

  return value
}

/**
 * Deep merge two config objects. Arrays and scalars from `source` replace
 * those in `target`; nested objects merge.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const key of Object.keys(source)) {
    const sourceValue = source[key]
    const targetValue = result[key]

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Deep merge objects
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue
    }
  }

  return result
}

/**
 * Resolve the configuration file path: explicit argument, or declarr.yml
 * in the working directory
 */
export function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): string {
  const resolved = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE)
  if (!fs.existsSync(resolved)) {
    throw new ConfigNotFoundError(resolved)
  }
  return resolved
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv): ConfigDocument {
  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath)
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new InvalidConfigError(error instanceof Error ? error.message : String(error), {
      location: configPath,
      cause: error
    })
  }

  // An empty file is an empty configuration
  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError(
      `expected a mapping at the top level, got ${Array.isArray(parsed) ? 'a list' : typeof parsed}`,
      { location: configPath }
    )
  }

  const expanded = expandEnvVarsInValue(parsed, env)
  return isPlainObject(expanded) ? expanded : {}
}

function readIncludes(document: ConfigDocument, configPath: string): string[] {
  const includes = document[INCLUDES_KEY]
  if (includes === undefined || includes === null) {
    return []
  }
  if (!Array.isArray(includes) || !includes.every((entry): entry is string => typeof entry === 'string')) {
    throw new InvalidConfigError(`"${INCLUDES_KEY}" must be a list of file paths`, { location: configPath })
  }
  return includes.map(include => path.resolve(path.dirname(configPath), include))
}

function collectFiles(
  configPath: string,
  env: NodeJS.ProcessEnv,
  chain: string[],
  files: string[],
  documents: ConfigDocument[]
): void {
  if (chain.includes(configPath)) {
    throw new CircularIncludeError(configPath, [...chain, configPath])
  }
  if (chain.length > MAX_INCLUDE_DEPTH) {
    throw new InvalidConfigError(`include depth exceeded (max ${MAX_INCLUDE_DEPTH})`, { location: configPath })
  }

  const document = loadConfigFile(configPath, env)
  const includes = readIncludes(document, configPath)
  const { [INCLUDES_KEY]: _, ...content } = document

  files.push(configPath)
  documents.push(content)

  for (const include of includes) {
    collectFiles(include, env, [...chain, configPath], files, documents)
  }
}

/**
 * Load a configuration file and everything it includes
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const absolutePath = path.resolve(configPath)
  const files: string[] = []
  const documents: ConfigDocument[] = []

  collectFiles(absolutePath, env, [], files, documents)

  const document = documents.reduce<ConfigDocument>((merged, next) => deepMerge(merged, next), {})

  return { path: absolutePath, files, document }
}
