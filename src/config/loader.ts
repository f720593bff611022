/**
 * Config File Loader
 *
 * Loads sqlweave.config.yaml from the working directory, or takes a
 * configuration defined in code with defineConfig(). Environment sections
 * and SQLWEAVE_* variables are applied by resolveConfig().
 */

import { promises as fs } from 'node:fs'
import { join } from 'node:path'
import * as yaml from 'yaml'
import { CONFIG_FILE_NAME } from '../constants'
import { ConfigurationError, ErrorCode, toError } from '../errors'
import { PROPERTY_NAME_GENERATORS, type PropertyNameGenerator } from '../utils/naming'
import { isObject } from '../utils/type-utils'

/**
 * Values shared by the base configuration and its environment sections
 */
export interface ConfigValues {
  /** How column names become property names (default: lowerCamelCase) */
  propertyNameGenerator?: PropertyNameGenerator | undefined
  /** Fail compilation on columns whose type cannot be determined (default: false) */
  strictTypes?: boolean | undefined
  /** Flush snapshots after mutations (default: true) */
  autoFlush?: boolean | undefined
  /** Log through the console logger (default: false) */
  debug?: boolean | undefined
}

export type ConfigEnvironment = 'development' | 'production' | 'test'

/**
 * sqlweave configuration options
 */
export interface SqlWeaveConfig extends ConfigValues {
  /** Environment-specific overrides */
  environments?: Partial<Record<ConfigEnvironment, ConfigValues>> | undefined
}

export interface ResolvedConfig {
  propertyNameGenerator: PropertyNameGenerator
  strictTypes: boolean
  autoFlush: boolean
  debug: boolean
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  propertyNameGenerator: 'lowerCamelCase',
  strictTypes: false,
  autoFlush: true,
  debug: false,
}

const ENVIRONMENTS: readonly ConfigEnvironment[] = ['development', 'production', 'test']

/**
 * Define configuration with type safety
 *
 * @example
 * ```typescript
 * import { defineConfig, setConfig } from 'sqlweave'
 *
 * setConfig(defineConfig({
 *   strictTypes: true,
 *   environments: { test: { autoFlush: false } }
 * }))
 * ```
 */
export function defineConfig(config: SqlWeaveConfig): SqlWeaveConfig {
  return config
}

// =============================================================================
// Parsing
// =============================================================================

function invalid(message: string, source: string): ConfigurationError {
  return new ConfigurationError(`${source}: ${message}`, ErrorCode.INVALID_CONFIG, { source })
}

function readValues(value: Record<string, unknown>, source: string): ConfigValues {
  const result: ConfigValues = {}
  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case 'propertyNameGenerator': {
        const generator = PROPERTY_NAME_GENERATORS.find((name) => name === entry)
        if (!generator) {
          throw invalid(`propertyNameGenerator must be one of ${PROPERTY_NAME_GENERATORS.join(', ')}`, source)
        }
        result.propertyNameGenerator = generator
        break
      }
      case 'strictTypes':
      case 'autoFlush':
      case 'debug':
        if (typeof entry !== 'boolean') throw invalid(`${key} must be true or false`, source)
        result[key] = entry
        break
      case 'environments':
        break
      default:
        throw invalid(`unknown key "${key}"`, source)
    }
  }
  return result
}

/**
 * Parse and validate YAML configuration text
 *
 * @throws ConfigurationError on malformed YAML, unknown keys or values of the wrong type
 */
export function parseConfig(text: string, source = CONFIG_FILE_NAME): SqlWeaveConfig {
  let document: unknown
  try {
    document = yaml.parse(text)
  } catch (error) {
    throw invalid(toError(error).message, source)
  }
  if (document === null || document === undefined) return {}
  if (!isObject(document)) throw invalid('configuration must be a mapping', source)

  const config: SqlWeaveConfig = readValues(document, source)
  const environments = document['environments']
  if (environments !== undefined) {
    if (!isObject(environments)) throw invalid('environments must be a mapping', source)
    config.environments = {}
    for (const [name, values] of Object.entries(environments)) {
      const environment = ENVIRONMENTS.find((env) => env === name)
      if (!environment) throw invalid(`unknown environment "${name}"`, source)
      if (!isObject(values)) throw invalid(`environments.${name} must be a mapping`, source)
      config.environments[environment] = readValues(values, `${source} (environments.${name})`)
    }
  }
  return config
}

// =============================================================================
// Loading
// =============================================================================

// Module-scoped cache
let _config: SqlWeaveConfig | null = null
let _configLoaded = false

/**
 * Load configuration from sqlweave.config.yaml in the given directory
 *
 * Returns null when there is no configuration file. The result is cached
 * until clearConfig() is called.
 */
export async function loadConfig(cwd: string = process.cwd()): Promise<SqlWeaveConfig | null> {
  if (_configLoaded) return _config

  const path = join(cwd, CONFIG_FILE_NAME)
  let text: string
  try {
    text = await fs.readFile(path, 'utf8')
  } catch (error: unknown) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      _configLoaded = true
      return null
    }
    throw error
  }

  _config = parseConfig(text, path)
  _configLoaded = true
  return _config
}

/**
 * Get cached config (must call loadConfig or setConfig first)
 */
export function getConfig(): SqlWeaveConfig | null {
  return _config
}

/**
 * Set config manually (useful for testing or explicit configuration)
 */
export function setConfig(config: SqlWeaveConfig): void {
  _config = config
  _configLoaded = true
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfig(): void {
  _config = null
  _configLoaded = false
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Detect current environment (development/production/test)
 */
function detectEnvironment(env: NodeJS.ProcessEnv): ConfigEnvironment | null {
  const name = env.NODE_ENV ?? env.ENVIRONMENT

  if (name === 'development' || name === 'dev') return 'development'
  if (name === 'production' || name === 'prod') return 'production'
  if (name === 'test' || name === 'testing') return 'test'

  return null
}

function envFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase()
  if (value === undefined || value === '') return undefined
  if (value === '1' || value === 'true' || value === 'yes') return true
  if (value === '0' || value === 'false' || value === 'no') return false
  throw new ConfigurationError(`${name} must be true or false, got "${env[name] ?? ''}"`, ErrorCode.INVALID_CONFIG, {
    variable: name,
  })
}

function definedValues(values: ConfigValues | undefined): Partial<ResolvedConfig> {
  const result: Partial<ResolvedConfig> = {}
  if (values?.propertyNameGenerator !== undefined) result.propertyNameGenerator = values.propertyNameGenerator
  if (values?.strictTypes !== undefined) result.strictTypes = values.strictTypes
  if (values?.autoFlush !== undefined) result.autoFlush = values.autoFlush
  if (values?.debug !== undefined) result.debug = values.debug
  return result
}

/**
 * Apply defaults, the section of the current environment and the
 * SQLWEAVE_STRICT_TYPES / SQLWEAVE_DEBUG variables, in that order
 */
export function resolveConfig(config?: SqlWeaveConfig | null, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const environment = detectEnvironment(env)
  const { environments, ...base } = config ?? {}
  const section = environment ? environments?.[environment] : undefined

  const resolved: ResolvedConfig = { ...DEFAULT_CONFIG, ...definedValues(base), ...definedValues(section) }

  const strictTypes = envFlag(env, 'SQLWEAVE_STRICT_TYPES')
  if (strictTypes !== undefined) resolved.strictTypes = strictTypes
  const debug = envFlag(env, 'SQLWEAVE_DEBUG')
  if (debug !== undefined) resolved.debug = debug

  return resolved
}
