/**
 * Tests for configuration loading and resolution
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  DEFAULT_CONFIG,
  clearConfig,
  getConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
  setConfig,
} from '../../src/config'
import { ConfigurationError } from '../../src/errors'
import { catchError, cleanupTempDir, createIsolatedTempDir } from '../helpers'

describe('parseConfig', () => {
  it('should read values and environment sections', () => {
    const config = parseConfig(`
propertyNameGenerator: plain
strictTypes: true
environments:
  test:
    autoFlush: false
`)

    expect(config).toEqual({
      propertyNameGenerator: 'plain',
      strictTypes: true,
      environments: { test: { autoFlush: false } },
    })
  })

  it('should treat an empty document as no settings', () => {
    expect(parseConfig('')).toEqual({})
  })

  it('should reject unknown keys and wrong types', () => {
    expect(() => parseConfig('colour: blue')).toThrow('sqlweave.config.yaml: unknown key "colour"')
    expect(() => parseConfig('debug: sometimes')).toThrow('sqlweave.config.yaml: debug must be true or false')
    expect(() => parseConfig('propertyNameGenerator: snake')).toThrow(ConfigurationError)
    expect(() => parseConfig('environments:\n  staging: {}')).toThrow('unknown environment "staging"')
  })

  it('should report malformed YAML as a configuration error', () => {
    expect(catchError(() => parseConfig('strictTypes: [true'))).toBeInstanceOf(ConfigurationError)
  })
})

describe('resolveConfig', () => {
  it('should fall back to the defaults', () => {
    expect(resolveConfig(null, {})).toEqual(DEFAULT_CONFIG)
  })

  it('should apply the section of the current environment', () => {
    const config = { autoFlush: true, environments: { production: { autoFlush: false }, test: { debug: true } } }

    expect(resolveConfig(config, { NODE_ENV: 'prod' })).toMatchObject({ autoFlush: false, debug: false })
    expect(resolveConfig(config, { ENVIRONMENT: 'testing' })).toMatchObject({ autoFlush: true, debug: true })
  })

  it('should let environment variables win', () => {
    const config = { strictTypes: false }
    expect(resolveConfig(config, { SQLWEAVE_STRICT_TYPES: 'yes', SQLWEAVE_DEBUG: '0' })).toMatchObject({
      strictTypes: true,
      debug: false,
    })
  })

  it('should reject flags it cannot read', () => {
    expect(() => resolveConfig(null, { SQLWEAVE_DEBUG: 'maybe' })).toThrow(
      'SQLWEAVE_DEBUG must be true or false, got "maybe"'
    )
  })
})

describe('loadConfig', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createIsolatedTempDir()
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  it('should return null without a config file', async () => {
    expect(await loadConfig(tempDir)).toBeNull()
  })

  it('should load and cache the config file', async () => {
    await writeFile(join(tempDir, 'sqlweave.config.yaml'), 'strictTypes: true\n')

    expect(await loadConfig(tempDir)).toEqual({ strictTypes: true })
    expect(getConfig()).toEqual({ strictTypes: true })

    await writeFile(join(tempDir, 'sqlweave.config.yaml'), 'strictTypes: false\n')
    expect(await loadConfig(tempDir)).toEqual({ strictTypes: true })

    clearConfig()
    expect(await loadConfig(tempDir)).toEqual({ strictTypes: false })
  })

  it('should prefer a config set in code', async () => {
    setConfig({ debug: true })
    expect(await loadConfig(tempDir)).toEqual({ debug: true })
  })
})
