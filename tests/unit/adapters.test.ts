/**
 * Tests for type adapters
 */

import { describe, it, expect } from 'vitest'
import { AdapterRegistry, booleanAdapter, jsonAdapter, type TypeAdapter } from '../../src/runtime/adapters'
import type { ParameterSpec } from '../../src/query/types'
import { ConfigurationError, ErrorCode, QueryError } from '../../src/errors'
import { catchError } from '../helpers'

const upperAdapter: TypeAdapter = {
  encode: (value) => (typeof value === 'string' ? value.toUpperCase() : value),
  decode: (value) => (typeof value === 'string' ? value.toLowerCase() : value),
}

describe('built-in adapters', () => {
  it('should store booleans as integers', () => {
    expect(booleanAdapter.encode(true)).toBe(1)
    expect(booleanAdapter.encode(false)).toBe(0)
    expect(booleanAdapter.decode(0)).toBe(false)
    expect(booleanAdapter.decode(2)).toBe(true)
    expect(booleanAdapter.decode(1n)).toBe(true)
  })

  it('should store JSON values as text', () => {
    expect(jsonAdapter.encode({ tags: ['a'] })).toBe('{"tags":["a"]}')
    expect(jsonAdapter.encode(null)).toBeNull()
    expect(jsonAdapter.decode('[1,2]')).toEqual([1, 2])
  })

  it('should report unparseable JSON', () => {
    expect(() => jsonAdapter.decode('{oops')).toThrow(QueryError)
  })
})

describe('AdapterRegistry', () => {
  const parameters: ParameterSpec[] = [
    { name: 'code', propertyType: 'string', nullable: true, adapter: 'upper' },
    { name: 'plain', propertyType: 'string', nullable: false },
  ]

  it('should combine built-in and custom adapters', () => {
    const registry = new AdapterRegistry({ upper: upperAdapter })
    expect(registry.has('boolean')).toBe(true)
    expect(registry.get('upper')).toBe(upperAdapter)
  })

  it('should reject unknown adapter names', () => {
    const error = catchError(() => new AdapterRegistry().get('upper'))
    expect(error).toBeInstanceOf(ConfigurationError)
    if (error instanceof ConfigurationError) expect(error.code).toBe(ErrorCode.UNKNOWN_ADAPTER)
  })

  it('should verify the adapters a query names', () => {
    expect(() => new AdapterRegistry().verify(parameters, undefined, { query: 'q' })).toThrow('Unknown type adapter "upper"')
    expect(() => new AdapterRegistry({ upper: upperAdapter }).verify(parameters, undefined, { query: 'q' })).not.toThrow()
  })

  it('should encode parameters that have a value', () => {
    const registry = new AdapterRegistry({ upper: upperAdapter })

    expect(registry.encodeParameters(parameters, { code: 'ab', plain: 'cd' })).toEqual({ code: 'AB', plain: 'cd' })
    expect(registry.encodeParameters(parameters, { code: null, plain: 'cd' })).toEqual({ code: null, plain: 'cd' })
    expect(registry.encodeParameters(parameters, { plain: 'cd' })).toEqual({ plain: 'cd' })
  })
})
