/**
 * Type adapters
 *
 * An adapter converts between a property value and the value stored in a
 * column. Columns and parameters name their adapter through the `adapter`
 * directive; a `boolean` property over integer storage uses the built-in
 * `boolean` adapter without one.
 *
 * @module runtime/adapters
 */

import { ConfigurationError, ErrorCode, QueryError, toError } from '../errors'
import type { ParameterSpec, ResultNode } from '../query/types'

export interface TypeAdapter {
  /** Property value to storage value */
  encode(value: unknown): unknown
  /** Storage value to property value; never called with null */
  decode(value: unknown): unknown
}

export const booleanAdapter: TypeAdapter = {
  encode(value) {
    if (typeof value === 'boolean') return value ? 1 : 0
    return value
  },
  decode(value) {
    if (typeof value === 'number') return value !== 0
    if (typeof value === 'bigint') return value !== 0n
    return value
  },
}

export const jsonAdapter: TypeAdapter = {
  encode(value) {
    if (value === undefined || value === null) return null
    return JSON.stringify(value)
  },
  decode(value) {
    if (typeof value !== 'string') return value
    try {
      const parsed: unknown = JSON.parse(value)
      return parsed
    } catch (error) {
      throw new QueryError('Stored JSON value could not be parsed', ErrorCode.QUERY_ERROR, {}, toError(error))
    }
  },
}

export const BUILT_IN_ADAPTERS: Readonly<Record<string, TypeAdapter>> = {
  boolean: booleanAdapter,
  json: jsonAdapter,
}

// =============================================================================
// Registry
// =============================================================================

export class AdapterRegistry {
  private readonly adapters: Map<string, TypeAdapter>

  constructor(custom: Readonly<Record<string, TypeAdapter>> = {}) {
    this.adapters = new Map(Object.entries({ ...BUILT_IN_ADAPTERS, ...custom }))
  }

  has(name: string): boolean {
    return this.adapters.has(name)
  }

  /**
   * @throws ConfigurationError for names that are not registered
   */
  get(name: string): TypeAdapter {
    const adapter = this.adapters.get(name)
    if (!adapter) {
      throw new ConfigurationError(`Unknown type adapter "${name}"`, ErrorCode.UNKNOWN_ADAPTER, {
        adapter: name,
        registered: [...this.adapters.keys()],
      })
    }
    return adapter
  }

  /**
   * Check every adapter a result tree or parameter list names
   *
   * @throws ConfigurationError naming the first unknown adapter
   */
  verify(parameters: readonly ParameterSpec[], result: ResultNode | undefined, context: Record<string, unknown>): void {
    const names = parameters.flatMap((parameter) => (parameter.adapter ? [parameter.adapter] : []))
    const collect = (node: ResultNode): void => {
      for (const field of node.fields) if (field.adapter) names.push(field.adapter)
      node.children.forEach(collect)
    }
    if (result) collect(result)

    const unknown = names.find((name) => !this.adapters.has(name))
    if (unknown !== undefined) {
      throw new ConfigurationError(`Unknown type adapter "${unknown}"`, ErrorCode.UNKNOWN_ADAPTER, {
        ...context,
        adapter: unknown,
      })
    }
  }

  /**
   * Encode parameter values; names without a value are left out so that
   * binding reports them as missing
   */
  encodeParameters(parameters: readonly ParameterSpec[], params: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const encoded: Record<string, unknown> = { ...params }
    for (const parameter of parameters) {
      if (!parameter.adapter || !(parameter.name in params)) continue
      const value = params[parameter.name]
      encoded[parameter.name] = value === null || value === undefined ? null : this.get(parameter.adapter).encode(value)
    }
    return encoded
  }
}
