/**
 * Storage type to property type mapping
 *
 * @module schema/type-mapping
 */

export type Affinity = 'INTEGER' | 'TEXT' | 'BLOB' | 'REAL' | 'NUMERIC'

/**
 * Column affinity of a declared type, following the engine's rules
 */
export function affinityOf(declaredType: string): Affinity {
  const type = declaredType.toUpperCase()
  if (type.includes('INT')) return 'INTEGER'
  if (type.includes('CHAR') || type.includes('CLOB') || type.includes('TEXT')) return 'TEXT'
  if (type.trim() === '' || type.includes('BLOB')) return 'BLOB'
  if (type.includes('REAL') || type.includes('FLOA') || type.includes('DOUB')) return 'REAL'
  return 'NUMERIC'
}

/**
 * Default property type of a declared storage type
 */
export function defaultPropertyType(declaredType: string): string {
  switch (affinityOf(declaredType)) {
    case 'INTEGER':
    case 'REAL':
    case 'NUMERIC':
      return 'number'
    case 'TEXT':
      return 'string'
    case 'BLOB':
      return 'Uint8Array'
  }
}

/**
 * Adapter a property needs implicitly: booleans stored as integers go through
 * the built-in `boolean` adapter.
 */
export function implicitAdapter(propertyType: string, sqlType: string): string | undefined {
  if (propertyType !== 'boolean') return undefined
  const affinity = affinityOf(sqlType)
  return affinity === 'INTEGER' || affinity === 'NUMERIC' ? 'boolean' : undefined
}

const LIST_TYPE = /^(?:List|Array|ReadonlyArray)<(.+)>$/

/**
 * Element type of `List<T>`-style property types, or the type itself
 */
export function unwrapListType(propertyType: string): string {
  const match = LIST_TYPE.exec(propertyType.trim())
  const inner = match?.[1]
  if (inner) return inner.trim()
  return propertyType.endsWith('[]') ? propertyType.slice(0, -2) : propertyType
}
