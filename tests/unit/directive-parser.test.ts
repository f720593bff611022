/**
 * Tests for the @@{ ... } directive block parser
 */

import { describe, it, expect } from 'vitest'
import { hasDirective, parseDirectives, type Locator } from '../../src/annotations/parser'
import { AnnotationError, ErrorCode } from '../../src/errors'
import { catchError } from '../helpers'

const locate: Locator = (offset) => ({ file: 'test.sql', line: 1, column: offset + 1 })

function parseOne(text: string): Map<string, unknown> {
  const [directive] = parseDirectives(text, locate)
  if (!directive) throw new Error('no directive parsed')
  return directive.entries
}

describe('parseDirectives', () => {
  describe('values', () => {
    it('should read bare scalars as text, booleans and numbers', () => {
      const entries = parseOne(' @@{ name=Person, notNull=true, count=3, ratio=-1.5 }')

      expect([...entries]).toEqual([
        ['name', 'Person'],
        ['notNull', true],
        ['count', 3],
        ['ratio', -1.5],
      ])
    })

    it('should read nested maps and lists', () => {
      const entries = parseOne('@@{ cascadeNotify={ delete=[book, review], update: ["a b"] } }')

      expect(entries.get('cascadeNotify')).toEqual({ delete: ['book', 'review'], update: ['a b'] })
    })

    it('should accept newlines as entry separators', () => {
      const entries = parseOne('@@{\n  name=x\n  mapTo=y\n}')
      expect(Object.fromEntries(entries)).toEqual({ name: 'x', mapTo: 'y' })
    })

    it('should unescape quoted strings', () => {
      const entries = parseOne("@@{ defaultValue='it\\'s' }")
      expect(entries.get('defaultValue')).toBe("it's")
    })

    it('should keep quoted numbers as text', () => {
      const entries = parseOne('@@{ collectionKey="42" }')
      expect(entries.get('collectionKey')).toBe('42')
    })
  })

  describe('blocks', () => {
    it('should parse every block in a comment with its location', () => {
      const directives = parseDirectives('@@{ a=1 } text @@{ b=2 }', locate)

      expect(directives.map((directive) => directive.offset)).toEqual([0, 15])
      expect(directives[1]?.location).toEqual({ file: 'test.sql', line: 1, column: 16 })
      expect(directives.map((directive) => Object.fromEntries(directive.entries))).toEqual([{ a: 1 }, { b: 2 }])
    })

    it('should return nothing for comments without a marker', () => {
      expect(parseDirectives('just a comment', locate)).toEqual([])
      expect(hasDirective('just a comment')).toBe(false)
      expect(hasDirective('see @@{ a=1 }')).toBe(true)
    })
  })

  describe('errors', () => {
    it('should reject duplicate keys at the second occurrence', () => {
      const error = catchError(() => parseDirectives('@@{ name=a, name=b }', locate))

      expect(error).toBeInstanceOf(AnnotationError)
      if (error instanceof AnnotationError) {
        expect(error.code).toBe(ErrorCode.ANNOTATION_DUPLICATE_KEY)
        expect(error.location).toEqual({ file: 'test.sql', line: 1, column: 13 })
      }
    })

    it('should report a missing closing brace at the opening marker', () => {
      const error = catchError(() => parseDirectives('@@{ name=a', locate))

      expect(error).toBeInstanceOf(AnnotationError)
      if (error instanceof AnnotationError) {
        expect(error.code).toBe(ErrorCode.ANNOTATION_SYNTAX)
        expect(error.location.column).toBe(1)
        expect(error.message).toContain('missing "}"')
      }
    })

    it('should report a stray closing brace after a block', () => {
      const error = catchError(() => parseDirectives('@@{ a=1 } }', locate))

      expect(error).toBeInstanceOf(AnnotationError)
      if (error instanceof AnnotationError) {
        expect(error.location.column).toBe(11)
        expect(error.message).toContain('unexpected "}"')
      }
    })

    it('should report a missing closing bracket', () => {
      expect(() => parseDirectives('@@{ a=[1, 2 }', locate)).toThrow('unexpected "}"')
    })

    it('should reject a key without a value', () => {
      expect(() => parseDirectives('@@{ a= }', locate)).toThrow('Missing value for directive key "a"')
    })

    it('should reject a key without a separator', () => {
      expect(() => parseDirectives('@@{ a b }', locate)).toThrow('Expected "=" after directive key "a"')
    })
  })
})
