// =============================================================================
// Tribble - Glyph Table
// =============================================================================
// Text mode: one character per unit, covering all 81 core values.
//
//   ' '         ->  0
//   'A'..'Z'    ->  1..26        'a'..'z'  ->  -1..-26
//   '0'..'9'    ->  27..36
//   '.' ',' '?' '!'             ->  37..40
//   ';' ':' ''' '"' '(' ')' '[' ']' '{' '}' '/' '\' '-' '_'  ->  -27..-40
//
// Values above are signed; the stored CoreValue is signed + 40.

import type { ErrorLocation } from '@tribble/ternary'
import { CORE_OFFSET, CORE_RADIX } from './constants'
import { UnmappedGlyphError } from './errors'
import { asCoreValue } from './tribble'
import type { CoreValue } from './types'

const UPPER = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'
const LOWER = 'abcdefghijklmnopqrstuvwxyz'
const DIGITS = '0123456789'
const PUNCTUATION = '.,?!;:\'"()[]{}/\\-_'

// Leading punctuation marks that take the positive slots after the digits
const POSITIVE_PUNCTUATION = 4

function buildGlyphTable(): ReadonlyMap<string, number> {
  const table = new Map<string, number>()

  table.set(' ', 0)
  for (let i = 0; i < UPPER.length; i++) table.set(UPPER[i], i + 1)
  for (let i = 0; i < LOWER.length; i++) table.set(LOWER[i], -(i + 1))
  for (let i = 0; i < DIGITS.length; i++) table.set(DIGITS[i], i + 27)
  for (let i = 0; i < PUNCTUATION.length; i++) {
    const signed = i < POSITIVE_PUNCTUATION ? 37 + i : -(27 + i - POSITIVE_PUNCTUATION)
    table.set(PUNCTUATION[i], signed)
  }

  return table
}

const SIGNED_BY_GLYPH = buildGlyphTable()

// Indexed by unsigned CoreValue
const GLYPH_BY_VALUE: readonly string[] = (() => {
  const glyphs = new Array<string>(CORE_RADIX).fill('')
  for (const [glyph, signed] of SIGNED_BY_GLYPH) {
    glyphs[signed + CORE_OFFSET] = glyph
  }
  return Object.freeze(glyphs)
})()

/**
 * Every character text mode can carry, in core-value order.
 */
export const GLYPH_ALPHABET = GLYPH_BY_VALUE.join('')

/**
 * @example
 * glyphToCoreValue(' ') // 40
 * glyphToCoreValue('A') // 41
 *
 * @throws UnmappedGlyphError for characters outside the table
 */
export function glyphToCoreValue(glyph: string, location: ErrorLocation = {}): CoreValue {
  const signed = SIGNED_BY_GLYPH.get(glyph)
  if (signed === undefined) {
    throw new UnmappedGlyphError(glyph, location)
  }
  return asCoreValue(signed + CORE_OFFSET)
}

/**
 * Total over [0, 80].
 */
export function coreValueToGlyph(value: CoreValue): string {
  return GLYPH_BY_VALUE[value]
}
