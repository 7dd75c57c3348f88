import { joinByte, splitByte } from '../bytes'
import { coreValueToGlyph, GLYPH_ALPHABET, glyphToCoreValue } from '../glyphs'
import { asCoreValue } from '../tribble'
import { CoreValueRangeError, UnmappedGlyphError } from '../errors'

describe('Byte split', () => {
  test('0x00 → [0, 0]', () => {
    expect(splitByte(0x00)).toEqual([0, 0])
  })

  test('0xff → [3, 12] (3 × 81 + 12)', () => {
    expect(splitByte(0xff)).toEqual([3, 12])
  })

  test('81 is the first byte with a non-zero high digit', () => {
    expect(splitByte(80)).toEqual([0, 80])
    expect(splitByte(81)).toEqual([1, 0])
  })

  test('joinByte() inverts splitByte() for every byte', () => {
    for (let byte = 0; byte <= 255; byte++) {
      const [high, low] = splitByte(byte)
      expect(joinByte(high, low)).toBe(byte)
    }
  })

  test('[EDGE] 256 is not a byte', () => {
    expect(() => splitByte(256)).toThrow(CoreValueRangeError)
    expect(() => splitByte(256)).toThrow('Value 256 outside [0, 255]')
  })

  test('[EDGE] pairs above 255 are rejected on join', () => {
    expect(() => joinByte(asCoreValue(3), asCoreValue(13))).toThrow('Value 256 outside [0, 255]')
  })
})

describe('Glyph table', () => {
  test('covers all 81 core values', () => {
    expect(Array.from(GLYPH_ALPHABET)).toHaveLength(81)
    expect(new Set(GLYPH_ALPHABET).size).toBe(81)
  })

  test('space is signed zero', () => {
    expect(glyphToCoreValue(' ')).toBe(40)
    expect(GLYPH_ALPHABET[40]).toBe(' ')
  })

  test('letters mirror around zero', () => {
    expect(glyphToCoreValue('A')).toBe(41)
    expect(glyphToCoreValue('a')).toBe(39)
    expect(glyphToCoreValue('Z')).toBe(66)
    expect(glyphToCoreValue('z')).toBe(14)
  })

  test('digits follow the capitals', () => {
    expect(glyphToCoreValue('0')).toBe(67)
    expect(glyphToCoreValue('9')).toBe(76)
  })

  test('punctuation fills both ends', () => {
    expect(glyphToCoreValue('.')).toBe(77)
    expect(glyphToCoreValue('!')).toBe(80)
    expect(glyphToCoreValue(';')).toBe(13)
    expect(glyphToCoreValue('_')).toBe(0)
  })

  test('coreValueToGlyph() inverts glyphToCoreValue()', () => {
    for (const glyph of GLYPH_ALPHABET) {
      expect(coreValueToGlyph(glyphToCoreValue(glyph))).toBe(glyph)
    }
  })

  test('[EDGE] characters outside the table throw UnmappedGlyphError', () => {
    expect(() => glyphToCoreValue('~')).toThrow(UnmappedGlyphError)
    expect(() => glyphToCoreValue('~', { offset: 3 })).toThrow('No core value for "~" at offset 3')
  })
})
