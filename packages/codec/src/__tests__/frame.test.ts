import { parseSymbols, renderSymbols } from '@tribble/ternary'
import { decodeUnit, encodeUnit, frame, unframe } from '../frame'
import { encodeCore } from '../tribble'
import { createCodecConfig } from '../config'
import { CORE_WIDTH, FRAMED_WIDTH, LAYOUT } from '../constants'
import { FrameLengthError, PaddingMismatchError, SyncLossError } from '../errors'

describe('Frame codec', () => {
  describe('frame()', () => {
    test('wraps a tribble in one frame trit per side', () => {
      expect(renderSymbols(frame(encodeCore(0)))).toBe('==----==')
    })

    test('uses the configured frame trit', () => {
      const config = createCodecConfig({ frameTrit: 1 })
      expect(renderSymbols(frame(encodeCore(0), config))).toBe('+=----=+')
    })

    test('tryte layout adds three frame trits per side', () => {
      const config = createCodecConfig({ layout: 'tryte' })
      expect(renderSymbols(frame(encodeCore(0), config))).toBe('====----====')
    })

    test('[EDGE] rejects anything but a 6-trit tribble', () => {
      expect(() => frame(parseSymbols('=---='))).toThrow(FrameLengthError)
    })
  })

  describe('unframe()', () => {
    test('returns the inner tribble', () => {
      expect(renderSymbols(unframe(parseSymbols('==+--===')))).toBe('=+--==')
    })

    test('[EDGE] wrong length throws FrameLengthError', () => {
      expect(() => unframe(parseSymbols('==----='))).toThrow('Expected 8 trits, got 7 at offset 0')
    })

    test('[EDGE] bad first trit throws SyncLossError', () => {
      let error: unknown = null
      try {
        unframe(parseSymbols('+=----=='))
      } catch (err) {
        error = err
      }
      expect(error).toBeInstanceOf(SyncLossError)
      expect(error).toMatchObject({
        offset: 0,
        actual: 1,
        message: 'Frame trit 1 where 0 expected at offset 0'
      })
    })

    test('[EDGE] bad last trit throws SyncLossError at position 7', () => {
      expect(() => unframe(parseSymbols('==----=-'))).toThrow('Frame trit -1 where 0 expected at offset 7')
    })

    test('interior corruption passes undetected', () => {
      expect(renderSymbols(unframe(parseSymbols('==-+--==')))).toBe('=-+--=')
    })

    test('[EDGE] tryte layout checks every frame position', () => {
      const config = createCodecConfig({ layout: 'tryte' })
      expect(() => unframe(parseSymbols('=+==----===='), config)).toThrow('at offset 1')
      expect(() => unframe(parseSymbols('====----==-='), config)).toThrow('at offset 10')
    })
  })

  describe('encodeUnit() / decodeUnit()', () => {
    test('framed layout (default) → 8 trits', () => {
      expect(renderSymbols(encodeUnit(0))).toBe('==----==')
    })

    test('default units are FRAMED_WIDTH trits', () => {
      expect(encodeUnit(80)).toHaveLength(FRAMED_WIDTH)
      expect(LAYOUT.framed.width).toBe(FRAMED_WIDTH)
    })

    test('every layout width is core digits plus pad and frame trits on both sides', () => {
      for (const layout of Object.values(LAYOUT)) {
        expect(layout.width).toBe(CORE_WIDTH + 2 * (layout.padWidth + layout.frameWidth))
      }
    })

    test('tribble layout → 6 trits', () => {
      expect(renderSymbols(encodeUnit(0, createCodecConfig({ layout: 'tribble' })))).toBe('=----=')
    })

    test('core layout → 4 bare digits', () => {
      expect(renderSymbols(encodeUnit(0, createCodecConfig({ layout: 'core' })))).toBe('----')
    })

    test('round-trips in every layout', () => {
      for (const layout of ['core', 'tribble', 'framed', 'tryte'] as const) {
        const config = createCodecConfig({ layout })
        expect(decodeUnit(encodeUnit(63, config), config)).toBe(63)
      }
    })

    test('core layout decodes any four trits', () => {
      expect(decodeUnit(parseSymbols('++++'), createCodecConfig({ layout: 'core' }))).toBe(80)
    })

    test('[EDGE] pad error inside a frame is located in stream terms', () => {
      let error: unknown = null
      try {
        decodeUnit(parseSymbols('=+----=='), undefined, { offset: 8, frameIndex: 1 })
      } catch (err) {
        error = err
      }
      expect(error).toBeInstanceOf(PaddingMismatchError)
      expect(error).toMatchObject({ offset: 9, frameIndex: 1 })
    })

    test('[EDGE] frame errors win over pad errors', () => {
      expect(() => decodeUnit(parseSymbols('++----=='))).toThrow(SyncLossError)
    })

    test('[EDGE] wrong unit length throws FrameLengthError', () => {
      expect(() => decodeUnit(parseSymbols('==----==='))).toThrow('Expected 8 trits, got 9 at offset 0')
    })
  })
})
