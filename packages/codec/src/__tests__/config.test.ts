import { DEFAULT_ALPHABET, ERROR_CODE, EmptyPatternError, InvalidTritError, TernaryError } from '@tribble/ternary'
import { DEFAULT_CODEC_CONFIG, createCodecConfig, layoutOf } from '../config'
import { CODEC_ERROR_CODE, CodecConfigError } from '../errors'

describe('Codec config', () => {
  test('defaults', () => {
    expect(DEFAULT_CODEC_CONFIG).toEqual({
      alphabet: DEFAULT_ALPHABET,
      padTrit: 0,
      frameTrit: 0,
      layout: 'framed',
      carrier: null,
      preamble: []
    })
    expect(createCodecConfig()).toEqual(DEFAULT_CODEC_CONFIG)
  })

  test('overrides merge over the defaults', () => {
    const config = createCodecConfig({ layout: 'tryte', carrier: [1, -1] })

    expect(config.layout).toBe('tryte')
    expect(config.carrier).toEqual([1, -1])
    expect(config.padTrit).toBe(0)
  })

  test('null carrier disables the overlay', () => {
    expect(createCodecConfig({ carrier: null }).carrier).toBeNull()
  })

  test('output is frozen', () => {
    const config = createCodecConfig({ preamble: [1, 1], carrier: [0, 1] })

    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.preamble)).toBe(true)
    expect(Object.isFrozen(config.carrier)).toBe(true)
  })

  test('layoutOf() returns the unit geometry', () => {
    expect(layoutOf(createCodecConfig({ layout: 'tryte' }))).toEqual({ width: 12, padWidth: 1, frameWidth: 3 })
    expect(layoutOf(DEFAULT_CODEC_CONFIG).width).toBe(8)
  })

  test('[EDGE] non-trit pad value throws CodecConfigError', () => {
    const options = JSON.parse('{ "padTrit": 2 }')

    expect(() => createCodecConfig(options)).toThrow(CodecConfigError)
    expect(() => createCodecConfig(options)).toThrow('Invalid codec config: padTrit must be -1, 0 or 1, got 2')
  })

  test('config errors carry a codec-layer code on the shared base class', () => {
    let error: unknown = null
    try {
      createCodecConfig(JSON.parse('{ "layout": "huge" }'))
    } catch (err) {
      error = err
    }

    expect(error).toBeInstanceOf(TernaryError)
    expect(error).toMatchObject({ code: CODEC_ERROR_CODE.INVALID_CONFIG, name: 'CodecConfigError' })
    expect(Object.values(ERROR_CODE)).toEqual(['INVALID_SYMBOL', 'INVALID_TRIT', 'INVALID_ALPHABET', 'EMPTY_PATTERN'])
  })

  test('[EDGE] non-trit frame value throws CodecConfigError', () => {
    expect(() => createCodecConfig(JSON.parse('{ "frameTrit": -2 }'))).toThrow(
      'Invalid codec config: frameTrit must be -1, 0 or 1, got -2'
    )
  })

  test('[EDGE] unknown layout throws CodecConfigError', () => {
    expect(() => createCodecConfig(JSON.parse('{ "layout": "huge" }'))).toThrow(
      'Invalid codec config: unknown layout "huge"'
    )
  })

  test('[EDGE] empty carrier throws EmptyPatternError', () => {
    expect(() => createCodecConfig({ carrier: [] })).toThrow(EmptyPatternError)
  })

  test('[EDGE] non-trit preamble entries throw InvalidTritError', () => {
    expect(() => createCodecConfig(JSON.parse('{ "preamble": [1, 5] }'))).toThrow(InvalidTritError)
  })
})
