// =============================================================================
// Tribble - Stream Assembler
// =============================================================================
// Drives the pipeline.
//
//   encode: bytes -> core values -> units -> carrier -> preamble + symbols
//   decode: symbols -> trits -> preamble/alignment -> carrier -> units -> bytes

import { TernaryError, applyCarrier, renderSymbols } from '@tribble/ternary'
import type { CarrierPattern, SymbolAlphabet, Trit } from '@tribble/ternary'
import { UNITS_PER_BYTE } from './constants'
import { DEFAULT_CODEC_CONFIG, createCodecConfig } from './config'
import { AlignmentError } from './errors'
import { auditStream } from './audit'
import { joinByte, splitByte } from './bytes'
import { decodeUnit, encodeUnit } from './frame'
import { coreValueToGlyph, glyphToCoreValue } from './glyphs'
import { receiveStream } from './stream'
import type { ReceivedStream } from './stream'
import type {
  CodecConfig,
  CodecLogger,
  CodecOptions,
  CoreValue,
  FrameReport,
  StreamPosition
} from './types'

/**
 * Assembler options: the codec configuration plus diagnostics.
 */
export interface StreamAssemblerOptions extends CodecOptions {
  /** Diagnostics sink (default: console); null silences the assembler */
  logger?: CodecLogger | null
  /** Log one debug line per unit (default: false) */
  verbose?: boolean
  /** Alphabet used for encoded output and read first on decode (default: the config alphabet) */
  outputAlphabet?: SymbolAlphabet
}

/**
 * Byte and text codec over framed balanced-ternary units.
 *
 * **Wire format (default config):**
 * - Each byte becomes two 8-trit units: `byte = high × 81 + low`, high first
 * - Each unit is `= = d d d d = =`: frame, pad, 4 digits (MSB first), pad, frame
 * - The carrier, when given, is added from the first payload trit at phase 0
 * - The preamble, when configured, precedes the payload and is never overlaid
 *
 * **Failure:** decode stops at the first bad unit and rethrows the detecting
 * component's error, which carries `offset` and `frameIndex`. No partial output.
 *
 * @example
 * const assembler = new StreamAssembler()
 * assembler.encode(new Uint8Array([0x00])) // '==----====----=='
 */
export class StreamAssembler {
  readonly config: CodecConfig
  private readonly logger: CodecLogger | null
  private readonly verbose: boolean
  private readonly outputAlphabet: SymbolAlphabet

  constructor(options: StreamAssemblerOptions = {}) {
    const { logger, verbose, outputAlphabet, ...codecOptions } = options
    this.config = createCodecConfig(codecOptions)
    this.logger = logger === undefined ? console : logger
    this.verbose = verbose ?? false
    this.outputAlphabet = outputAlphabet ?? this.config.alphabet
  }

  // ===========================================================================
  // BYTES
  // ===========================================================================

  /**
   * @param carrier - Overlay pattern; defaults to the config carrier, null for none
   * @throws CoreValueRangeError for array entries outside [0, 255] (offset = input index)
   */
  encode(data: Uint8Array | readonly number[], carrier: CarrierPattern | null = this.config.carrier): string {
    const values: CoreValue[] = []
    for (let i = 0; i < data.length; i++) {
      values.push(...splitByte(data[i], { offset: i }))
    }
    return this.emit(values, carrier)
  }

  /**
   * @throws InvalidSymbolError | SyncLossError | AlignmentError | PaddingMismatchError |
   * CoreValueRangeError, unmodified from the component that detected it
   */
  decode(symbols: string, carrier: CarrierPattern | null = this.config.carrier): Uint8Array {
    try {
      const stream = receiveStream(symbols, this.config, carrier, this.outputAlphabet)

      // Bytes travel in unit pairs
      const pairWidth = stream.unitWidth * UNITS_PER_BYTE
      if (stream.clean.length % pairWidth !== 0) {
        const units = stream.clean.length / stream.unitWidth
        throw new AlignmentError(pairWidth, stream.clean.length, {
          offset: stream.payloadOffset + stream.clean.length - stream.unitWidth,
          frameIndex: units - 1
        })
      }

      const values = this.decodeUnits(stream)
      const bytes = new Uint8Array(values.length / UNITS_PER_BYTE)

      for (let i = 0; i < bytes.length; i++) {
        const high = i * UNITS_PER_BYTE
        bytes[i] = joinByte(values[high], values[high + 1], {
          offset: stream.payloadOffset + high * stream.unitWidth,
          frameIndex: high
        })
      }

      return bytes
    } catch (err) {
      this.reportFailure(err)
      throw err
    }
  }

  // ===========================================================================
  // TEXT
  // ===========================================================================

  /**
   * One unit per character through the glyph table.
   *
   * @throws UnmappedGlyphError for characters outside the table (offset = character index)
   */
  encodeText(text: string, carrier: CarrierPattern | null = this.config.carrier): string {
    const values: CoreValue[] = []
    let offset = 0
    for (const glyph of text) {
      values.push(glyphToCoreValue(glyph, { offset }))
      offset++
    }
    return this.emit(values, carrier)
  }

  decodeText(symbols: string, carrier: CarrierPattern | null = this.config.carrier): string {
    try {
      const stream = receiveStream(symbols, this.config, carrier, this.outputAlphabet)
      return this.decodeUnits(stream).map(coreValueToGlyph).join('')
    } catch (err) {
      this.reportFailure(err)
      throw err
    }
  }

  // ===========================================================================
  // DIAGNOSTICS
  // ===========================================================================

  /**
   * Per-unit report that continues past bad units. See auditStream().
   */
  audit(symbols: string, carrier: CarrierPattern | null = this.config.carrier): FrameReport[] {
    return auditStream(symbols, this.config, carrier, this.outputAlphabet)
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private emit(values: readonly CoreValue[], carrier: CarrierPattern | null): string {
    const payload: Trit[] = []

    for (let i = 0; i < values.length; i++) {
      const unit = encodeUnit(values[i], this.config)
      if (this.verbose) {
        this.logger?.debug(
          `[StreamAssembler] frame ${i} value ${values[i]} -> ${renderSymbols(unit, this.outputAlphabet)}`
        )
      }
      payload.push(...unit)
    }

    const signal = carrier === null ? payload : applyCarrier(payload, carrier)
    return renderSymbols([...this.config.preamble, ...signal], this.outputAlphabet)
  }

  private decodeUnits(stream: ReceivedStream): CoreValue[] {
    const values: CoreValue[] = []
    const { clean, unitWidth, payloadOffset } = stream

    for (let index = 0; index * unitWidth < clean.length; index++) {
      const start = index * unitWidth
      const at: StreamPosition = { offset: payloadOffset + start, frameIndex: index }
      const unit = clean.slice(start, start + unitWidth)
      const value = decodeUnit(unit, this.config, at)

      if (this.verbose) {
        this.logger?.debug(
          `[StreamAssembler] frame ${index} @${at.offset} ${renderSymbols(unit, this.outputAlphabet)} -> ${value}`
        )
      }
      values.push(value)
    }

    return values
  }

  private reportFailure(err: unknown): void {
    if (err instanceof TernaryError) {
      this.logger?.warn(`[StreamAssembler] decode failed: ${err.message}`)
    }
  }
}

// =============================================================================
// STATELESS FORM
// =============================================================================

/**
 * Encode bytes with a throwaway, silent assembler.
 *
 * @param carrier - Overlay pattern, null for none; omitted, the config carrier applies
 */
export function encode(
  data: Uint8Array | readonly number[],
  carrier?: CarrierPattern | null,
  config: CodecOptions = DEFAULT_CODEC_CONFIG
): string {
  return new StreamAssembler({ ...config, logger: null }).encode(data, carrier)
}

/**
 * Exact inverse of encode() for the same carrier and config.
 */
export function decode(
  symbols: string,
  carrier?: CarrierPattern | null,
  config: CodecOptions = DEFAULT_CODEC_CONFIG
): Uint8Array {
  return new StreamAssembler({ ...config, logger: null }).decode(symbols, carrier)
}
