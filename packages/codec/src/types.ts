// =============================================================================
// Tribble - Codec Types
// =============================================================================

import type { CarrierPattern, SymbolAlphabet, Trit, TritSequence } from '@tribble/ternary'
import type { FrameLayout } from './constants'

/**
 * An unsigned core value in [0, 80].
 * MUST be created via asCoreValue() or a decoder.
 */
export type CoreValue = number & { readonly __brand: 'CoreValue' }

/**
 * 6 trits: [pad, d0, d1, d2, d3, pad], most significant digit first.
 */
export type Tribble = TritSequence

/**
 * 8 trits in the default layout: [frame, tribble(6), frame].
 */
export type FramedTribble = TritSequence

/**
 * Position of a unit inside a received stream, used to locate errors.
 */
export interface StreamPosition {
  /** Trit offset of the unit's first trit */
  offset: number
  /** Zero-based unit index, null outside a stream */
  frameIndex: number | null
}

/**
 * Every wire constant of one codec configuration. Frozen once built.
 */
export interface CodecConfig {
  readonly alphabet: SymbolAlphabet
  readonly padTrit: Trit
  readonly frameTrit: Trit
  readonly layout: FrameLayout
  /** Carrier used when a call does not name one; null disables the overlay */
  readonly carrier: CarrierPattern | null
  /** Sync header written ahead of the payload; empty for none */
  readonly preamble: TritSequence
}

export type CodecOptions = Partial<CodecConfig>

/**
 * Sink for assembler diagnostics.
 */
export type CodecLogger = Pick<Console, 'debug' | 'warn'>

export type FrameStatus = 'ok' | 'sync-loss' | 'padding-mismatch'

/**
 * One row of a stream audit.
 */
export interface FrameReport {
  index: number
  offset: number
  /** Unit as received, before carrier removal */
  signal: string
  /** Unit after carrier removal */
  clean: string
  status: FrameStatus
  value: CoreValue | null
  /** Glyph-table character for the value, if decodable */
  glyph: string | null
  /** Error message for a failed unit */
  error: string | null
}
