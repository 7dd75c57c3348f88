// =============================================================================
// Tribble - Codec Module
// =============================================================================
// Framed balanced-ternary codec for bytes and text.

// Assembler
export { StreamAssembler, encode, decode } from './assembler'
export type { StreamAssemblerOptions } from './assembler'

// Diagnostics
export { auditStream } from './audit'
export { receiveStream } from './stream'
export type { ReceivedStream } from './stream'

// Units
export {
  asCoreValue,
  toBalancedDigits,
  fromBalancedDigits,
  coreDigits,
  decodeCoreDigits,
  encodeCore,
  decodeCore
} from './tribble'
export { frame, unframe, encodeUnit, decodeUnit } from './frame'

// Byte split & glyph table
export { splitByte, joinByte } from './bytes'
export { GLYPH_ALPHABET, glyphToCoreValue, coreValueToGlyph } from './glyphs'

// Configuration
export { DEFAULT_CODEC_CONFIG, createCodecConfig, layoutOf } from './config'

// Constants
export {
  CORE_WIDTH,
  CORE_RADIX,
  CORE_OFFSET,
  CORE_MIN,
  CORE_MAX,
  TRIBBLE_WIDTH,
  FRAMED_WIDTH,
  DEFAULT_PAD_TRIT,
  DEFAULT_FRAME_TRIT,
  SYNC_PREAMBLE,
  BYTE_MAX,
  UNITS_PER_BYTE,
  LAYOUT,
  DEFAULT_LAYOUT,
  isFrameLayout
} from './constants'
export type { FrameLayout, LayoutSpec } from './constants'

// Errors
export {
  CODEC_ERROR_CODE,
  advance,
  CoreValueRangeError,
  FrameLengthError,
  AlignmentError,
  PaddingMismatchError,
  SyncLossError,
  UnmappedGlyphError,
  CodecConfigError
} from './errors'
export type { CodecErrorCode } from './errors'

// Types
export type {
  CoreValue,
  Tribble,
  FramedTribble,
  StreamPosition,
  CodecConfig,
  CodecOptions,
  CodecLogger,
  FrameStatus,
  FrameReport
} from './types'

// Ternary primitives callers need alongside the codec
export {
  DEFAULT_ALPHABET,
  LED_ALPHABET,
  DEFAULT_CARRIER,
  createAlphabet,
  parseCarrier,
  createCarrierPattern,
  TernaryError,
  InvalidSymbolError,
  EmptyPatternError,
  ERROR_CODE
} from '@tribble/ternary'
export type { Trit, TritSequence, CarrierPattern, SymbolAlphabet } from '@tribble/ternary'
