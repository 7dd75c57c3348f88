// =============================================================================
// Tribble - Codec Errors
// =============================================================================
// Unit-level failures. All extend TernaryError so callers can catch one type.

import { TernaryError, describeLocation } from '@tribble/ternary'
import type { ErrorLocation, Trit } from '@tribble/ternary'
import type { StreamPosition } from './types'

export const CODEC_ERROR_CODE = {
  // Unit layer
  CORE_RANGE: 'CORE_RANGE',
  FRAME_LENGTH: 'FRAME_LENGTH',
  ALIGNMENT: 'ALIGNMENT',
  PADDING_MISMATCH: 'PADDING_MISMATCH',
  SYNC_LOSS: 'SYNC_LOSS',

  // Assembler layer
  UNMAPPED_GLYPH: 'UNMAPPED_GLYPH',
  INVALID_CONFIG: 'INVALID_CONFIG'
} as const

export type CodecErrorCode = (typeof CODEC_ERROR_CODE)[keyof typeof CODEC_ERROR_CODE]

/**
 * Position `delta` trits into the unit at `at`.
 * Without a stream position the offset is relative to the unit itself.
 */
export function advance(at: StreamPosition | undefined, delta: number): StreamPosition {
  return {
    offset: (at?.offset ?? 0) + delta,
    frameIndex: at?.frameIndex ?? null
  }
}

export class CoreValueRangeError extends TernaryError {
  constructor(
    readonly value: number,
    readonly min: number,
    readonly max: number,
    location: ErrorLocation = {}
  ) {
    super(
      CODEC_ERROR_CODE.CORE_RANGE,
      `Value ${value} outside [${min}, ${max}]${describeLocation(location)}`,
      location
    )
  }
}

export class FrameLengthError extends TernaryError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    location: ErrorLocation = {},
    code: CodecErrorCode = CODEC_ERROR_CODE.FRAME_LENGTH,
    message = `Expected ${expected} trits, got ${actual}${describeLocation(location)}`
  ) {
    super(code, message, location)
  }
}

/**
 * Stream length is not a whole number of units.
 */
export class AlignmentError extends FrameLengthError {
  constructor(multiple: number, actual: number, location: ErrorLocation = {}) {
    super(
      multiple,
      actual,
      location,
      CODEC_ERROR_CODE.ALIGNMENT,
      `Stream of ${actual} trits is not a multiple of ${multiple}${describeLocation(location)}`
    )
  }
}

export class PaddingMismatchError extends TernaryError {
  constructor(readonly expected: Trit, readonly actual: Trit, location: ErrorLocation = {}) {
    super(
      CODEC_ERROR_CODE.PADDING_MISMATCH,
      `Pad trit ${actual} where ${expected} expected${describeLocation(location)}`,
      location
    )
  }
}

export class SyncLossError extends TernaryError {
  constructor(
    readonly expected: Trit,
    readonly actual: Trit | null,
    location: ErrorLocation = {},
    what = 'Frame'
  ) {
    super(
      CODEC_ERROR_CODE.SYNC_LOSS,
      `${what} trit ${actual ?? 'missing'} where ${expected} expected${describeLocation(location)}`,
      location
    )
  }
}

export class UnmappedGlyphError extends TernaryError {
  constructor(readonly glyph: string, location: ErrorLocation = {}) {
    super(
      CODEC_ERROR_CODE.UNMAPPED_GLYPH,
      `No core value for ${JSON.stringify(glyph)}${describeLocation(location)}`,
      location
    )
  }
}

export class CodecConfigError extends TernaryError {
  constructor(reason: string) {
    super(CODEC_ERROR_CODE.INVALID_CONFIG, `Invalid codec config: ${reason}`)
  }
}
