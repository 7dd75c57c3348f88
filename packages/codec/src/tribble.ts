// =============================================================================
// Tribble - Tribble Codec
// =============================================================================
// Core value <-> 4 balanced-ternary digits, padded to a 6-trit tribble.

import type { ErrorLocation, Trit, TritSequence } from '@tribble/ternary'
import { CORE_MAX, CORE_MIN, CORE_OFFSET, CORE_WIDTH, TRIBBLE_WIDTH } from './constants'
import { DEFAULT_CODEC_CONFIG } from './config'
import { CoreValueRangeError, FrameLengthError, PaddingMismatchError, advance } from './errors'
import type { CodecConfig, CoreValue, StreamPosition, Tribble } from './types'

// Indexed by ((n + 1) mod 3): the balanced remainder -1, 0 or +1
const BALANCED_REMAINDER: readonly Trit[] = [-1, 0, 1]

/**
 * Assert a number is a valid CoreValue.
 *
 * @throws CoreValueRangeError unless value is an integer in [0, 80]
 */
export function asCoreValue(value: number, location: ErrorLocation = {}): CoreValue {
  if (!Number.isInteger(value) || value < CORE_MIN || value > CORE_MAX) {
    throw new CoreValueRangeError(value, CORE_MIN, CORE_MAX, location)
  }
  return value as CoreValue
}

// =============================================================================
// POSITIONAL CONVERSION
// =============================================================================

/**
 * Signed integer -> `width` balanced digits, most significant first.
 *
 * @example
 * toBalancedDigits(5, 4)   // [0, 1, -1, -1]  (9 - 3 - 1)
 * toBalancedDigits(-40, 4) // [-1, -1, -1, -1]
 *
 * @throws CoreValueRangeError when |value| does not fit in `width` trits
 */
export function toBalancedDigits(value: number, width: number): Trit[] {
  const limit = (3 ** width - 1) / 2
  if (!Number.isInteger(value) || Math.abs(value) > limit) {
    throw new CoreValueRangeError(value, -limit, limit)
  }

  const digits: Trit[] = []
  let n = value

  // Least significant digit falls out first
  for (let i = 0; i < width; i++) {
    const remainder = BALANCED_REMAINDER[(((n + 1) % 3) + 3) % 3]
    digits.push(remainder)
    n = (n - remainder) / 3
  }

  return digits.reverse()
}

/**
 * Balanced digits (most significant first) -> signed integer.
 */
export function fromBalancedDigits(digits: TritSequence): number {
  let value = 0
  for (let i = 0; i < digits.length; i++) {
    value = value * 3 + digits[i]
  }
  return value
}

// =============================================================================
// CORE VALUES
// =============================================================================

/**
 * The 4 payload trits for a core value, without padding.
 */
export function coreDigits(value: number): Trit[] {
  return toBalancedDigits(asCoreValue(value) - CORE_OFFSET, CORE_WIDTH)
}

/**
 * Inverse of coreDigits().
 *
 * @throws FrameLengthError unless exactly 4 trits are given
 */
export function decodeCoreDigits(digits: TritSequence, at?: StreamPosition): CoreValue {
  if (digits.length !== CORE_WIDTH) {
    throw new FrameLengthError(CORE_WIDTH, digits.length, advance(at, 0))
  }
  return asCoreValue(fromBalancedDigits(digits) + CORE_OFFSET, advance(at, 0))
}

/**
 * Encode a core value as a padded tribble.
 *
 * @example
 * encodeCore(0)  // [0, -1, -1, -1, -1, 0]  '=----='
 * encodeCore(40) // [0, 0, 0, 0, 0, 0]      '======'
 *
 * @throws CoreValueRangeError unless 0 <= value <= 80
 */
export function encodeCore(value: number, config: CodecConfig = DEFAULT_CODEC_CONFIG): Tribble {
  return [config.padTrit, ...coreDigits(value), config.padTrit]
}

/**
 * Decode a tribble back to its core value.
 *
 * Pad trits are checked, never corrected.
 *
 * @param at - Where the tribble sits in a stream, for error locations
 * @throws FrameLengthError unless exactly 6 trits are given
 * @throws PaddingMismatchError when position 0 or 5 is not the pad trit
 */
export function decodeCore(
  tribble: Tribble,
  config: CodecConfig = DEFAULT_CODEC_CONFIG,
  at?: StreamPosition
): CoreValue {
  if (tribble.length !== TRIBBLE_WIDTH) {
    throw new FrameLengthError(TRIBBLE_WIDTH, tribble.length, advance(at, 0))
  }

  const last = TRIBBLE_WIDTH - 1
  if (tribble[0] !== config.padTrit) {
    throw new PaddingMismatchError(config.padTrit, tribble[0], advance(at, 0))
  }
  if (tribble[last] !== config.padTrit) {
    throw new PaddingMismatchError(config.padTrit, tribble[last], advance(at, last))
  }

  return decodeCoreDigits(tribble.slice(1, last), advance(at, 1))
}
