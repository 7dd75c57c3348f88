// =============================================================================
// Tribble - Byte Split
// =============================================================================
// A byte spans 256 values, a core value only 81: each byte rides in two
// units, high base-81 digit first.

import type { ErrorLocation } from '@tribble/ternary'
import { BYTE_MAX, CORE_RADIX } from './constants'
import { CoreValueRangeError } from './errors'
import { asCoreValue } from './tribble'
import type { CoreValue } from './types'

/**
 * @example
 * splitByte(0x00) // [0, 0]
 * splitByte(0xff) // [3, 12]   (3 × 81 + 12 = 255)
 *
 * @throws CoreValueRangeError unless byte is an integer in [0, 255]
 */
export function splitByte(byte: number, location: ErrorLocation = {}): [CoreValue, CoreValue] {
  if (!Number.isInteger(byte) || byte < 0 || byte > BYTE_MAX) {
    throw new CoreValueRangeError(byte, 0, BYTE_MAX, location)
  }
  return [asCoreValue(Math.floor(byte / CORE_RADIX)), asCoreValue(byte % CORE_RADIX)]
}

/**
 * Inverse of splitByte().
 *
 * @throws CoreValueRangeError when high × 81 + low exceeds 255
 */
export function joinByte(high: CoreValue, low: CoreValue, location: ErrorLocation = {}): number {
  const byte = high * CORE_RADIX + low
  if (byte > BYTE_MAX) {
    throw new CoreValueRangeError(byte, 0, BYTE_MAX, location)
  }
  return byte
}
