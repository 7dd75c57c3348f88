// =============================================================================
// Tribble - Frame Codec
// =============================================================================
// Frame trits around a tribble are the sync/drift check. Interior corruption
// passes through undetected: there is no checksum over the payload.

import type { Trit } from '@tribble/ternary'
import { TRIBBLE_WIDTH } from './constants'
import { DEFAULT_CODEC_CONFIG, layoutOf } from './config'
import { FrameLengthError, SyncLossError, advance } from './errors'
import { coreDigits, decodeCore, decodeCoreDigits, encodeCore } from './tribble'
import type { CodecConfig, CoreValue, FramedTribble, StreamPosition, Tribble } from './types'

/**
 * Wrap a tribble in the layout's frame trits (one per side in the default layout).
 *
 * @example
 * frame(encodeCore(0)) // '==----=='
 *
 * @throws FrameLengthError unless exactly 6 trits are given
 */
export function frame(tribble: Tribble, config: CodecConfig = DEFAULT_CODEC_CONFIG): FramedTribble {
  if (tribble.length !== TRIBBLE_WIDTH) {
    throw new FrameLengthError(TRIBBLE_WIDTH, tribble.length)
  }

  const side = layoutOf(config).frameWidth
  const framed: Trit[] = []

  for (let i = 0; i < side; i++) framed.push(config.frameTrit)
  framed.push(...tribble)
  for (let i = 0; i < side; i++) framed.push(config.frameTrit)

  return framed
}

/**
 * Strip and verify frame trits.
 *
 * Leading frame trits are checked before trailing ones, so the reported
 * offset is always the first mismatch in stream order.
 *
 * @throws FrameLengthError when the unit is not the layout's framed width
 * @throws SyncLossError when any frame position holds the wrong trit
 */
export function unframe(
  framed: FramedTribble,
  config: CodecConfig = DEFAULT_CODEC_CONFIG,
  at?: StreamPosition
): Tribble {
  const side = layoutOf(config).frameWidth
  const width = TRIBBLE_WIDTH + 2 * side

  if (framed.length !== width) {
    throw new FrameLengthError(width, framed.length, advance(at, 0))
  }

  for (let i = 0; i < side; i++) {
    if (framed[i] !== config.frameTrit) {
      throw new SyncLossError(config.frameTrit, framed[i], advance(at, i))
    }
  }
  for (let i = width - side; i < width; i++) {
    if (framed[i] !== config.frameTrit) {
      throw new SyncLossError(config.frameTrit, framed[i], advance(at, i))
    }
  }

  return framed.slice(side, width - side)
}

// =============================================================================
// LAYOUT-AWARE UNITS
// =============================================================================

/**
 * One wire unit for a core value, shaped by the configured layout.
 */
export function encodeUnit(value: number, config: CodecConfig = DEFAULT_CODEC_CONFIG): Trit[] {
  if (layoutOf(config).padWidth === 0) {
    return coreDigits(value)
  }
  return [...frame(encodeCore(value, config), config)]
}

/**
 * Inverse of encodeUnit(). The `core` layout carries no pad or frame trits,
 * so nothing beyond the length can be checked there.
 */
export function decodeUnit(
  unit: readonly Trit[],
  config: CodecConfig = DEFAULT_CODEC_CONFIG,
  at?: StreamPosition
): CoreValue {
  const layout = layoutOf(config)

  if (unit.length !== layout.width) {
    throw new FrameLengthError(layout.width, unit.length, advance(at, 0))
  }
  if (layout.padWidth === 0) {
    return decodeCoreDigits(unit, at)
  }

  const tribble = unframe(unit, config, at)
  return decodeCore(tribble, config, advance(at, layout.frameWidth))
}
