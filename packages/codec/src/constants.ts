// =============================================================================
// Tribble - Wire Constants
// =============================================================================
// Unit geometry and fixed values shared by encoder and decoder.

import type { Trit, TritSequence } from '@tribble/ternary'

/**
 * Payload trits per unit.
 */
export const CORE_WIDTH = 4

/**
 * Distinct core values: 3^4.
 */
export const CORE_RADIX = 81

/**
 * Unsigned core value = signed balanced value + CORE_OFFSET.
 */
export const CORE_OFFSET = 40

export const CORE_MIN = 0
export const CORE_MAX = 80

/**
 * Pad + 4 core trits + pad.
 */
export const TRIBBLE_WIDTH = 6

/**
 * Frame + tribble + frame.
 */
export const FRAMED_WIDTH = 8

/**
 * Pad trit written at tribble positions 0 and 5 ('=').
 */
export const DEFAULT_PAD_TRIT: Trit = 0

/**
 * Frame trit written at the outer positions of a framed tribble ('=').
 */
export const DEFAULT_FRAME_TRIT: Trit = 0

/**
 * Sync header used by streams that opt into a preamble ('+++++').
 */
export const SYNC_PREAMBLE: TritSequence = Object.freeze([1, 1, 1, 1, 1] as const)

// =============================================================================
// BYTE SPLIT
// =============================================================================
/**
 * Byte ↔ core value mapping (wire contract)
 *
 * ┌──────────────────────────────────────────────────────────────┐
 * │ byte = high × 81 + low                                       │
 * │   high ∈ [0, 3]   first unit on the wire                     │
 * │   low  ∈ [0, 80]  second unit on the wire                    │
 * │ Pairs with high × 81 + low > 255 are rejected on decode.     │
 * └──────────────────────────────────────────────────────────────┘
 */
export const BYTE_MAX = 255
export const UNITS_PER_BYTE = 2

// =============================================================================
// FRAME LAYOUTS
// =============================================================================
/**
 * Group widths. `padWidth` and `frameWidth` count trits on EACH side.
 *
 * ┌──────────┬───────┬─────────────────────────────────────┐
 * │ Layout   │ Width │ Shape                               │
 * ├──────────┼───────┼─────────────────────────────────────┤
 * │ core     │ 4     │ dddd                                │
 * │ tribble  │ 6     │ p dddd p                            │
 * │ framed   │ 8     │ f p dddd p f         (default)      │
 * │ tryte    │ 12    │ fff p dddd p fff                    │
 * └──────────┴───────┴─────────────────────────────────────┘
 */
export const LAYOUT = {
  core: { width: CORE_WIDTH, padWidth: 0, frameWidth: 0 },
  tribble: { width: TRIBBLE_WIDTH, padWidth: 1, frameWidth: 0 },
  framed: { width: FRAMED_WIDTH, padWidth: 1, frameWidth: 1 },
  tryte: { width: 12, padWidth: 1, frameWidth: 3 }
} as const

export type FrameLayout = keyof typeof LAYOUT

export type LayoutSpec = (typeof LAYOUT)[FrameLayout]

export const DEFAULT_LAYOUT: FrameLayout = 'framed'

export function isFrameLayout(value: unknown): value is FrameLayout {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LAYOUT, value)
}
