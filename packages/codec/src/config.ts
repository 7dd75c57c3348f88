// =============================================================================
// Tribble - Codec Configuration
// =============================================================================
// Immutable wire configuration. Several configurations may coexist.

import { DEFAULT_ALPHABET, asTrit, createCarrierPattern, isTrit } from '@tribble/ternary'
import {
  DEFAULT_FRAME_TRIT,
  DEFAULT_LAYOUT,
  DEFAULT_PAD_TRIT,
  LAYOUT,
  isFrameLayout
} from './constants'
import type { LayoutSpec } from './constants'
import { CodecConfigError } from './errors'
import type { CodecConfig, CodecOptions } from './types'

/**
 * Default configuration values.
 *
 * Alphabet `- = +`, pad and frame trit `=`, 8-trit framed units,
 * no carrier and no preamble.
 */
export const DEFAULT_CODEC_CONFIG: CodecConfig = Object.freeze({
  alphabet: DEFAULT_ALPHABET,
  padTrit: DEFAULT_PAD_TRIT,
  frameTrit: DEFAULT_FRAME_TRIT,
  layout: DEFAULT_LAYOUT,
  carrier: null,
  preamble: Object.freeze([])
})

/**
 * Create a validated, frozen codec configuration.
 *
 * @param options - Overrides applied on top of DEFAULT_CODEC_CONFIG
 * @throws CodecConfigError for an unknown layout or a non-trit pad/frame value
 * @throws EmptyPatternError for an empty carrier
 */
export function createCodecConfig(options: CodecOptions = {}): CodecConfig {
  const padTrit = options.padTrit ?? DEFAULT_CODEC_CONFIG.padTrit
  if (!isTrit(padTrit)) {
    throw new CodecConfigError(`padTrit must be -1, 0 or 1, got ${String(padTrit)}`)
  }

  const frameTrit = options.frameTrit ?? DEFAULT_CODEC_CONFIG.frameTrit
  if (!isTrit(frameTrit)) {
    throw new CodecConfigError(`frameTrit must be -1, 0 or 1, got ${String(frameTrit)}`)
  }

  const layout = options.layout ?? DEFAULT_CODEC_CONFIG.layout
  if (!isFrameLayout(layout)) {
    throw new CodecConfigError(`unknown layout ${JSON.stringify(layout)}`)
  }

  // undefined keeps the default, null disables the overlay
  let carrier = DEFAULT_CODEC_CONFIG.carrier
  if (options.carrier !== undefined) {
    carrier = options.carrier === null ? null : createCarrierPattern(options.carrier)
  }

  return Object.freeze({
    alphabet: options.alphabet ?? DEFAULT_CODEC_CONFIG.alphabet,
    padTrit,
    frameTrit,
    layout,
    carrier,
    preamble: Object.freeze((options.preamble ?? DEFAULT_CODEC_CONFIG.preamble).map(asTrit))
  })
}

/**
 * Geometry of the configured layout.
 */
export function layoutOf(config: CodecConfig): LayoutSpec {
  return LAYOUT[config.layout]
}
