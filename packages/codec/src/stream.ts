// =============================================================================
// Tribble - Stream Reception
// =============================================================================
// Symbols -> aligned payload trits, shared by the decoder and the audit.

import { normalizeDialect, parseSymbols, removeCarrier, translateSymbols } from '@tribble/ternary'
import type { CarrierPattern, SymbolAlphabet, Trit } from '@tribble/ternary'
import { layoutOf } from './config'
import { AlignmentError, SyncLossError } from './errors'
import type { CodecConfig } from './types'

/**
 * A received stream, checked and ready to be cut into units.
 */
export interface ReceivedStream {
  /** Payload as received (preamble stripped, carrier still applied) */
  signal: Trit[]
  /** Payload with the carrier removed */
  clean: Trit[]
  /** Trit offset of the first payload trit */
  payloadOffset: number
  unitWidth: number
}

/**
 * Parse and check a symbol stream in wire order:
 * wire alphabet, dialects and whitespace, symbols, preamble, alignment, then
 * carrier removal. Error offsets count trits from the start of the stream,
 * preamble included.
 *
 * @param wireAlphabet - Alphabet the stream was rendered in; its symbols take
 * precedence over the config alphabet and the dialects
 *
 * @throws InvalidSymbolError for characters outside the alphabet and its dialects
 * @throws SyncLossError when the configured preamble is missing or damaged
 * @throws AlignmentError when the payload is not a whole number of units
 */
export function receiveStream(
  symbols: string,
  config: CodecConfig,
  carrier: CarrierPattern | null,
  wireAlphabet: SymbolAlphabet = config.alphabet
): ReceivedStream {
  const native = translateSymbols(symbols, wireAlphabet, config.alphabet)
  const trits = parseSymbols(normalizeDialect(native, config.alphabet), config.alphabet)
  const { preamble } = config

  for (let i = 0; i < preamble.length; i++) {
    const actual = i < trits.length ? trits[i] : null
    if (actual !== preamble[i]) {
      throw new SyncLossError(preamble[i], actual, { offset: i }, 'Preamble')
    }
  }

  const signal = trits.slice(preamble.length)
  const unitWidth = layoutOf(config).width
  const remainder = signal.length % unitWidth

  if (remainder !== 0) {
    throw new AlignmentError(unitWidth, signal.length, {
      offset: preamble.length + signal.length - remainder,
      frameIndex: Math.floor(signal.length / unitWidth)
    })
  }

  return {
    signal,
    clean: carrier === null ? signal : removeCarrier(signal, carrier),
    payloadOffset: preamble.length,
    unitWidth
  }
}
