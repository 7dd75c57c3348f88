// =============================================================================
// Tribble - Stream Audit
// =============================================================================
// Frame-by-frame report of a stream. Unlike decode(), a bad unit is recorded
// and the audit moves on. Nothing is corrected.

import { renderSymbols } from '@tribble/ternary'
import type { CarrierPattern, SymbolAlphabet } from '@tribble/ternary'
import { DEFAULT_CODEC_CONFIG } from './config'
import { PaddingMismatchError, SyncLossError } from './errors'
import { decodeUnit } from './frame'
import { coreValueToGlyph } from './glyphs'
import { receiveStream } from './stream'
import type { CodecConfig, FrameReport, StreamPosition } from './types'

/**
 * Audit every unit of a stream.
 *
 * @example
 * auditStream('==----===+----==')
 * // [ { index: 0, offset: 0, clean: '==----==', status: 'ok', value: 0, glyph: '_', ... },
 * //   { index: 1, offset: 8, clean: '=+----==', status: 'padding-mismatch', ... } ]
 *
 * Reports render units in `wireAlphabet`, the alphabet the stream was written in.
 *
 * @throws InvalidSymbolError, SyncLossError (preamble) or AlignmentError when
 * the stream cannot be cut into units at all
 */
export function auditStream(
  symbols: string,
  config: CodecConfig = DEFAULT_CODEC_CONFIG,
  carrier: CarrierPattern | null = config.carrier,
  wireAlphabet: SymbolAlphabet = config.alphabet
): FrameReport[] {
  const stream = receiveStream(symbols, config, carrier, wireAlphabet)
  const reports: FrameReport[] = []

  for (let index = 0; index * stream.unitWidth < stream.clean.length; index++) {
    const start = index * stream.unitWidth
    const end = start + stream.unitWidth
    const at: StreamPosition = { offset: stream.payloadOffset + start, frameIndex: index }
    const unit = stream.clean.slice(start, end)

    const report: FrameReport = {
      index,
      offset: at.offset,
      signal: renderSymbols(stream.signal.slice(start, end), wireAlphabet),
      clean: renderSymbols(unit, wireAlphabet),
      status: 'ok',
      value: null,
      glyph: null,
      error: null
    }

    try {
      const value = decodeUnit(unit, config, at)
      report.value = value
      report.glyph = coreValueToGlyph(value)
    } catch (err) {
      if (err instanceof SyncLossError) {
        report.status = 'sync-loss'
      } else if (err instanceof PaddingMismatchError) {
        report.status = 'padding-mismatch'
      } else {
        throw err
      }
      report.error = err.message
    }

    reports.push(report)
  }

  return reports
}
