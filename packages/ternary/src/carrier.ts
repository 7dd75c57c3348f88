import { DEFAULT_ALPHABET, parseSymbols, type SymbolAlphabet } from './alphabet';
import { EmptyPatternError } from './errors';
import { addMod3, asTrit, subMod3, type Trit, type TritSequence } from './trit';

/**
 * Carrier overlay.
 * A repeating pattern is added trit-by-trit (mod 3) onto a stream and subtracted to undo it.
 */

/** Non-empty, frozen, cycled to the stream length. */
export type CarrierPattern = TritSequence;

// ============================================================================
// PATTERNS
// ============================================================================

/**
 * Validates and freezes a pattern.
 * @throws EmptyPatternError for a zero-length pattern
 */
export function createCarrierPattern(trits: readonly unknown[]): CarrierPattern {
    if (trits.length === 0) {
        throw new EmptyPatternError();
    }
    return Object.freeze(trits.map(asTrit));
}

/**
 * @example
 * parseCarrier('+=-=') // [1, 0, -1, 0]
 */
export function parseCarrier(text: string, alphabet: SymbolAlphabet = DEFAULT_ALPHABET): CarrierPattern {
    return createCarrierPattern(parseSymbols(text, alphabet));
}

export const DEFAULT_CARRIER = createCarrierPattern([1, 0, -1, 0]);

// ============================================================================
// OVERLAY
// ============================================================================

function overlay(
    stream: TritSequence,
    pattern: CarrierPattern,
    phase: number,
    combine: (a: Trit, b: Trit) => Trit
): Trit[] {
    const period = pattern.length;
    if (period === 0) {
        throw new EmptyPatternError();
    }

    // Negative phases count back from the end of the pattern
    const start = ((phase % period) + period) % period;
    const out: Trit[] = [];

    for (let i = 0; i < stream.length; i++) {
        out.push(combine(stream[i], pattern[(start + i) % period]));
    }

    return out;
}

/**
 * `out[i] = addMod3(stream[i], pattern[(i + phase) mod |pattern|])`
 *
 * @example
 * applyCarrier([0, 0, 0, 0], parseCarrier('+=-=')) // [1, 0, -1, 0]
 */
export function applyCarrier(stream: TritSequence, pattern: CarrierPattern, phase = 0): Trit[] {
    return overlay(stream, pattern, phase, addMod3);
}

/**
 * Exact inverse of applyCarrier for the same pattern and phase.
 */
export function removeCarrier(stream: TritSequence, pattern: CarrierPattern, phase = 0): Trit[] {
    return overlay(stream, pattern, phase, subMod3);
}
