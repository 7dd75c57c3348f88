import { InvalidAlphabetError, InvalidSymbolError } from './errors';
import type { Trit, TritSequence } from './trit';

/**
 * Symbol alphabets: the bijection between trits and the characters that carry them.
 */

export interface SymbolAlphabet {
    /** Symbols for -1, 0 and +1, in that order */
    readonly symbols: readonly [string, string, string];
    readonly lookup: ReadonlyMap<string, Trit>;
}

// Emoji presentation selector that often trails LED glyphs when pasted
const VARIATION_SELECTOR = '\uFE0F';

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Builds an alphabet from three distinct single-code-point symbols.
 *
 * @example
 * createAlphabet(['-', '=', '+'])
 * createAlphabet(['🟢', '⚫', '🔴'])
 */
export function createAlphabet(symbols: readonly [string, string, string]): SymbolAlphabet {
    const [neg, zero, pos] = symbols;

    for (const symbol of symbols) {
        if (Array.from(symbol).length !== 1) {
            throw new InvalidAlphabetError(`${JSON.stringify(symbol)} is not a single character`);
        }
        if (/\s/.test(symbol) || symbol === VARIATION_SELECTOR) {
            throw new InvalidAlphabetError('whitespace cannot carry a trit');
        }
    }
    if (neg === zero || zero === pos || neg === pos) {
        throw new InvalidAlphabetError(`symbols must be distinct, got ${symbols.join('')}`);
    }

    const lookup = new Map<string, Trit>([
        [neg, -1],
        [zero, 0],
        [pos, 1],
    ]);

    return Object.freeze({
        symbols: Object.freeze([neg, zero, pos] as const),
        lookup,
    });
}

export const DEFAULT_ALPHABET = createAlphabet(['-', '=', '+']);
export const LED_ALPHABET = createAlphabet(['🟢', '⚫', '🔴']);

/**
 * Alternate notations accepted on input.
 * Symbols of the target alphabet always win over these.
 */
export const DIALECTS: ReadonlyMap<string, Trit> = new Map<string, Trit>([
    // LED
    ['🔴', 1],
    ['⚫', 0],
    ['🟢', -1],
    // Arrows
    ['>', 1],
    ['<', -1],
    // Digits
    ['1', 1],
    ['0', 0],
    ['2', -1],
]);

// ============================================================================
// SINGLE SYMBOLS
// ============================================================================

export function toSymbol(trit: Trit, alphabet: SymbolAlphabet = DEFAULT_ALPHABET): string {
    return alphabet.symbols[trit + 1];
}

/**
 * @throws InvalidSymbolError for anything outside the alphabet
 */
export function fromSymbol(
    symbol: string,
    alphabet: SymbolAlphabet = DEFAULT_ALPHABET,
    offset: number | null = null
): Trit {
    const trit = alphabet.lookup.get(symbol);
    if (trit === undefined) {
        throw new InvalidSymbolError(symbol, { offset });
    }
    return trit;
}

// ============================================================================
// SEQUENCES
// ============================================================================

/**
 * Parses one trit per code point. The first bad symbol is reported by its code-point offset.
 */
export function parseSymbols(text: string, alphabet: SymbolAlphabet = DEFAULT_ALPHABET): Trit[] {
    const trits: Trit[] = [];
    let offset = 0;
    for (const symbol of text) {
        trits.push(fromSymbol(symbol, alphabet, offset));
        offset++;
    }
    return trits;
}

export function renderSymbols(trits: TritSequence, alphabet: SymbolAlphabet = DEFAULT_ALPHABET): string {
    let text = '';
    for (let i = 0; i < trits.length; i++) {
        text += alphabet.symbols[trits[i] + 1];
    }
    return text;
}

/**
 * Rewrites symbols of `from` into `to`, one code point at a time.
 * Anything outside `from` is left in place.
 *
 * @example
 * translateSymbols('+=-', DEFAULT_ALPHABET, LED_ALPHABET) // '🔴⚫🟢'
 */
export function translateSymbols(text: string, from: SymbolAlphabet, to: SymbolAlphabet): string {
    if (from === to) return text;

    let translated = '';
    for (const symbol of text) {
        const trit = from.lookup.get(symbol);
        translated += trit === undefined ? symbol : to.symbols[trit + 1];
    }
    return translated;
}

/**
 * Rewrites dialect symbols into `alphabet` and drops whitespace.
 * Unknown characters pass through untouched so that parsing still rejects them.
 *
 * @example
 * normalizeDialect('🔴⚫ 🟢') // '+=-'
 * normalizeDialect('102')     // '+=-'
 */
export function normalizeDialect(text: string, alphabet: SymbolAlphabet = DEFAULT_ALPHABET): string {
    let normalized = '';
    for (const symbol of text) {
        if (symbol === VARIATION_SELECTOR || /\s/.test(symbol)) continue;

        if (alphabet.lookup.has(symbol)) {
            normalized += symbol;
            continue;
        }

        const trit = DIALECTS.get(symbol);
        normalized += trit === undefined ? symbol : alphabet.symbols[trit + 1];
    }
    return normalized;
}
