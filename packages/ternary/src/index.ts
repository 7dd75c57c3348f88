/**
 * @packageDocumentation
 * @module @tribble/ternary
 *
 * Balanced-ternary primitives: trits, symbol alphabets and the carrier overlay.
 */

// Trits
export { TRIT, isTrit, asTrit, negate, addMod3, subMod3 } from './trit';
export type { Trit, TritSequence } from './trit';

// Alphabets
export {
    createAlphabet,
    DEFAULT_ALPHABET,
    LED_ALPHABET,
    DIALECTS,
    toSymbol,
    fromSymbol,
    parseSymbols,
    renderSymbols,
    translateSymbols,
    normalizeDialect,
} from './alphabet';
export type { SymbolAlphabet } from './alphabet';

// Carrier
export {
    createCarrierPattern,
    parseCarrier,
    DEFAULT_CARRIER,
    applyCarrier,
    removeCarrier,
} from './carrier';
export type { CarrierPattern } from './carrier';

// Errors
export {
    ERROR_CODE,
    TernaryError,
    describeLocation,
    InvalidSymbolError,
    InvalidTritError,
    InvalidAlphabetError,
    EmptyPatternError,
} from './errors';
export type { ErrorCode, ErrorLocation } from './errors';
