/**
 * Base error and symbol-layer errors.
 * Each error carries a stable code plus the stream position it was detected at.
 * Packages built on these primitives define their own codes.
 */

// ============================================================================
// SECTION 1: Error Codes
// ============================================================================
export const ERROR_CODE = {
    INVALID_SYMBOL: 'INVALID_SYMBOL',
    INVALID_TRIT: 'INVALID_TRIT',
    INVALID_ALPHABET: 'INVALID_ALPHABET',
    EMPTY_PATTERN: 'EMPTY_PATTERN',
} as const;

export type ErrorCode = (typeof ERROR_CODE)[keyof typeof ERROR_CODE];

/**
 * Where in a stream an error was detected.
 * `offset` counts trits (one symbol per trit), `frameIndex` counts units.
 */
export interface ErrorLocation {
    offset?: number | null;
    frameIndex?: number | null;
}

// ============================================================================
// SECTION 2: Base Class
// ============================================================================

export class TernaryError extends Error {
    readonly code: string;
    readonly offset: number | null;
    readonly frameIndex: number | null;

    constructor(code: string, message: string, location: ErrorLocation = {}) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.offset = location.offset ?? null;
        this.frameIndex = location.frameIndex ?? null;
    }
}

/**
 * Appends " at offset N (frame M)" for whichever parts of the location are known.
 */
export function describeLocation(location: ErrorLocation): string {
    let suffix = '';
    if (location.offset !== undefined && location.offset !== null) {
        suffix += ` at offset ${location.offset}`;
    }
    if (location.frameIndex !== undefined && location.frameIndex !== null) {
        suffix += ` (frame ${location.frameIndex})`;
    }
    return suffix;
}

// ============================================================================
// SECTION 3: Symbol Layer Errors
// ============================================================================

export class InvalidSymbolError extends TernaryError {
    constructor(readonly symbol: string, location: ErrorLocation = {}) {
        super(
            ERROR_CODE.INVALID_SYMBOL,
            `Invalid symbol ${JSON.stringify(symbol)}${describeLocation(location)}`,
            location
        );
    }
}

export class InvalidTritError extends TernaryError {
    constructor(readonly value: unknown) {
        super(ERROR_CODE.INVALID_TRIT, `Not a trit: ${String(value)} (expected -1, 0 or 1)`);
    }
}

export class InvalidAlphabetError extends TernaryError {
    constructor(reason: string) {
        super(ERROR_CODE.INVALID_ALPHABET, `Invalid alphabet: ${reason}`);
    }
}

export class EmptyPatternError extends TernaryError {
    constructor() {
        super(ERROR_CODE.EMPTY_PATTERN, 'Carrier pattern must contain at least one trit');
    }
}
