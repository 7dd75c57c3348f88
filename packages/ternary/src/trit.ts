import { InvalidTritError } from './errors';

/**
 * Balanced-ternary digit primitives.
 * A trit is -1, 0 or +1; all arithmetic stays inside that set.
 */

export type Trit = -1 | 0 | 1;

/** Ordered trits. Index 0 is transmitted first. */
export type TritSequence = readonly Trit[];

export const TRIT = {
    NEG: -1,
    ZERO: 0,
    POS: 1,
} as const;

// Indexed by (a + b + 2): raw sums -2..2 folded back into -1..1
const WRAPPED_SUM: readonly Trit[] = [1, -1, 0, 1, -1];

// ============================================================================
// GUARDS
// ============================================================================

export function isTrit(value: unknown): value is Trit {
    return value === -1 || value === 0 || value === 1;
}

/**
 * Narrows an arbitrary value to a Trit.
 * @throws InvalidTritError when the value is not exactly -1, 0 or 1
 */
export function asTrit(value: unknown): Trit {
    if (!isTrit(value)) {
        throw new InvalidTritError(value);
    }
    return value;
}

// ============================================================================
// ARITHMETIC
// ============================================================================

export function negate(trit: Trit): Trit {
    if (trit === 1) return -1;
    if (trit === -1) return 1;
    return 0;
}

/**
 * Balanced modular addition.
 *
 * @example
 * addMod3(1, 1)   // -1 (2 wraps to -1)
 * addMod3(-1, -1) // 1  (-2 wraps to 1)
 */
export function addMod3(a: Trit, b: Trit): Trit {
    return WRAPPED_SUM[a + b + 2];
}

/**
 * Balanced modular subtraction. `subMod3(addMod3(a, b), b) === a` for every a, b.
 */
export function subMod3(a: Trit, b: Trit): Trit {
    return addMod3(a, negate(b));
}
