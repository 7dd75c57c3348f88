import { addMod3, asTrit, isTrit, negate, subMod3, TRIT } from '../trit';
import type { Trit } from '../trit';
import { ERROR_CODE, InvalidTritError } from '../errors';

const ALL_TRITS: readonly Trit[] = [-1, 0, 1];

describe('Trit arithmetic', () => {
    describe('addMod3()', () => {
        test('sums inside the balanced range are untouched', () => {
            expect(addMod3(0, 0)).toBe(0);
            expect(addMod3(1, 0)).toBe(1);
            expect(addMod3(0, -1)).toBe(-1);
            expect(addMod3(1, -1)).toBe(0);
        });

        test('+1 + +1 wraps to -1', () => {
            expect(addMod3(1, 1)).toBe(-1);
        });

        test('-1 + -1 wraps to +1', () => {
            expect(addMod3(-1, -1)).toBe(1);
        });

        test('is commutative', () => {
            for (const a of ALL_TRITS) {
                for (const b of ALL_TRITS) {
                    expect(addMod3(a, b)).toBe(addMod3(b, a));
                }
            }
        });
    });

    describe('subMod3()', () => {
        test('undoes addMod3 for every pair', () => {
            for (const a of ALL_TRITS) {
                for (const b of ALL_TRITS) {
                    expect(subMod3(addMod3(a, b), b)).toBe(a);
                }
            }
        });

        test('-1 - +1 wraps to +1', () => {
            expect(subMod3(-1, 1)).toBe(1);
        });
    });

    test('negate() mirrors around zero', () => {
        expect(negate(TRIT.POS)).toBe(-1);
        expect(negate(TRIT.NEG)).toBe(1);
        expect(negate(TRIT.ZERO)).toBe(0);
    });
});

describe('Trit guards', () => {
    test('isTrit() accepts exactly -1, 0 and 1', () => {
        expect(ALL_TRITS.every(isTrit)).toBe(true);
        expect(isTrit(2)).toBe(false);
        expect(isTrit(0.5)).toBe(false);
        expect(isTrit('1')).toBe(false);
        expect(isTrit(null)).toBe(false);
    });

    test('asTrit() returns valid values unchanged', () => {
        expect(asTrit(-1)).toBe(-1);
    });

    test('[EDGE] asTrit(2) throws InvalidTritError', () => {
        expect(() => asTrit(2)).toThrow(InvalidTritError);
        expect(() => asTrit(2)).toThrow('Not a trit: 2 (expected -1, 0 or 1)');
    });

    test('errors carry their code', () => {
        let error: unknown = null;
        try {
            asTrit(7);
        } catch (err) {
            error = err;
        }
        expect(error).toBeInstanceOf(InvalidTritError);
        expect(error).toMatchObject({ code: ERROR_CODE.INVALID_TRIT, name: 'InvalidTritError' });
    });
});
