import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { splitByPercentage, sumQuantities } from '../Primitives.js';
import { KernelError } from '../../Errors.js';

describe('Percentage Split', () => {
    test('30% of 1000', () => {
        expect(splitByPercentage(1000n, 30)).toEqual({ share: 300n, remainder: 700n });
    });

    test('floor goes to the share, remainder absorbs the rounding', () => {
        expect(splitByPercentage(7n, 50)).toEqual({ share: 3n, remainder: 4n });
        expect(splitByPercentage(1n, 99)).toEqual({ share: 0n, remainder: 1n });
    });

    test('edges', () => {
        expect(splitByPercentage(999n, 0)).toEqual({ share: 0n, remainder: 999n });
        expect(splitByPercentage(999n, 100)).toEqual({ share: 999n, remainder: 0n });
    });

    test('rejects out-of-range input', () => {
        expect(() => splitByPercentage(10n, 101)).toThrow(KernelError);
        expect(() => splitByPercentage(10n, -1)).toThrow(KernelError);
        expect(() => splitByPercentage(10n, 12.5)).toThrow('[Escrow:INVALID_QUANTITY] Percentage out of range: 12.5');
        expect(() => splitByPercentage(-10n, 10)).toThrow(KernelError);
    });

    test('PROP: shares sum to the quantity and the first share is floored', () => {
        fc.assert(
            fc.property(fc.bigInt({ min: 0n, max: 10n ** 30n }), fc.integer({ min: 0, max: 100 }), (q, p) => {
                const { share, remainder } = splitByPercentage(q, p);
                return share + remainder === q &&
                    share === (q * BigInt(p)) / 100n &&
                    share >= 0n && remainder >= 0n;
            })
        );
    });

    test('sumQuantities', () => {
        expect(sumQuantities([1n, 2n, 3n])).toBe(6n);
        expect(sumQuantities([])).toBe(0n);
    });
});
