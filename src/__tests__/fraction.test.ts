/**
 * Fraction Module Tests
 *
 * - Exact conversion from doubles
 * - limitDenominator against known best approximations
 * - Arithmetic, comparison and formatting
 * - gcd / lcm
 */

import { describe, it, expect } from 'vitest';
import { Fraction, gcd, lcm } from '../fraction.js';

describe('Fraction.fromNumber', () => {
    it('converts dyadic values exactly', () => {
        expect(Fraction.fromNumber(0.5).toString()).toBe('1/2');
        expect(Fraction.fromNumber(-0.75).toString()).toBe('-3/4');
        expect(Fraction.fromNumber(3).toString()).toBe('3');
    });

    it('keeps the full binary expansion of 0.1', () => {
        const f = Fraction.fromNumber(0.1);
        expect(f.numerator).toBe(3602879701896397n);
        expect(f.denominator).toBe(36028797018963968n);
    });

    it('rejects non-finite values', () => {
        expect(() => Fraction.fromNumber(Number.NaN)).toThrow(RangeError);
        expect(() => Fraction.fromNumber(Infinity)).toThrow(RangeError);
    });
});

describe('Fraction.limitDenominator', () => {
    it('finds the classic convergents of pi', () => {
        const pi = Fraction.fromNumber(Math.PI);
        expect(pi.limitDenominator(10).toString()).toBe('22/7');
        expect(pi.limitDenominator(1000).toString()).toBe('355/113');
    });

    it('picks a semiconvergent when it beats the last convergent', () => {
        // Convergents of pi run 22/7, 333/106; with a cap of 100 the best
        // is (3 + 14 * 22) / (1 + 14 * 7)
        expect(Fraction.fromNumber(Math.PI).limitDenominator(100).toString()).toBe('311/99');
    });

    it('recovers simple fractions from float noise', () => {
        expect(Fraction.fromNumber(0.1 + 0.2).limitDenominator().toString()).toBe('3/10');
        expect(Fraction.fromNumber(1 / 3).limitDenominator().toString()).toBe('1/3');
        expect(Fraction.fromNumber(-1 / 3).limitDenominator(100).toString()).toBe('-1/3');
    });

    it('picks a convergent below the cap', () => {
        expect(Fraction.fromNumber(0.35).limitDenominator(10).toString()).toBe('1/3');
    });

    it('prefers the convergent on a tie', () => {
        expect(Fraction.fromNumber(2.5).limitDenominator(1).toString()).toBe('2');
    });

    it('returns the same value when already within the cap', () => {
        const f = Fraction.of(3, 7);
        expect(f.limitDenominator(7)).toBe(f);
    });

    it('rejects a cap below 1', () => {
        expect(() => Fraction.of(1, 3).limitDenominator(0)).toThrow(RangeError);
    });
});

describe('Fraction arithmetic', () => {
    const half = Fraction.of(1, 2);
    const third = Fraction.of(1, 3);

    it('adds, subtracts, multiplies and divides', () => {
        expect(half.add(third).toString()).toBe('5/6');
        expect(half.sub(third).toString()).toBe('1/6');
        expect(half.mul(third).toString()).toBe('1/6');
        expect(half.div(third).toString()).toBe('3/2');
    });

    it('normalizes sign and common factors', () => {
        const f = Fraction.of(6, -8);
        expect(f.numerator).toBe(-3n);
        expect(f.denominator).toBe(4n);
    });

    it('rejects a zero denominator', () => {
        expect(() => Fraction.of(1, 0)).toThrow(RangeError);
        expect(() => half.div(Fraction.of(0))).toThrow('Division by zero fraction');
    });

    it('compares by value', () => {
        expect(half.compare(third)).toBe(1);
        expect(third.compare(half)).toBe(-1);
        expect(Fraction.of(2, 4).compare(half)).toBe(0);
        expect(Fraction.of(2, 4).equals(half)).toBe(true);
    });

    it('knows when it is whole', () => {
        expect(Fraction.of(10, 5).isInteger()).toBe(true);
        expect(half.isInteger()).toBe(false);
    });

    it('converts to a number', () => {
        expect(Fraction.of(3, 4).toNumber()).toBe(0.75);
    });
});

describe('gcd and lcm', () => {
    it('computes gcd of signed values', () => {
        expect(gcd(12n, 18n)).toBe(6n);
        expect(gcd(-12n, 18n)).toBe(6n);
        expect(gcd(0n, 5n)).toBe(5n);
    });

    it('computes lcm over a collection', () => {
        expect(lcm([4n, 6n])).toBe(12n);
        expect(lcm([5n, 50n, 1000n])).toBe(1000n);
        expect(lcm([2n, 20n, 1400n, 11000n])).toBe(77000n);
    });

    it('is 1 for no values', () => {
        expect(lcm([])).toBe(1n);
    });
});
