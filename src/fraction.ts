/**
 * Exact rational arithmetic over bigint.
 *
 * Floats produced by the tree builder cannot express "x out of y people"
 * exactly; every height and width is snapped to a small-denominator
 * Fraction before counts are derived.
 */

// ==================== INTEGER HELPERS ====================

/**
 * Greatest common divisor (always non-negative).
 */
export function gcd(a: bigint, b: bigint): bigint {
    let x = a < 0n ? -a : a;
    let y = b < 0n ? -b : b;
    while (y !== 0n) {
        [x, y] = [y, x % y];
    }
    return x;
}

/**
 * Least common multiple of a collection of integers. Empty input gives 1.
 */
export function lcm(values: Iterable<bigint>): bigint {
    let result = 1n;
    for (const value of values) {
        const divisor = gcd(result, value);
        result = divisor === 0n ? 0n : (result * value) / divisor;
    }
    return result < 0n ? -result : result;
}

/** Division rounding toward negative infinity (bigint `/` truncates). */
function floorDiv(n: bigint, d: bigint): bigint {
    const q = n / d;
    if (n % d !== 0n && (n < 0n) !== (d < 0n)) {
        return q - 1n;
    }
    return q;
}

// ==================== FRACTION ====================

export class Fraction {
    /** Sign lives on the numerator; denominator is always positive. */
    readonly numerator: bigint;
    readonly denominator: bigint;

    private constructor(numerator: bigint, denominator: bigint) {
        if (denominator === 0n) {
            throw new RangeError('Fraction denominator must not be zero');
        }
        if (denominator < 0n) {
            numerator = -numerator;
            denominator = -denominator;
        }
        const divisor = gcd(numerator, denominator);
        this.numerator = numerator / divisor;
        this.denominator = denominator / divisor;
    }

    static of(numerator: bigint | number, denominator: bigint | number = 1n): Fraction {
        return new Fraction(BigInt(numerator), BigInt(denominator));
    }

    /**
     * Exact value of a finite double. Doubling is lossless, so the loop
     * ends at the float's binary expansion (at most ~1074 steps).
     */
    static fromNumber(value: number): Fraction {
        if (!Number.isFinite(value)) {
            throw new RangeError(`Cannot convert ${value} to a fraction`);
        }
        let scaled = value;
        let denominator = 1n;
        while (!Number.isInteger(scaled)) {
            scaled *= 2;
            denominator *= 2n;
        }
        return new Fraction(BigInt(scaled), denominator);
    }

    /**
     * Closest fraction whose denominator does not exceed `maxDenominator`.
     *
     * Walks the continued-fraction convergents until the next one would
     * exceed the cap, then picks the closer of the last convergent and the
     * best semiconvergent.
     */
    limitDenominator(maxDenominator: bigint | number = 1_000_000n): Fraction {
        const max = BigInt(maxDenominator);
        if (max < 1n) {
            throw new RangeError('maxDenominator must be at least 1');
        }
        if (this.denominator <= max) {
            return this;
        }

        let p0 = 0n, q0 = 1n, p1 = 1n, q1 = 0n;
        let n = this.numerator;
        let d = this.denominator;

        for (;;) {
            const a = floorDiv(n, d);
            const q2 = q0 + a * q1;
            if (q2 > max) break;
            [p0, q0, p1, q1] = [p1, q1, p0 + a * p1, q2];
            [n, d] = [d, n - a * d];
        }

        const k = (max - q0) / q1;
        const semiconvergent = new Fraction(p0 + k * p1, q0 + k * q1);
        const convergent = new Fraction(p1, q1);

        const convergentError = convergent.sub(this).abs();
        const semiconvergentError = semiconvergent.sub(this).abs();
        return convergentError.compare(semiconvergentError) <= 0 ? convergent : semiconvergent;
    }

    // ==================== ARITHMETIC ====================

    add(other: Fraction): Fraction {
        return new Fraction(
            this.numerator * other.denominator + other.numerator * this.denominator,
            this.denominator * other.denominator
        );
    }

    sub(other: Fraction): Fraction {
        return new Fraction(
            this.numerator * other.denominator - other.numerator * this.denominator,
            this.denominator * other.denominator
        );
    }

    mul(other: Fraction): Fraction {
        return new Fraction(
            this.numerator * other.numerator,
            this.denominator * other.denominator
        );
    }

    div(other: Fraction): Fraction {
        if (other.numerator === 0n) {
            throw new RangeError('Division by zero fraction');
        }
        return new Fraction(
            this.numerator * other.denominator,
            this.denominator * other.numerator
        );
    }

    abs(): Fraction {
        return this.numerator < 0n ? new Fraction(-this.numerator, this.denominator) : this;
    }

    // ==================== COMPARISON ====================

    /** Negative, zero or positive as this is less than, equal to or greater than other. */
    compare(other: Fraction): number {
        const left = this.numerator * other.denominator;
        const right = other.numerator * this.denominator;
        if (left < right) return -1;
        if (left > right) return 1;
        return 0;
    }

    equals(other: Fraction): boolean {
        return this.numerator === other.numerator && this.denominator === other.denominator;
    }

    isInteger(): boolean {
        return this.denominator === 1n;
    }

    // ==================== CONVERSION ====================

    toNumber(): number {
        return Number(this.numerator) / Number(this.denominator);
    }

    /** "n" for whole numbers, "n/d" otherwise. */
    toString(): string {
        return this.isInteger()
            ? this.numerator.toString()
            : `${this.numerator}/${this.denominator}`;
    }
}
