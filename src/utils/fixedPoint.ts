// Fixed-point decimal arithmetic for tax amounts. Values are a bigint mantissa
// and a count of decimal places; nothing here goes through floating point.

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

const pow10 = (places: number): bigint => 10n ** BigInt(places);

export class Fixed {
    static readonly ZERO = new Fixed(0n, 0);

    private constructor(
        readonly units: bigint,
        readonly scale: number
    ) {}

    static of(units: bigint, scale: number = 0): Fixed {
        if (!Number.isInteger(scale) || scale < 0) {
            throw new RangeError(`Invalid scale ${scale}`);
        }
        return new Fixed(units, scale);
    }

    static fromInt(value: number): Fixed {
        if (!Number.isSafeInteger(value)) {
            throw new RangeError(`Not a safe integer: ${value}`);
        }
        return new Fixed(BigInt(value), 0);
    }

    /**
     * Parses decimal text ("18", "-0.25", "1.5e2") or a finite number.
     * Numbers are read through their shortest round-trip text, so 33.335 parses
     * as exactly 33.335. Returns null for anything else.
     */
    static parse(input: string | number): Fixed | null {
        let text: string;
        if (typeof input === 'number') {
            if (!Number.isFinite(input)) return null;
            text = String(input);
        } else {
            text = input.trim();
        }

        const match = text.match(DECIMAL_PATTERN);
        if (!match) return null;

        const [, sign, whole = '', fraction = '', exponent] = match;
        if (whole.length === 0 && fraction.length === 0) return null;

        let units = BigInt((whole || '0') + fraction);
        let scale = fraction.length - (exponent ? parseInt(exponent, 10) : 0);
        if (scale < 0) {
            units *= pow10(-scale);
            scale = 0;
        }
        if (sign === '-') units = -units;

        return new Fixed(units, scale);
    }

    static min(a: Fixed, b: Fixed): Fixed {
        return a.compare(b) <= 0 ? a : b;
    }

    static sum(values: readonly Fixed[]): Fixed {
        return values.reduce((acc, value) => acc.add(value), Fixed.ZERO);
    }

    private rescale(scale: number): bigint {
        return this.units * pow10(scale - this.scale);
    }

    add(other: Fixed): Fixed {
        const scale = Math.max(this.scale, other.scale);
        return new Fixed(this.rescale(scale) + other.rescale(scale), scale);
    }

    sub(other: Fixed): Fixed {
        return this.add(other.neg());
    }

    mul(other: Fixed): Fixed {
        return new Fixed(this.units * other.units, this.scale + other.scale);
    }

    /** Exact division by a power of ten, e.g. `percentOf` is `mul(rate).shift(2)`. */
    shift(places: number): Fixed {
        return new Fixed(this.units, this.scale + places);
    }

    percentOf(base: Fixed): Fixed {
        return base.mul(this).shift(2);
    }

    neg(): Fixed {
        return new Fixed(-this.units, this.scale);
    }

    abs(): Fixed {
        return this.units < 0n ? this.neg() : this;
    }

    compare(other: Fixed): -1 | 0 | 1 {
        const scale = Math.max(this.scale, other.scale);
        const a = this.rescale(scale);
        const b = other.rescale(scale);
        return a < b ? -1 : a > b ? 1 : 0;
    }

    equals(other: Fixed): boolean {
        return this.compare(other) === 0;
    }

    isZero(): boolean {
        return this.units === 0n;
    }

    isNegative(): boolean {
        return this.units < 0n;
    }

    /** Round half-up (ties away from zero) to the given number of places. */
    round(places: number): Fixed {
        if (this.scale <= places) {
            return new Fixed(this.rescale(places), places);
        }

        const divisor = pow10(this.scale - places);
        let quotient = this.units / divisor;
        const remainder = this.units % divisor;
        const twice = (remainder < 0n ? -remainder : remainder) * 2n;
        if (twice >= divisor) {
            quotient += this.units < 0n ? -1n : 1n;
        }
        return new Fixed(quotient, places);
    }

    /** Drops trailing fractional zeros: 18.00 -> 18, 2.50 -> 2.5. */
    normalize(): Fixed {
        let units = this.units;
        let scale = this.scale;
        while (scale > 0 && units % 10n === 0n) {
            units /= 10n;
            scale--;
        }
        return new Fixed(units, scale);
    }

    toFixed(places: number): string {
        return this.round(places).toString();
    }

    toString(): string {
        const negative = this.units < 0n;
        const digits = (negative ? -this.units : this.units).toString().padStart(this.scale + 1, '0');
        const whole = digits.slice(0, digits.length - this.scale);
        const fraction = digits.slice(digits.length - this.scale);
        const body = this.scale > 0 ? `${whole}.${fraction}` : whole;
        return negative ? `-${body}` : body;
    }

    toJSON(): string {
        return this.toString();
    }
}
