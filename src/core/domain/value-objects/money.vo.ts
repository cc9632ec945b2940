// src/core/domain/value-objects/money.vo.ts

export const MAX_DIGITS = 10;
export const DECIMAL_PLACES = 2;

export class InvalidMoneyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidMoneyError';
    }
}

/**
 * Signed decimal amount with exactly two fraction digits. Values are kept as
 * strings end to end so no binary floating point rounding ever applies.
 */
export class Money {
    private constructor(
        private readonly sign: '' | '-',
        private readonly whole: string,
        private readonly fraction: string
    ) {}

    /**
     * Accepts strings such as "100.5", "-20", "0.05", "1e2" and finite numbers.
     * Rejects more than 10 digits in total, more than 2 fraction digits or
     * more than 8 digits before the decimal point.
     */
    static parse(input: string | number): Money {
        const text = typeof input === 'number'
            ? (Number.isFinite(input) ? String(input) : '')
            : input.trim();

        const match = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(text);
        if (!match || (match[2] + (match[3] ?? '')).length === 0) {
            throw new InvalidMoneyError('A valid number is required.');
        }

        const { whole, fraction } = Money.shift(match[2], match[3] ?? '', Number(match[4] ?? '0'));

        if (whole.length + fraction.length > MAX_DIGITS) {
            throw new InvalidMoneyError(`Ensure that there are no more than ${MAX_DIGITS} digits in total.`);
        }
        if (fraction.length > DECIMAL_PLACES) {
            throw new InvalidMoneyError(`Ensure that there are no more than ${DECIMAL_PLACES} decimal places.`);
        }
        if (whole.length > MAX_DIGITS - DECIMAL_PLACES) {
            throw new InvalidMoneyError(
                `Ensure that there are no more than ${MAX_DIGITS - DECIMAL_PLACES} digits before the decimal point.`
            );
        }

        const paddedFraction = fraction.padEnd(DECIMAL_PLACES, '0');
        const isZero = /^0*$/.test(whole + paddedFraction);
        const sign = match[1] === '-' && !isZero ? '-' : '';

        return new Money(sign, whole || '0', paddedFraction);
    }

    /**
     * Moves the decimal point `exponent` places to the right. Leading zeros of
     * the whole part are dropped; fraction digits, trailing zeros included, are
     * kept so they still count towards the limits.
     */
    private static shift(whole: string, fraction: string, exponent: number): { whole: string; fraction: string } {
        const digits = (whole + fraction).replace(/^0+/, '');
        let point = whole.length + exponent - ((whole + fraction).length - digits.length);

        if (digits.length === 0) {
            // Zero keeps only the fraction digits it was written with
            point = Math.min(point, 0);
        }
        // Beyond these bounds the digit limit fails anyway
        if (point > MAX_DIGITS + 1) {
            return { whole: '9'.repeat(MAX_DIGITS + 1), fraction: '' };
        }
        if (point < -MAX_DIGITS) {
            return { whole: '', fraction: '0'.repeat(MAX_DIGITS + 1) };
        }

        if (point <= 0) {
            return { whole: '', fraction: '0'.repeat(-point) + digits };
        }
        if (point >= digits.length) {
            return { whole: digits.padEnd(point, '0'), fraction: '' };
        }
        return { whole: digits.slice(0, point), fraction: digits.slice(point) };
    }

    toString(): string {
        return `${this.sign}${this.whole}.${this.fraction}`;
    }
}
