// test/unit/domain/value-objects/money.vo.test.ts
import { Money } from '@/core/domain/value-objects/money.vo';

describe('Money', () => {
    describe('of', () => {
        it('stores amounts as whole cents', () => {
            const money = Money.of(0.1 + 0.2, 'USD');

            expect(money.amountInCents).toBe(30);
            expect(money.amount).toBe(0.3);
        });

        it('rounds half-cents away from zero', () => {
            expect(Money.of(1.005).amountInCents).toBe(101);
            expect(Money.of(-1.005).amountInCents).toBe(-101);
        });

        it('rejects non-finite amounts', () => {
            expect(() => Money.of(Number.NaN)).toThrow('Amount must be a finite number');
            expect(() => Money.of(Number.POSITIVE_INFINITY)).toThrow('Amount must be a finite number');
        });

        it('rejects malformed currency codes', () => {
            expect(() => Money.of(1, 'usd')).toThrow('Invalid currency: usd');
        });
    });

    describe('fromDecimalString', () => {
        it('parses NUMERIC column values', () => {
            expect(Money.fromDecimalString('-1234.50', 'EUR').amountInCents).toBe(-123450);
            expect(Money.fromDecimalString('7', 'EUR').amount).toBe(7);
        });

        it('rejects anything that is not a plain decimal', () => {
            expect(() => Money.fromDecimalString('1e3')).toThrow('Invalid decimal amount: 1e3');
        });
    });

    describe('arithmetic', () => {
        it('adds and subtracts exactly', () => {
            const total = Money.of(100.1).add(Money.of(0.2)).subtract(Money.of(50.05));

            expect(total.amount).toBe(50.25);
        });

        it('sums an empty list to zero in the given currency', () => {
            const total = Money.sum([], 'GBP');

            expect(total.isZero()).toBe(true);
            expect(total.currency).toBe('GBP');
        });

        it('refuses to mix currencies', () => {
            expect(() => Money.of(1, 'USD').add(Money.of(1, 'EUR'))).toThrow('Currency mismatch: USD vs EUR');
        });

        it('negates and takes absolute values', () => {
            expect(Money.of(-12.34).abs().amount).toBe(12.34);
            expect(Money.of(12.34).negate().amount).toBe(-12.34);
        });
    });

    describe('tolerance comparisons', () => {
        const tolerance = Money.of(0.01);

        it('treats a one-cent gap as within tolerance', () => {
            expect(Money.of(100).isWithin(Money.of(100.01), tolerance)).toBe(true);
            expect(Money.of(100).isWithin(Money.of(100.02), tolerance)).toBe(false);
        });

        it('requires a difference strictly below tolerance to count as zero', () => {
            expect(Money.of(0).isBelow(tolerance)).toBe(true);
            expect(Money.of(0.01).isBelow(tolerance)).toBe(false);
            expect(Money.of(-0.01).isBelow(tolerance)).toBe(false);
        });
    });

    describe('formatting', () => {
        it('renders two fixed decimals for NUMERIC columns', () => {
            expect(Money.of(-0.5).toDecimalString()).toBe('-0.50');
            expect(Money.of(1234.5).toDecimalString()).toBe('1234.50');
            expect(Money.zero().toDecimalString()).toBe('0.00');
        });

        it('serializes to amount and currency', () => {
            expect(JSON.parse(JSON.stringify(Money.of(9.99, 'CAD')))).toEqual({ amount: 9.99, currency: 'CAD' });
            expect(Money.of(9.99, 'CAD').toString()).toBe('9.99 CAD');
        });
    });
});
