// src/core/domain/value-objects/money.vo.ts

/**
 * Signed monetary amount in a single ledger currency.
 * Positive values are inflows, negative values are outflows. Stored as integer cents
 * so sums and tolerance checks are exact.
 */
export class Money {
    private readonly cents: number;
    readonly currency: string;

    private constructor(cents: number, currency: string) {
        this.cents = cents;
        this.currency = currency;
    }

    static of(amount: number, currency: string = 'USD'): Money {
        if (typeof amount !== 'number' || !Number.isFinite(amount)) {
            throw new Error(`Amount must be a finite number: ${amount}`);
        }
        Money.validateCurrency(currency);
        return new Money(Math.round((amount + Math.sign(amount) * Number.EPSILON) * 100), currency);
    }

    /**
     * Parses a NUMERIC column value as returned by the pg driver.
     */
    static fromDecimalString(value: string, currency: string = 'USD'): Money {
        if (!/^-?\d+(\.\d+)?$/.test(value.trim())) {
            throw new Error(`Invalid decimal amount: ${value}`);
        }
        return Money.of(parseFloat(value), currency);
    }

    static zero(currency: string = 'USD'): Money {
        Money.validateCurrency(currency);
        return new Money(0, currency);
    }

    static sum(values: Money[], currency: string = 'USD'): Money {
        return values.reduce((total, value) => total.add(value), Money.zero(currency));
    }

    private static validateCurrency(currency: string): void {
        if (!/^[A-Z]{3}$/.test(currency)) {
            throw new Error(`Invalid currency: ${currency}`);
        }
    }

    get amount(): number {
        return this.cents / 100;
    }

    get amountInCents(): number {
        return this.cents;
    }

    add(other: Money): Money {
        this.ensureSameCurrency(other);
        return new Money(this.cents + other.cents, this.currency);
    }

    subtract(other: Money): Money {
        this.ensureSameCurrency(other);
        return new Money(this.cents - other.cents, this.currency);
    }

    abs(): Money {
        return new Money(Math.abs(this.cents), this.currency);
    }

    negate(): Money {
        return new Money(-this.cents, this.currency);
    }

    isPositive(): boolean {
        return this.cents > 0;
    }

    isNegative(): boolean {
        return this.cents < 0;
    }

    isZero(): boolean {
        return this.cents === 0;
    }

    equals(other: Money): boolean {
        return this.cents === other.cents && this.currency === other.currency;
    }

    /**
     * |this - other| <= tolerance
     */
    isWithin(other: Money, tolerance: Money): boolean {
        this.ensureSameCurrency(other);
        return Math.abs(this.cents - other.cents) <= tolerance.cents;
    }

    /**
     * |this| < tolerance
     */
    isBelow(tolerance: Money): boolean {
        return Math.abs(this.cents) < tolerance.cents;
    }

    private ensureSameCurrency(other: Money): void {
        if (this.currency !== other.currency) {
            throw new Error(`Currency mismatch: ${this.currency} vs ${other.currency}`);
        }
    }

    /** Fixed two-decimal form used for NUMERIC(15,2) columns. */
    toDecimalString(): string {
        const sign = this.cents < 0 ? '-' : '';
        const absolute = Math.abs(this.cents);
        const units = Math.floor(absolute / 100);
        const fraction = String(absolute % 100).padStart(2, '0');
        return `${sign}${units}.${fraction}`;
    }

    toJSON(): { amount: number; currency: string } {
        return {
            amount: this.amount,
            currency: this.currency
        };
    }

    toString(): string {
        return `${this.toDecimalString()} ${this.currency}`;
    }
}
