import { Decimal, percentage, roundToInteger, toDecimal } from '../utils/decimal.util';

export const MINOR_UNITS_PER_MAJOR = 100;

export class InvalidMoneyError extends Error {
  readonly code = 'INVALID_MONEY';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidMoneyError';
  }
}

export class MoneyUnderflowError extends Error {
  readonly code = 'UNDERFLOW';

  constructor(readonly minuend: Money, readonly subtrahend: Money) {
    super(`Cannot subtract ${subtrahend.toMajorUnits()} from ${minuend.toMajorUnits()}: result would be negative`);
    this.name = 'MoneyUnderflowError';
  }
}

function assertInteger(value: number, label: string): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidMoneyError(`${label} must be a safe integer, got ${value}`);
  }
}

/**
 * Fixed-point currency value held as a whole number of minor units (paisa).
 *
 * Every operation returns a new instance. The only operations that can
 * produce a fraction of a minor unit (`fromMajorUnits` with more than two
 * decimals, `divide`) round half away from zero to a whole minor unit.
 */
export class Money {
  static readonly ZERO = new Money(new Decimal(0));

  private constructor(private readonly minor: Decimal) {}

  static fromMinorUnits(minor: number | string | Decimal): Money {
    const value = toDecimal(minor);
    if (!value.isInteger()) {
      throw new InvalidMoneyError(`Minor units must be whole, got ${value.toString()}`);
    }
    return new Money(value);
  }

  /** Accepts "295.50", 295.5, or a Decimal; thousands separators are stripped. */
  static fromMajorUnits(major: number | string | Decimal): Money {
    let value: Decimal;
    try {
      value = typeof major === 'string' ? toDecimal(major.replace(/,/g, '').trim()) : toDecimal(major);
    } catch {
      throw new InvalidMoneyError(`Not a decimal amount: ${String(major)}`);
    }
    if (!value.isFinite()) {
      throw new InvalidMoneyError(`Not a finite amount: ${String(major)}`);
    }
    return new Money(roundToInteger(value.times(MINOR_UNITS_PER_MAJOR)));
  }

  static sum(values: readonly Money[]): Money {
    return values.reduce((total, value) => total.add(value), Money.ZERO);
  }

  add(other: Money): Money {
    return new Money(this.minor.plus(other.minor));
  }

  /** Signed difference; use for P&L where a negative result is meaningful. */
  subtract(other: Money): Money {
    return new Money(this.minor.minus(other.minor));
  }

  /** Difference for quantities that may never go negative, such as cost basis. */
  subtractNonNegative(other: Money): Money {
    const result = this.minor.minus(other.minor);
    if (result.isNegative()) {
      throw new MoneyUnderflowError(this, other);
    }
    return new Money(result);
  }

  multiply(quantity: number): Money {
    assertInteger(quantity, 'Quantity');
    return new Money(this.minor.times(quantity));
  }

  divide(divisor: number): Money {
    assertInteger(divisor, 'Divisor');
    if (divisor === 0) {
      throw new InvalidMoneyError('Division by zero');
    }
    return new Money(roundToInteger(this.minor.dividedBy(divisor)));
  }

  /** this / base × 100 for display, or null when base is zero. */
  percentOf(base: Money): number | null {
    return percentage(this.minor, base.minor);
  }

  compare(other: Money): -1 | 0 | 1 {
    const result = this.minor.comparedTo(other.minor);
    return result < 0 ? -1 : result > 0 ? 1 : 0;
  }

  equals(other: Money): boolean {
    return this.minor.equals(other.minor);
  }

  isZero(): boolean {
    return this.minor.isZero();
  }

  isNegative(): boolean {
    return this.minor.isNegative() && !this.minor.isZero();
  }

  isPositive(): boolean {
    return this.minor.isPositive() && !this.minor.isZero();
  }

  toMinorUnits(): number {
    return this.minor.toNumber();
  }

  /** "1234.50" */
  toMajorUnits(): string {
    return this.minor.dividedBy(MINOR_UNITS_PER_MAJOR).toFixed(2);
  }

  toJSON(): string {
    return this.toMajorUnits();
  }

  toString(): string {
    return this.toMajorUnits();
  }
}
