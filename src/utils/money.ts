// src/utils/money.ts
import Decimal from 'decimal.js';
import { InvalidAmountError } from './ledgerErrors';

/** Amounts are stored as numeric(12,2); all arithmetic stays in Decimal. */
export const MONEY_SCALE = 2;

export const ZERO = new Decimal(0);

/** Largest value a numeric(12,2) column holds. */
export const MAX_MONEY = new Decimal('9999999999.99');

/** True when the value fits a numeric(12,2) column without rounding. */
export const fitsMoneyColumn = (value: Decimal): boolean =>
    value.isFinite() && value.decimalPlaces() <= MONEY_SCALE && value.abs().lte(MAX_MONEY);

export const toMoney = (value: Decimal.Value | null | undefined): Decimal =>
    value === null || value === undefined ? ZERO : new Decimal(value);

/**
 * Parses a caller-supplied amount and rejects what the ledger columns cannot
 * store exactly: non-numbers, more than two decimals, values past {@link MAX_MONEY}.
 */
export const parseMoneyAmount = (value: Decimal.Value | null | undefined, label = 'Amount'): Decimal => {
    let amount: Decimal;
    try {
        amount = toMoney(value);
    } catch {
        throw new InvalidAmountError(`${label} must be a number.`);
    }
    if (!fitsMoneyColumn(amount)) {
        throw new InvalidAmountError(
            `${label} must have at most ${MONEY_SCALE} decimals and not exceed ${MAX_MONEY.toFixed(MONEY_SCALE)}.`
        );
    }
    return amount;
};

export const toMoneyOrNull = (value: Decimal.Value | null | undefined): Decimal | null =>
    value === null || value === undefined ? null : new Decimal(value);

/** Balances and drawer totals must never be observably negative. */
export const clampNonNegative = (value: Decimal): Decimal => (value.isNegative() ? ZERO : value);

export const sumMoney = (values: Iterable<Decimal>): Decimal => {
    let total = ZERO;
    for (const value of values) {
        total = total.plus(value);
    }
    return total;
};

/** Wire and storage form: fixed two fractional digits, e.g. `"150.00"`. */
export const formatMoney = (value: Decimal): string => value.toFixed(MONEY_SCALE);

export const formatMoneyOrNull = (value: Decimal | null): string | null =>
    value === null ? null : formatMoney(value);
