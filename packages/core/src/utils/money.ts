/**
 * Decimal helpers. Amounts travel as strings; arithmetic happens in Decimal.
 */

import { Decimal } from 'decimal.js';

/**
 * Exact sum of decimal strings.
 */
export function sumAmounts(amounts: Iterable<string>): Decimal {
    let total = new Decimal(0);
    for (const amount of amounts) {
        total = total.plus(new Decimal(amount));
    }
    return total;
}

/**
 * Plain decimal string: no exponent, no trailing zeros ("20", "12.5").
 */
export function toAmountString(value: Decimal): string {
    return value.toFixed();
}

/**
 * Two-place display form ("20.00", "-3.50").
 */
export function formatMoney(amount: string | Decimal): string {
    return new Decimal(amount).toFixed(2);
}
