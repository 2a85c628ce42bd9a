import { Decimal } from 'decimal.js';
import { formatMoney, sumAmounts } from '@pocket-ledger/core';
import type { CategoryTotal } from '@pocket-ledger/core';
import { openWorkspace, openLedger } from '../workspace/context.js';
import { resolveRange, describeRange } from '../utils/range.js';
import { log, arrow, fail, errorMessage, formatTable } from '../utils/console.js';
import type { RangeOptions } from '../types.js';

export async function showTotals(options: RangeOptions): Promise<void> {
    let totals: CategoryTotal[];
    let label: string;
    try {
        const workspace = openWorkspace(options);
        const range = resolveRange(options, workspace);
        label = describeRange(range);

        const store = openLedger(workspace);
        try {
            totals = store.getCategoryTotals(range);
        } finally {
            store.close();
        }
    } catch (err) {
        fail(errorMessage(err));
    }

    log(`\nSpending by category, ${label}`);
    if (totals.length === 0) {
        arrow('No expenses recorded in this range.');
        return;
    }

    const grand = sumAmounts(totals.map((t) => t.total));
    const rows = totals.map((t) => [t.category, formatMoney(t.total), String(t.count), share(t.total, grand)]);
    for (const line of formatTable(['Category', 'Total', 'Count', 'Share'], rows, new Set([1, 2, 3]))) {
        log(line);
    }
    log('');
    arrow(`Total spending: ${formatMoney(grand)}`);
}

function share(total: string, grand: Decimal): string {
    if (grand.isZero()) return '-';
    return `${new Decimal(total).dividedBy(grand).times(100).toFixed(1)}%`;
}
