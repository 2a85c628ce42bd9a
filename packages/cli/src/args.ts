import { parseArgs } from 'node:util';
import type {
    AddExpenseOptions,
    AddIncomeOptions,
    SetBudgetOptions,
    RangeOptions,
    BudgetReportOptions,
    OutputOptions,
    GlobalOptions,
} from './types.js';

export type Command =
    | { name: 'help' }
    | { name: 'init'; options: GlobalOptions }
    | { name: 'add-expense'; options: AddExpenseOptions }
    | { name: 'add-income'; options: AddIncomeOptions }
    | { name: 'set-budget'; options: SetBudgetOptions }
    | { name: 'list'; options: RangeOptions }
    | { name: 'totals'; options: RangeOptions }
    | { name: 'budget'; options: BudgetReportOptions }
    | { name: 'categorize'; description: string; options: GlobalOptions }
    | { name: 'export'; options: OutputOptions }
    | { name: 'report'; options: OutputOptions };

export const USAGE = `Pocket Ledger

Usage: pledger <command> [options]

Commands:
  init                                 Create settings, ledger and categorizer model
  add-expense --amount <n> --description <text>
              [--date YYYY-MM-DD] [--category <name>] [--custom] [--payment <method>]
                                       Record an expense (category suggested when omitted)
  add-income  --amount <n> --source <text> [--date YYYY-MM-DD]
  set-budget  --category <name> --amount <n> [--month YYYY-MM] [--custom]
  list        [--from YYYY-MM-DD] [--to YYYY-MM-DD]
  totals      [--from YYYY-MM-DD] [--to YYYY-MM-DD]
  budget      [--month YYYY-MM]
  categorize  <description...>
  export      [--from ...] [--to ...] [--out <file.csv>]
  report      [--from ...] [--to ...] [--out <file.xlsx>]

Global options:
  --workspace <dir>                    Workspace root (default: nearest with config/settings.yaml)
`;

const OPTIONS = {
    workspace: { type: 'string' },
    date: { type: 'string' },
    amount: { type: 'string' },
    description: { type: 'string' },
    category: { type: 'string' },
    payment: { type: 'string' },
    custom: { type: 'boolean', default: false },
    source: { type: 'string' },
    month: { type: 'string' },
    from: { type: 'string' },
    to: { type: 'string' },
    out: { type: 'string' },
    help: { type: 'boolean', short: 'h', default: false },
} as const;

/**
 * Turns argv (without node and script) into a command. Throws on unknown
 * commands or options.
 */
export function parseCommand(argv: string[]): Command {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
    const [name, ...rest] = positionals;

    if (name === undefined || values.help === true) {
        return { name: 'help' };
    }

    const global: GlobalOptions = { workspace: values.workspace };
    const range: RangeOptions = { ...global, from: values.from, to: values.to };

    if (name !== 'categorize' && rest.length > 0) {
        throw new Error(`Unexpected argument: ${rest[0]}`);
    }

    switch (name) {
        case 'init':
            return { name: 'init', options: global };
        case 'add-expense':
            return {
                name: 'add-expense',
                options: {
                    ...global,
                    date: values.date,
                    amount: values.amount,
                    description: values.description,
                    category: values.category,
                    payment: values.payment,
                    custom: values.custom === true,
                },
            };
        case 'add-income':
            return {
                name: 'add-income',
                options: { ...global, date: values.date, amount: values.amount, source: values.source },
            };
        case 'set-budget':
            return {
                name: 'set-budget',
                options: {
                    ...global,
                    category: values.category,
                    amount: values.amount,
                    month: values.month,
                    custom: values.custom === true,
                },
            };
        case 'list':
            return { name: 'list', options: range };
        case 'totals':
            return { name: 'totals', options: range };
        case 'budget':
            return { name: 'budget', options: { ...global, month: values.month } };
        case 'categorize':
            return { name: 'categorize', description: rest.join(' '), options: global };
        case 'export':
            return { name: 'export', options: { ...range, out: values.out } };
        case 'report':
            return { name: 'report', options: { ...range, out: values.out } };
        default:
            throw new Error(`Unknown command: ${name}`);
    }
}
