import { describe, it, expect } from 'vitest';
import { parseCommand } from '../src/args.js';

describe('parseCommand', () => {
    it('shows help with no command or with --help', () => {
        expect(parseCommand([])).toEqual({ name: 'help' });
        expect(parseCommand(['list', '--help'])).toEqual({ name: 'help' });
    });

    it('parses add-expense options', () => {
        expect(
            parseCommand([
                'add-expense',
                '--amount', '12.50',
                '--description', 'pizza delivery',
                '--payment', 'Credit Card',
                '--workspace', '/ledger',
            ])
        ).toEqual({
            name: 'add-expense',
            options: {
                workspace: '/ledger',
                date: undefined,
                amount: '12.50',
                description: 'pizza delivery',
                category: undefined,
                payment: 'Credit Card',
                custom: false,
            },
        });
    });

    it('parses set-budget with a custom category', () => {
        const command = parseCommand(['set-budget', '--category', 'Pets', '--amount', '50', '--custom']);
        expect(command).toEqual({
            name: 'set-budget',
            options: { workspace: undefined, category: 'Pets', amount: '50', month: undefined, custom: true },
        });
    });

    it('passes the date range to list, totals, export and report', () => {
        expect(parseCommand(['totals', '--from', '2026-01-01'])).toEqual({
            name: 'totals',
            options: { workspace: undefined, from: '2026-01-01', to: undefined },
        });
        expect(parseCommand(['report', '--to', '2026-01-31', '--out', 'jan.xlsx'])).toEqual({
            name: 'report',
            options: { workspace: undefined, from: undefined, to: '2026-01-31', out: 'jan.xlsx' },
        });
    });

    it('joins the words of a description to categorize', () => {
        expect(parseCommand(['categorize', 'coffee', 'shop'])).toEqual({
            name: 'categorize',
            description: 'coffee shop',
            options: { workspace: undefined },
        });
    });

    it('rejects unknown commands, options and stray arguments', () => {
        expect(() => parseCommand(['delete'])).toThrow('Unknown command: delete');
        expect(() => parseCommand(['list', '--verbose'])).toThrow();
        expect(() => parseCommand(['totals', 'extra'])).toThrow('Unexpected argument: extra');
    });
});
