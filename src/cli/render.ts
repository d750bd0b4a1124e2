// src/cli/render.ts

import type { BookAvailability } from '../models/Book';
import type { LoanView } from '../models/LoanRecord';

export interface Column {
    header: string;
    width: number;
}

/**
 * Fixed-width table: header, rule, rows, rule
 *
 * Cells are left-aligned and padded to the column width; longer cells are
 * kept whole. Trailing padding is trimmed from every line.
 */
export function renderTable(columns: Column[], rows: string[][]): string[] {
    const formatRow = (cells: string[]): string =>
        columns.map((column, i) => (cells[i] ?? '').padEnd(column.width)).join(' | ').trimEnd();

    const ruleWidth = columns.reduce((sum, column) => sum + column.width, 0) + 3 * (columns.length - 1);
    const rule = '-'.repeat(ruleWidth);

    return [
        formatRow(columns.map(column => column.header)),
        rule,
        ...rows.map(formatRow),
        rule
    ];
}

export function renderCatalog(entries: BookAvailability[]): string[] {
    return renderTable(
        [
            { header: 'ID', width: 10 },
            { header: 'Title', width: 40 },
            { header: 'Author', width: 25 },
            { header: 'Copies', width: 8 },
            { header: 'Available', width: 10 }
        ],
        entries.map(({ book, available }) => [book.id, book.title, book.author, String(book.copies), String(available)])
    );
}

export function renderSearchResults(entries: BookAvailability[]): string[] {
    return renderTable(
        [
            { header: 'ID', width: 10 },
            { header: 'Title', width: 40 },
            { header: 'Author', width: 25 },
            { header: 'Available', width: 10 }
        ],
        entries.map(({ book, available }) => [book.id, book.title, book.author, String(available)])
    );
}

export function renderAvailable(entries: BookAvailability[]): string[] {
    return renderTable(
        [
            { header: 'ID', width: 10 },
            { header: 'Title', width: 40 },
            { header: 'Author', width: 25 },
            { header: 'Available Copies', width: 18 }
        ],
        entries.map(({ book, available }) => [book.id, book.title, book.author, String(available)])
    );
}

export function renderLoans(loans: LoanView[]): string[] {
    return renderTable(
        [
            { header: 'ID', width: 10 },
            { header: 'Title', width: 40 },
            { header: 'Due Date', width: 12 }
        ],
        loans.map(loan => [loan.bookId, loan.title, loan.overdue ? `${loan.dueDate} (OVERDUE)` : loan.dueDate])
    );
}
