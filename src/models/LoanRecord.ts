// src/models/LoanRecord.ts

import type { PublicUser } from './User';

/**
 * Loan record - one copy of a book held by one user
 *
 * No id of its own. Identity is the (userId, bookId) pair, and the same
 * pair may appear more than once.
 */
export interface LoanRecord {
    userId: string;
    bookId: string;
    dueDate: string;   // Calendar date, YYYY-MM-DD
}

/**
 * Loan joined with its book title for display
 */
export interface LoanView {
    bookId: string;
    title: string;
    dueDate: string;
    overdue: boolean;
}

export interface UserLoans {
    user: PublicUser;
    loans: LoanView[];
}

export interface LibraryReport {
    totalUniqueBooks: number;
    totalCopies: number;
    totalIssued: number;
    overdue: number;   // Loans due strictly before today
}
