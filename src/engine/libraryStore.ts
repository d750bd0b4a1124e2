// src/engine/libraryStore.ts

import { randomUUID } from 'node:crypto';
import type { Book, BookAvailability } from '../models/Book';
import type { LibraryReport, LoanRecord, LoanView, UserLoans } from '../models/LoanRecord';
import { type User, UserRole, toPublicUser } from '../models/User';
import { LibraryError, getErrorMessage } from '../errors';
import { logDebug, logError, logInfo } from '../telemetry/logger';
import { readLibraryDocument, writeLibraryDocument } from '../persistence/libraryDocument';
import { type Clock, addDays, isOverdue, systemClock, toIsoDate } from './calendar';
import { DEFAULT_LOAN_PERIOD_DAYS, DEFAULT_MAX_ACTIVE_LOANS } from '../config';

/**
 * Catalog used when no data file exists yet
 */
export const SAMPLE_BOOKS: readonly Book[] = [
    { id: '1', title: 'The Great Gatsby', author: 'F. Scott Fitzgerald', copies: 3 },
    { id: '2', title: '1984', author: 'George Orwell', copies: 5 },
    { id: '3', title: 'Moby Dick', author: 'Herman Melville', copies: 1 }
];

export interface LibraryStoreOptions {
    dataFile: string;
    clock?: Clock;
    loanPeriodDays?: number;
    maxActiveLoans?: number;
}

export type LoadOutcome = 'loaded' | 'seeded' | 'failed';

export type DeleteOutcome =
    | { ok: true; book: Book }
    | { ok: false; reason: 'BOOK_NOT_FOUND' }
    | { ok: false; reason: 'BOOK_ON_LOAN'; book: Book; borrowed: number };

export type BorrowFailure = 'LOAN_LIMIT_REACHED' | 'BOOK_NOT_FOUND' | 'NO_COPIES_AVAILABLE';

export type BorrowOutcome =
    | { ok: true; record: LoanRecord; book: Book }
    | { ok: false; reason: BorrowFailure; book?: Book };

export type ReturnOutcome =
    | { ok: true; record: LoanRecord; title: string }
    | { ok: false; reason: 'LOAN_NOT_FOUND' };

/**
 * Library store - owns the catalog and the active loan list
 *
 * All lending rules live here; callers only map input to operations.
 * Every successful mutation is persisted immediately.
 *
 * Invariant: 0 <= borrowedCount(book) <= book.copies for every book
 * Invariant: no user holds more than maxActiveLoans records
 */
export class LibraryStore {
    readonly dataFile: string;
    readonly loanPeriodDays: number;
    readonly maxActiveLoans: number;

    private readonly clock: Clock;
    private books: Map<string, Book>;
    private loans: LoanRecord[];

    constructor(options: LibraryStoreOptions) {
        this.dataFile = options.dataFile;
        this.clock = options.clock ?? systemClock;
        this.loanPeriodDays = options.loanPeriodDays ?? DEFAULT_LOAN_PERIOD_DAYS;
        this.maxActiveLoans = options.maxActiveLoans ?? DEFAULT_MAX_ACTIVE_LOANS;
        this.books = new Map();
        this.loans = [];
    }

    // ========== Persistence ==========

    /**
     * Replace in-memory state with the contents of the data file
     *
     * Missing file → sample catalog. Unreadable or malformed file → empty
     * catalog. Neither case throws.
     */
    load(): LoadOutcome {
        this.books = new Map();
        this.loans = [];

        const result = readLibraryDocument(this.dataFile);

        if (result.status === 'missing') {
            for (const book of SAMPLE_BOOKS) {
                this.books.set(book.id, { ...book });
            }
            logInfo(`No data file found at ${this.dataFile}. Starting with ${SAMPLE_BOOKS.length} sample books.`);
            return 'seeded';
        }

        if (result.status === 'invalid') {
            logError(`Could not load library data: ${result.error}. Starting with empty data.`);
            return 'failed';
        }

        for (const book of result.snapshot.books) {
            this.books.set(book.id, book);
        }
        this.loans = result.snapshot.loans;

        logInfo(`Data loaded from ${this.dataFile}.`, { books: this.books.size, loans: this.loans.length });
        return 'loaded';
    }

    /**
     * Write the full catalog and loan list to the data file
     *
     * @returns False if the write failed; in-memory state is kept either way
     */
    save(): boolean {
        try {
            writeLibraryDocument(this.dataFile, {
                books: Array.from(this.books.values()),
                loans: this.loans
            });
        } catch (error) {
            logError(`Could not save data to ${this.dataFile}: ${getErrorMessage(error)}`);
            return false;
        }

        logDebug(`Data saved to ${this.dataFile}.`);
        return true;
    }

    // ========== Catalog ==========

    /**
     * Add a new title to the catalog
     *
     * @throws LibraryError INVALID_ARGUMENT for a blank title/author,
     *         INVALID_COPIES unless copies is a positive integer
     */
    addBook(title: string, author: string, copies: number): Book {
        const cleanTitle = title.trim();
        const cleanAuthor = author.trim();

        if (!cleanTitle || !cleanAuthor) {
            throw new LibraryError('Title and author are required', 'INVALID_ARGUMENT', { title, author });
        }
        if (!Number.isInteger(copies) || copies <= 0) {
            throw new LibraryError('Copies must be a positive whole number', 'INVALID_COPIES', { copies });
        }

        const book: Book = {
            id: randomUUID(),
            title: cleanTitle,
            author: cleanAuthor,
            copies
        };
        this.books.set(book.id, book);
        this.save();

        return { ...book };
    }

    /**
     * Remove a title, reporting why if it cannot be removed
     */
    removeBook(id: string): DeleteOutcome {
        const book = this.books.get(id);
        if (!book) {
            return { ok: false, reason: 'BOOK_NOT_FOUND' };
        }

        const borrowed = this.borrowedCount(id);
        if (borrowed > 0) {
            return { ok: false, reason: 'BOOK_ON_LOAN', book: { ...book }, borrowed };
        }

        this.books.delete(id);
        this.save();
        return { ok: true, book };
    }

    /**
     * Remove a title
     *
     * @returns False (catalog untouched) if unknown or any copy is on loan
     */
    deleteBook(id: string): boolean {
        return this.removeBook(id).ok;
    }

    getBook(id: string): Book | undefined {
        const book = this.books.get(id);
        return book ? { ...book } : undefined;
    }

    hasBook(id: string): boolean {
        return this.books.has(id);
    }

    /**
     * Case-insensitive substring match on title or author, catalog order
     */
    searchBooks(query: string): BookAvailability[] {
        const needle = query.toLowerCase();
        return this.listAllBooks().filter(({ book }) =>
            book.title.toLowerCase().includes(needle) || book.author.toLowerCase().includes(needle)
        );
    }

    listAllBooks(): BookAvailability[] {
        return Array.from(this.books.values()).map(book => this.withAvailability(book));
    }

    listAvailableBooks(): BookAvailability[] {
        return this.listAllBooks().filter(entry => entry.available > 0);
    }

    // ========== Lending ==========

    borrowedCount(bookId: string): number {
        return this.loans.filter(loan => loan.bookId === bookId).length;
    }

    activeLoanCount(userId: string): number {
        return this.loans.filter(loan => loan.userId === userId).length;
    }

    /**
     * Lend one copy to a user
     *
     * Checks run in order: user's loan cap, book exists, a copy is free.
     * The same user may hold several copies of one title.
     */
    borrowBook(bookId: string, userId: string): BorrowOutcome {
        if (this.activeLoanCount(userId) >= this.maxActiveLoans) {
            return { ok: false, reason: 'LOAN_LIMIT_REACHED' };
        }

        const book = this.books.get(bookId);
        if (!book) {
            return { ok: false, reason: 'BOOK_NOT_FOUND' };
        }

        if (book.copies - this.borrowedCount(bookId) <= 0) {
            return { ok: false, reason: 'NO_COPIES_AVAILABLE', book: { ...book } };
        }

        const record: LoanRecord = {
            userId,
            bookId,
            dueDate: addDays(this.clock(), this.loanPeriodDays)
        };
        this.loans.push(record);
        this.save();

        return { ok: true, record: { ...record }, book: { ...book } };
    }

    /**
     * Close the first loan matching both user and book
     */
    returnBook(bookId: string, userId: string): ReturnOutcome {
        const index = this.loans.findIndex(loan => loan.userId === userId && loan.bookId === bookId);
        if (index === -1) {
            return { ok: false, reason: 'LOAN_NOT_FOUND' };
        }

        const [record] = this.loans.splice(index, 1);
        this.save();

        const title = this.books.get(bookId)?.title ?? 'Unknown Book';
        return { ok: true, record, title };
    }

    // ========== Views ==========

    /**
     * Loans held by one user; loans on titles no longer in the catalog are skipped
     */
    listLoansForUser(userId: string): LoanView[] {
        const today = this.today();
        const views: LoanView[] = [];

        for (const loan of this.loans) {
            if (loan.userId !== userId) {
                continue;
            }
            const book = this.books.get(loan.bookId);
            if (book) {
                views.push({
                    bookId: loan.bookId,
                    title: book.title,
                    dueDate: loan.dueDate,
                    overdue: isOverdue(loan.dueDate, today)
                });
            }
        }

        return views;
    }

    /**
     * Every customer among `users`, in the given order, with their loans
     */
    listAllUsersWithLoans(users: readonly User[]): UserLoans[] {
        const today = this.today();

        return users
            .filter(user => user.role === UserRole.CUSTOMER)
            .map(user => ({
                user: toPublicUser(user),
                loans: this.loans
                    .filter(loan => loan.userId === user.id)
                    .map(loan => ({
                        bookId: loan.bookId,
                        title: this.books.get(loan.bookId)?.title ?? `Unknown Book (ID: ${loan.bookId})`,
                        dueDate: loan.dueDate,
                        overdue: isOverdue(loan.dueDate, today)
                    }))
            }));
    }

    listLoans(): LoanRecord[] {
        return this.loans.map(loan => ({ ...loan }));
    }

    generateReport(): LibraryReport {
        const today = this.today();
        let totalCopies = 0;
        for (const book of this.books.values()) {
            totalCopies += book.copies;
        }

        return {
            totalUniqueBooks: this.books.size,
            totalCopies,
            totalIssued: this.loans.length,
            overdue: this.loans.filter(loan => isOverdue(loan.dueDate, today)).length
        };
    }

    private withAvailability(book: Book): BookAvailability {
        const borrowed = this.borrowedCount(book.id);
        return { book: { ...book }, borrowed, available: book.copies - borrowed };
    }

    private today(): string {
        return toIsoDate(this.clock());
    }
}

/**
 * Construct a store and load its data file
 */
export function createLibraryStore(options: LibraryStoreOptions): LibraryStore {
    const store = new LibraryStore(options);
    store.load();
    return store;
}
