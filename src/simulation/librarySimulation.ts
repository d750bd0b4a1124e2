// src/simulation/librarySimulation.ts

import fs from 'node:fs';
import { type LibraryStore, createLibraryStore } from '../engine/libraryStore';
import { UserDirectory } from '../auth/userDirectory';
import { type User, UserRole } from '../models/User';
import type { LibraryReport } from '../models/LoanRecord';
import { type Clock, systemClock } from '../engine/calendar';
import { type Output, consoleOutput } from '../cli/prompt';

/**
 * Full lending-desk walkthrough
 *
 * Demonstrates:
 * - Seeding on a fresh data file
 * - Registering customers
 * - Borrowing up to the per-user cap
 * - Every borrow failure (cap, no copies) and delete-on-loan refusal
 * - Returns freeing a copy for the next borrower
 * - Overdue detection once the clock moves past the due date
 * - Reload from disk reproducing the same state
 */

export interface SimulationOptions {
    dataFile: string;      // Overwritten: the walkthrough starts from a missing file
    clock?: Clock;
    output?: Output;
}

export interface SimulationStep {
    step: string;
    ok: boolean;
    detail: string;
}

export interface SimulationResult {
    steps: SimulationStep[];
    report: LibraryReport;
    reloadedLoans: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const DAYS_PAST_DUE = 3;

export function runSimulation(options: SimulationOptions): SimulationResult {
    const print = options.output ?? consoleOutput;
    const baseClock = options.clock ?? systemClock;
    let offsetDays = 0;
    const clock: Clock = () => new Date(baseClock().getTime() + offsetDays * DAY_MS);

    const steps: SimulationStep[] = [];
    const record = (step: string, ok: boolean, detail: string): void => {
        steps.push({ step, ok, detail });
        print(`  ${ok ? '✓' : '✗'} ${step}: ${detail}`);
    };

    const logSection = (title: string): void => {
        print('');
        print('='.repeat(80));
        print(title);
        print('='.repeat(80));
    };

    const logReport = (store: LibraryStore): LibraryReport => {
        const report = store.generateReport();
        print(`  Titles: ${report.totalUniqueBooks}, Copies: ${report.totalCopies}, Issued: ${report.totalIssued}, Overdue: ${report.overdue}`);
        return report;
    };

    logSection('LIBRARY SIMULATION - START');

    // ========== STEP 1: Fresh store ==========
    logSection('STEP 1: Opening a fresh data file');
    fs.rmSync(options.dataFile, { force: true });
    const store = createLibraryStore({ dataFile: options.dataFile, clock });
    record('seed', store.listAllBooks().length > 0, `${store.listAllBooks().length} sample books`);
    logReport(store);

    // ========== STEP 2: Accounts and catalog ==========
    logSection('STEP 2: Registering customers and adding a title');
    const users = new UserDirectory();
    const register = (username: string): User => {
        const outcome = users.register(username, 'test-password', UserRole.CUSTOMER);
        if (!outcome.ok) {
            throw new Error(`Could not register ${username}: ${outcome.reason}`);
        }
        record('register', true, username);
        return outcome.user;
    };
    const alice = register('alice');
    const bob = register('bob');

    const dune = store.addBook('Dune', 'Frank Herbert', 2);
    record('add book', true, `${dune.title} x${dune.copies}`);

    // ========== STEP 3: Borrowing ==========
    logSection('STEP 3: Borrowing up to the limit');
    const borrow = (user: User, bookId: string): boolean => {
        const outcome = store.borrowBook(bookId, user.id);
        const detail = outcome.ok
            ? `${user.username} has '${outcome.book.title}' until ${outcome.record.dueDate}`
            : `${user.username} refused on ${bookId}: ${outcome.reason}`;
        record('borrow', outcome.ok, detail);
        return outcome.ok;
    };

    borrow(alice, dune.id);
    borrow(alice, dune.id);
    borrow(alice, '1');
    borrow(alice, '2');          // Over the cap
    borrow(bob, dune.id);        // Both copies out
    borrow(bob, '3');
    logReport(store);

    // ========== STEP 4: Delete while on loan ==========
    logSection('STEP 4: Deleting a title that is on loan');
    const deleted = store.removeBook(dune.id);
    record('delete', deleted.ok, deleted.ok ? 'removed' : deleted.reason);

    // ========== STEP 5: Return frees a copy ==========
    logSection('STEP 5: Returning and re-lending');
    const returned = store.returnBook(dune.id, alice.id);
    record('return', returned.ok, returned.ok ? `'${returned.title}' back on the shelf` : returned.reason);
    borrow(bob, dune.id);

    // ========== STEP 6: Time passes ==========
    logSection(`STEP 6: ${store.loanPeriodDays + DAYS_PAST_DUE} days later`);
    offsetDays = store.loanPeriodDays + DAYS_PAST_DUE;

    const reloaded = createLibraryStore({ dataFile: options.dataFile, clock });
    const reloadedLoans = reloaded.listLoans().length;
    record('reload', reloadedLoans === store.listLoans().length, `${reloadedLoans} loans restored from disk`);

    logSection('LIBRARY SIMULATION - FINAL REPORT');
    const report = logReport(reloaded);

    return { steps, report, reloadedLoans };
}
