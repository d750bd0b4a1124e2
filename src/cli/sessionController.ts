// src/cli/sessionController.ts

import type { LibraryStore } from '../engine/libraryStore';
import type { UserDirectory } from '../auth/userDirectory';
import type { SessionContext } from '../session/sessionContext';
import { type User, UserRole } from '../models/User';
import { isLibraryError } from '../errors';
import { type Output, type Prompt, consoleOutput, isPromptInterrupted } from './prompt';
import { renderAvailable, renderCatalog, renderLoans, renderSearchResults } from './render';

export interface SessionControllerDeps {
    store: LibraryStore;
    users: UserDirectory;
    session: SessionContext;
    prompt: Prompt;
    output?: Output;
}

/**
 * How a role menu ended
 */
type MenuExit = 'logout' | 'exit';

const CANCEL = 'q';
const POSITIVE_WHOLE_NUMBER = /^\s*\d+\s*$/;

function roleLabel(role: UserRole): string {
    return role === UserRole.STAFF ? 'Staff' : 'Customer';
}

/**
 * Console session controller - input mapping only
 *
 * Walks the role menu → login/register → role main menu loop. Every
 * lending decision is delegated to LibraryStore; the signed-in user is
 * read from the SessionContext it was given.
 */
export class SessionController {
    private readonly store: LibraryStore;
    private readonly users: UserDirectory;
    private readonly session: SessionContext;
    private readonly prompt: Prompt;
    private readonly print: Output;

    constructor(deps: SessionControllerDeps) {
        this.store = deps.store;
        this.users = deps.users;
        this.session = deps.session;
        this.prompt = deps.prompt;
        this.print = deps.output ?? consoleOutput;
    }

    /**
     * Run until the user exits (or input ends at the role menu)
     */
    async run(): Promise<void> {
        for (;;) {
            const user = this.session.current;
            if (user) {
                const result = user.role === UserRole.STAFF
                    ? await this.staffMainMenu()
                    : await this.customerMainMenu();
                if (result === 'exit') {
                    this.exit();
                    return;
                }
                continue;
            }

            this.print('');
            this.print('=============== LIBRARY MANAGEMENT SYSTEM ===============');
            this.print('Please identify your role:');
            this.print('1. Staff Member');
            this.print('2. Customer');
            this.print('3. Exit Application');
            this.print('=======================================================');

            const choice = await this.askOr('Enter choice: ', '3');
            switch (choice) {
                case '1':
                    await this.accessMenu(UserRole.STAFF);
                    break;
                case '2':
                    await this.accessMenu(UserRole.CUSTOMER);
                    break;
                case '3':
                    this.exit();
                    return;
                default:
                    this.print('[ERROR] Invalid choice. Please select 1, 2, or 3.');
            }
        }
    }

    // ========== Access ==========

    private async accessMenu(role: UserRole): Promise<void> {
        const label = roleLabel(role);
        this.print('');
        this.print(`--- ${label.toUpperCase()} ACCESS ---`);
        this.print(`1. Returning ${label} (Login)`);
        this.print(`2. New ${label} (Register)`);
        this.print('3. Back to Main Menu');

        try {
            const choice = await this.prompt.ask('Enter choice: ');
            if (choice === '1') {
                await this.login(role);
            } else if (choice === '2') {
                await this.register(role);
            }
        } catch (error) {
            if (!isPromptInterrupted(error)) {
                throw error;
            }
        }
    }

    private async login(role: UserRole): Promise<void> {
        this.print('');
        this.print(`--- ${roleLabel(role).toUpperCase()} LOGIN ---`);
        const username = await this.prompt.ask('Enter Username: ');
        const password = await this.prompt.ask('Enter Password: ');

        const outcome = this.users.login(username, password, role);
        if (!outcome.ok) {
            this.print(`[ERROR] Invalid credentials or user is not a ${role === UserRole.STAFF ? 'staff member' : 'customer'}.`);
            return;
        }

        const { username: name } = outcome.user;
        this.session.signIn(outcome.user);
        this.print(role === UserRole.STAFF ? `[SUCCESS] Welcome back, ${name}!` : `[SUCCESS] Welcome, ${name}!`);
    }

    private async register(role: UserRole): Promise<void> {
        this.print('');
        this.print(`--- ${roleLabel(role).toUpperCase()} REGISTRATION ---`);

        let username = '';
        for (;;) {
            username = await this.prompt.ask('Enter New Username: ');
            if (!username.trim()) {
                this.print('[ERROR] Username cannot be empty.');
            } else if (this.users.findByUsername(username)) {
                this.print('[ERROR] Username already exists. Try again.');
            } else {
                break;
            }
        }

        const password = await this.prompt.ask('Create Password: ');
        const outcome = this.users.register(username, password, role);
        if (!outcome.ok) {
            this.print(`[ERROR] Could not register ${username}.`);
            return;
        }

        const { username: name } = outcome.user;
        this.session.signIn(outcome.user);
        this.print(role === UserRole.STAFF
            ? `[SUCCESS] Staff member ${name} registered and logged in successfully!`
            : `[SUCCESS] Customer ${name} registered and logged in successfully!`);
    }

    // ========== Staff ==========

    private async staffMainMenu(): Promise<MenuExit> {
        for (;;) {
            const user = this.session.requireRole(UserRole.STAFF);
            this.print('');
            this.print('--- STAFF MAIN MENU ---');
            this.print(`Logged in as: ${user.username}`);
            this.print('1. Check Customer List & Borrowing Records');
            this.print('2. Access Book Database (Add/Delete/Search)');
            this.print('3. Generate Library Report');
            this.print('4. Logout');
            this.print('5. Exit Application');

            try {
                const choice = await this.prompt.ask('Enter choice: ');
                switch (choice) {
                    case '1':
                        this.showCustomerLoans();
                        break;
                    case '2':
                        if (await this.bookManagementMenu() === 'exit') {
                            return 'exit';
                        }
                        break;
                    case '3':
                        this.showReport();
                        break;
                    case '4':
                        this.logout();
                        return 'logout';
                    case '5':
                        return 'exit';
                    default:
                        this.print('[ERROR] Invalid choice. Please select 1-5.');
                }
            } catch (error) {
                if (!isPromptInterrupted(error)) {
                    throw error;
                }
                this.print('Logging out for safety.');
                this.store.save();
                this.session.signOut();
                return 'logout';
            }
        }
    }

    /**
     * @returns 'exit' when the user chose to leave the application
     */
    private async bookManagementMenu(): Promise<'back' | 'exit'> {
        for (;;) {
            this.print('');
            this.print('--- BOOK MANAGEMENT MENU ---');
            this.print('1. View Full Book Catalog');
            this.print('2. Add New Book');
            this.print('3. Delete Book');
            this.print('4. Search Books');
            this.print('5. Return to Staff Menu');
            this.print('6. Exit Application');

            try {
                const choice = await this.prompt.ask('Enter choice: ');
                switch (choice) {
                    case '1':
                        this.showCatalog();
                        break;
                    case '2':
                        await this.addBook();
                        break;
                    case '3':
                        await this.deleteBook();
                        break;
                    case '4':
                        await this.searchBooks();
                        break;
                    case '5':
                        return 'back';
                    case '6':
                        return 'exit';
                    default:
                        this.print('[ERROR] Invalid choice. Please select 1-6.');
                }
            } catch (error) {
                if (!isPromptInterrupted(error)) {
                    throw error;
                }
                this.print('Returning to Staff Menu...');
                return 'back';
            }
        }
    }

    private showCatalog(): void {
        const entries = this.store.listAllBooks();
        if (entries.length === 0) {
            this.print('[INFO] The main library catalog is empty.');
            return;
        }

        this.print('--- LIBRARY BOOK CATALOG ---');
        this.printLines(renderCatalog(entries));
    }

    private async addBook(): Promise<void> {
        this.print('--- ADD A NEW BOOK ---');
        const title = await this.prompt.ask('Enter Book Title: ');
        const author = await this.prompt.ask('Enter Author Name: ');

        let copies = 0;
        while (copies <= 0) {
            const raw = await this.prompt.ask('Enter Number of Copies to Add: ');
            copies = POSITIVE_WHOLE_NUMBER.test(raw) ? Number(raw.trim()) : 0;
            if (copies <= 0) {
                this.print('[ERROR] Please enter a positive whole number for copies.');
            }
        }

        try {
            const book = this.store.addBook(title, author, copies);
            this.print(`[SUCCESS] Book '${book.title}' by ${book.author} added to the library.`);
        } catch (error) {
            if (!isLibraryError(error)) {
                throw error;
            }
            this.print(`[ERROR] ${error.message}.`);
        }
    }

    private async deleteBook(): Promise<void> {
        this.showCatalog();
        if (this.store.listAllBooks().length === 0) {
            return;
        }

        const id = await this.askForBookId('delete');
        if (id === null) {
            return;
        }

        const outcome = this.store.removeBook(id);
        if (outcome.ok) {
            this.print(`[SUCCESS] Book '${outcome.book.title}' has been permanently removed.`);
        } else if (outcome.reason === 'BOOK_ON_LOAN') {
            this.print(`[ERROR] Cannot delete '${outcome.book.title}'. Copies are currently borrowed.`);
        } else {
            this.print(`[ERROR] Book with ID ${id} not found.`);
        }
    }

    private async searchBooks(): Promise<void> {
        this.print('--- BOOK SEARCH ---');
        const query = await this.prompt.ask(`Enter Title or Author to search (or '${CANCEL}' to cancel): `);
        if (query.toLowerCase() === CANCEL) {
            return;
        }

        const results = this.store.searchBooks(query);
        if (results.length === 0) {
            this.print(`[INFO] No books found matching '${query}'.`);
            return;
        }

        this.print(`--- SEARCH RESULTS for '${query}' ---`);
        this.printLines(renderSearchResults(results));
    }

    private showReport(): void {
        const report = this.store.generateReport();
        this.print('--- LIBRARY REPORT ---');
        this.print(`Total Unique Book Titles: ${report.totalUniqueBooks}`);
        this.print(`Total Physical Copies in Catalog: ${report.totalCopies}`);
        this.print(`Total Books Currently Issued: ${report.totalIssued}`);
        this.print('-'.repeat(30));
        this.print(`Total Overdue Books: ${report.overdue}`);
        this.print('-'.repeat(30));
    }

    private showCustomerLoans(): void {
        const customers = this.users.listCustomers();
        if (customers.length === 0) {
            this.print('[INFO] No registered customers found.');
            return;
        }

        this.print('--- REGISTERED CUSTOMERS AND BORROWED BOOKS ---');
        for (const { user, loans } of this.store.listAllUsersWithLoans(customers)) {
            this.print(`Customer: ${user.username} (ID: ${user.id.slice(0, 8)}...)`);
            if (loans.length === 0) {
                this.print('  - No books currently borrowed.');
                continue;
            }
            this.print('  - Currently Borrowing:');
            for (const loan of loans) {
                this.print(`    -> '${loan.title}' (Due: ${loan.dueDate})${loan.overdue ? ' OVERDUE' : ''}`);
            }
        }
        this.print('-'.repeat(50));
    }

    // ========== Customer ==========

    private async customerMainMenu(): Promise<MenuExit> {
        for (;;) {
            const user = this.session.requireRole(UserRole.CUSTOMER);
            this.print('');
            this.print('--- CUSTOMER MAIN MENU ---');
            this.print(`Logged in as: ${user.username}`);
            this.print('1. View Available Books');
            this.print('2. Borrow a Book');
            this.print('3. View My Borrowed Books');
            this.print('4. Return a Book');
            this.print('5. Logout');
            this.print('6. Exit Application');

            try {
                const choice = await this.prompt.ask('Enter choice: ');
                switch (choice) {
                    case '1':
                        this.showAvailable();
                        break;
                    case '2':
                        await this.borrowBook(user);
                        break;
                    case '3':
                        this.showMyBooks(user);
                        break;
                    case '4':
                        await this.returnBook(user);
                        break;
                    case '5':
                        this.logout();
                        return 'logout';
                    case '6':
                        return 'exit';
                    default:
                        this.print('[ERROR] Invalid choice. Please select 1-6.');
                }
            } catch (error) {
                if (!isPromptInterrupted(error)) {
                    throw error;
                }
                this.print('Logging out for safety.');
                this.store.save();
                this.session.signOut();
                return 'logout';
            }
        }
    }

    private showAvailable(): void {
        const entries = this.store.listAvailableBooks();
        if (entries.length === 0) {
            this.print('[INFO] No books are currently available to borrow.');
            return;
        }

        this.print('--- BOOKS AVAILABLE TO BORROW ---');
        this.printLines(renderAvailable(entries));
    }

    private async borrowBook(user: User): Promise<void> {
        this.showAvailable();

        const id = await this.askForBookId('borrow');
        if (id === null) {
            return;
        }

        const outcome = this.store.borrowBook(id, user.id);
        if (outcome.ok) {
            this.print(`[SUCCESS] You have successfully borrowed '${outcome.book.title}'.`);
            this.print(`Please return it by ${outcome.record.dueDate}.`);
            return;
        }

        switch (outcome.reason) {
            case 'LOAN_LIMIT_REACHED':
                this.print(`[ERROR] You have reached the maximum borrowing limit (${this.store.maxActiveLoans} books). Please return a book first.`);
                break;
            case 'NO_COPIES_AVAILABLE':
                this.print(`[ERROR] All copies of '${outcome.book?.title ?? id}' are currently borrowed.`);
                break;
            case 'BOOK_NOT_FOUND':
                this.print(`[ERROR] Book with ID ${id} not found.`);
                break;
        }
    }

    private showMyBooks(user: User): void {
        const loans = this.store.listLoansForUser(user.id);
        if (loans.length === 0) {
            this.print('[INFO] You currently have no books borrowed.');
            return;
        }

        this.print('--- YOUR BORROWED BOOKS ---');
        this.printLines(renderLoans(loans));
    }

    private async returnBook(user: User): Promise<void> {
        this.showMyBooks(user);
        if (this.store.activeLoanCount(user.id) === 0) {
            return;
        }

        const id = await this.askForBookId('return');
        if (id === null) {
            return;
        }

        const outcome = this.store.returnBook(id, user.id);
        if (outcome.ok) {
            this.print(`[SUCCESS] '${outcome.title}' has been successfully returned. Thank you!`);
        } else {
            this.print(`[ERROR] You do not have a record for Book ID ${id}.`);
        }
    }

    // ========== Helpers ==========

    /**
     * Ask until a catalog id or the cancel key is entered
     *
     * @returns The id, or null when cancelled
     */
    private async askForBookId(action: string): Promise<string | null> {
        for (;;) {
            const answer = await this.prompt.ask(`Enter ID of the book to ${action} (or '${CANCEL}' to cancel): `);
            if (answer.toLowerCase() === CANCEL) {
                return null;
            }
            if (this.store.hasBook(answer)) {
                return answer;
            }
            this.print(`[ERROR] Invalid Book ID. Please enter a valid ID or '${CANCEL}'.`);
        }
    }

    private async askOr(question: string, fallback: string): Promise<string> {
        try {
            return await this.prompt.ask(question);
        } catch (error) {
            if (!isPromptInterrupted(error)) {
                throw error;
            }
            return fallback;
        }
    }

    private logout(): void {
        this.store.save();
        this.session.signOut();
        this.print('[INFO] Logged out successfully.');
    }

    private exit(): void {
        this.store.save();
        this.print('Exiting application. Goodbye!');
    }

    private printLines(lines: string[]): void {
        for (const line of lines) {
            this.print(line);
        }
    }
}
