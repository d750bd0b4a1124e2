import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionController } from '../sessionController';
import { type Prompt, PromptInterruptedError } from '../prompt';
import { type LibraryStore, createLibraryStore } from '../../engine/libraryStore';
import { UserDirectory } from '../../auth/userDirectory';
import { SessionContext } from '../../session/sessionContext';

const NOW = new Date(2025, 0, 10, 12, 0, 0);
const DUE = '2025-01-17';

type Answer = string | PromptInterruptedError;

/**
 * Answers questions from a fixed script; running out behaves like end of input
 */
class ScriptedPrompt implements Prompt {
    readonly questions: string[] = [];

    constructor(private readonly answers: Answer[]) {}

    async ask(question: string): Promise<string> {
        this.questions.push(question);
        const next = this.answers.shift();
        if (next === undefined) {
            throw new PromptInterruptedError('closed');
        }
        if (next instanceof PromptInterruptedError) {
            throw next;
        }
        return next;
    }

    close(): void {}
}

describe('SessionController', () => {
    let dir: string;
    let dataFile: string;
    let store: LibraryStore;
    let users: UserDirectory;
    let session: SessionContext;
    let lines: string[];

    const idOf = (username: string): string => {
        const user = users.findByUsername(username);
        if (!user) {
            throw new Error(`no user ${username}`);
        }
        return user.id;
    };

    const run = async (answers: Answer[]): Promise<ScriptedPrompt> => {
        const prompt = new ScriptedPrompt(answers);
        const controller = new SessionController({
            store,
            users,
            session,
            prompt,
            output: line => lines.push(line)
        });
        await controller.run();
        return prompt;
    };

    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'library-cli-'));
        dataFile = path.join(dir, 'library_data.json');
        store = createLibraryStore({ dataFile, clock: () => NOW });
        users = new UserDirectory();
        session = new SessionContext();
        lines = [];
    });

    afterEach(() => {
        vi.restoreAllMocks();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('role menu', () => {
        it('saves and says goodbye on exit', async () => {
            await run(['3']);

            expect(lines[lines.length - 1]).toBe('Exiting application. Goodbye!');
            expect(fs.existsSync(dataFile)).toBe(true);
        });

        it('re-prompts on an invalid choice', async () => {
            const prompt = await run(['9', '3']);

            expect(lines).toContain('[ERROR] Invalid choice. Please select 1, 2, or 3.');
            expect(prompt.questions).toEqual(['Enter choice: ', 'Enter choice: ']);
        });

        it('treats end of input as exit', async () => {
            await run([]);

            expect(lines[lines.length - 1]).toBe('Exiting application. Goodbye!');
        });

        it('goes back from the access menu', async () => {
            const prompt = await run(['2', '3', '3']);

            expect(lines).toContain('--- CUSTOMER ACCESS ---');
            expect(prompt.questions).toHaveLength(3);
            expect(session.current).toBeNull();
        });
    });

    describe('customer', () => {
        it('logs in, borrows, lists and logs out', async () => {
            await run(['2', '1', 'jane_doe', '456', '2', '3', '3', '5', '3']);

            expect(lines).toContain('[SUCCESS] Welcome, jane_doe!');
            expect(lines).toContain("[SUCCESS] You have successfully borrowed 'Moby Dick'.");
            expect(lines).toContain(`Please return it by ${DUE}.`);
            expect(lines).toContain('--- YOUR BORROWED BOOKS ---');
            expect(lines).toContain(`${'3'.padEnd(10)} | ${'Moby Dick'.padEnd(40)} | ${DUE}`);
            expect(lines).toContain('[INFO] Logged out successfully.');
            expect(store.activeLoanCount(idOf('jane_doe'))).toBe(1);
            expect(session.current).toBeNull();
        });

        it('rejects bad credentials', async () => {
            await run(['2', '1', 'jane_doe', 'wrong', '3']);

            expect(lines).toContain('[ERROR] Invalid credentials or user is not a customer.');
            expect(session.current).toBeNull();
        });

        it('does not let staff in through the customer door', async () => {
            await run(['2', '1', 'admin', '123', '3']);

            expect(lines).toContain('[ERROR] Invalid credentials or user is not a customer.');
        });

        it('registers a new customer and signs them in', async () => {
            await run(['2', '2', 'jane_doe', '', 'sam', 'pw', '6']);

            expect(lines).toContain('[ERROR] Username already exists. Try again.');
            expect(lines).toContain('[ERROR] Username cannot be empty.');
            expect(lines).toContain('[SUCCESS] Customer sam registered and logged in successfully!');
            expect(lines).toContain('Logged in as: sam');
            expect(lines[lines.length - 1]).toBe('Exiting application. Goodbye!');
        });

        it('trims the username on register and login', async () => {
            await run(['2', '2', ' bob ', 'pw', '5', '2', '1', 'bob', 'pw', '6']);

            expect(lines).toContain('[SUCCESS] Customer bob registered and logged in successfully!');
            expect(lines).toContain('[SUCCESS] Welcome, bob!');
            expect(users.findByUsername('bob')?.username).toBe('bob');
        });

        it('treats a padded existing username as taken', async () => {
            await run(['2', '2', 'jane_doe ', 'sam', 'pw', '6']);

            expect(lines).toContain('[ERROR] Username already exists. Try again.');
            expect(users.list()).toHaveLength(3);
        });

        it('re-prompts for an unknown id and cancels on q', async () => {
            await run(['2', '1', 'jane_doe', '456', '2', 'nope', 'Q', '6']);

            expect(lines).toContain("[ERROR] Invalid Book ID. Please enter a valid ID or 'q'.");
            expect(store.listLoans()).toEqual([]);
        });

        it('reports the borrowing limit', async () => {
            const jane = idOf('jane_doe');
            store.borrowBook('1', jane);
            store.borrowBook('1', jane);
            store.borrowBook('2', jane);

            await run(['2', '1', 'jane_doe', '456', '2', '2', '6']);

            expect(lines).toContain('[ERROR] You have reached the maximum borrowing limit (3 books). Please return a book first.');
            expect(store.activeLoanCount(jane)).toBe(3);
        });

        it('reports a title with no free copy', async () => {
            store.borrowBook('3', 'someone-else');

            await run(['2', '1', 'jane_doe', '456', '2', '3', '6']);

            expect(lines).toContain('--- BOOKS AVAILABLE TO BORROW ---');
            expect(lines).toContain("[ERROR] All copies of 'Moby Dick' are currently borrowed.");
        });

        it('returns a borrowed book', async () => {
            store.borrowBook('2', idOf('jane_doe'));

            await run(['2', '1', 'jane_doe', '456', '4', '2', '6']);

            expect(lines).toContain("[SUCCESS] '1984' has been successfully returned. Thank you!");
            expect(store.listLoans()).toEqual([]);
        });

        it('reports a return for a book the customer does not hold', async () => {
            store.borrowBook('2', idOf('jane_doe'));

            await run(['2', '1', 'jane_doe', '456', '4', '1', '6']);

            expect(lines).toContain('[ERROR] You do not have a record for Book ID 1.');
            expect(store.listLoans()).toHaveLength(1);
        });

        it('skips the id question when nothing is borrowed', async () => {
            const prompt = await run(['2', '1', 'jane_doe', '456', '4', '6']);

            expect(lines).toContain('[INFO] You currently have no books borrowed.');
            expect(prompt.questions).not.toContain("Enter ID of the book to return (or 'q' to cancel): ");
        });

        it('logs out for safety on Ctrl+C', async () => {
            await run(['2', '1', 'jane_doe', '456', new PromptInterruptedError('sigint'), '3']);

            expect(lines).toContain('Logging out for safety.');
            expect(session.current).toBeNull();
            expect(lines[lines.length - 1]).toBe('Exiting application. Goodbye!');
        });

        it('rejects an invalid menu choice', async () => {
            await run(['2', '1', 'jane_doe', '456', '7', '6']);

            expect(lines).toContain('[ERROR] Invalid choice. Please select 1-6.');
        });
    });

    describe('staff', () => {
        it('prints the report for the sample catalog', async () => {
            await run(['1', '1', 'admin', '123', '3', '4', '3']);

            expect(lines).toContain('[SUCCESS] Welcome back, admin!');
            expect(lines).toContain('Total Unique Book Titles: 3');
            expect(lines).toContain('Total Physical Copies in Catalog: 9');
            expect(lines).toContain('Total Books Currently Issued: 0');
            expect(lines).toContain('Total Overdue Books: 0');
        });

        it('registers, adds a book after re-prompting for copies, searches and exits', async () => {
            await run([
                '1', '2', 'admin', 'ops', 'pw',
                '2',
                '2', 'Dune', 'Frank Herbert', 'zero', '0', '2',
                '4', 'dune',
                '6'
            ]);

            expect(lines).toContain('[SUCCESS] Staff member ops registered and logged in successfully!');
            expect(lines.filter(line => line === '[ERROR] Please enter a positive whole number for copies.')).toHaveLength(2);
            expect(lines).toContain("[SUCCESS] Book 'Dune' by Frank Herbert added to the library.");
            expect(lines).toContain("--- SEARCH RESULTS for 'dune' ---");
            expect(lines[lines.length - 1]).toBe('Exiting application. Goodbye!');
            expect(createLibraryStore({ dataFile }).searchBooks('Dune')).toHaveLength(1);
        });

        it('reports an empty search', async () => {
            await run(['1', '1', 'admin', '123', '2', '4', 'tolstoy', '6']);

            expect(lines).toContain("[INFO] No books found matching 'tolstoy'.");
        });

        it('deletes an idle title and refuses one on loan', async () => {
            store.borrowBook('1', 'reader');

            await run(['1', '1', 'admin', '123', '2', '3', 'nope', '1', '3', '3', '5', '4', '3']);

            expect(lines).toContain("[ERROR] Invalid Book ID. Please enter a valid ID or 'q'.");
            expect(lines).toContain("[ERROR] Cannot delete 'The Great Gatsby'. Copies are currently borrowed.");
            expect(lines).toContain("[SUCCESS] Book 'Moby Dick' has been permanently removed.");
            expect(store.listAllBooks().map(entry => entry.book.id)).toEqual(['1', '2']);
        });

        it('lists customers with their loans', async () => {
            const jane = idOf('jane_doe');
            store.borrowBook('2', jane);

            await run(['1', '1', 'admin', '123', '1', '5']);

            expect(lines).toContain('--- REGISTERED CUSTOMERS AND BORROWED BOOKS ---');
            expect(lines).toContain(`Customer: jane_doe (ID: ${jane.slice(0, 8)}...)`);
            expect(lines).toContain(`    -> '1984' (Due: ${DUE})`);
        });

        it('returns to the staff menu on Ctrl+C inside book management', async () => {
            await run(['1', '1', 'admin', '123', '2', new PromptInterruptedError('sigint'), '4', '3']);

            expect(lines).toContain('Returning to Staff Menu...');
            expect(lines).toContain('[INFO] Logged out successfully.');
        });

        it('logs out and exits when input ends in the staff menu', async () => {
            await run(['1', '1', 'admin', '123']);

            expect(lines).toContain('Logging out for safety.');
            expect(lines[lines.length - 1]).toBe('Exiting application. Goodbye!');
        });

        it('shows the catalog', async () => {
            await run(['1', '1', 'admin', '123', '2', '1', '6']);

            expect(lines).toContain('--- LIBRARY BOOK CATALOG ---');
            expect(lines).toContain(`${'2'.padEnd(10)} | ${'1984'.padEnd(40)} | ${'George Orwell'.padEnd(25)} | ${'5'.padEnd(8)} | 5`);
        });
    });
});
