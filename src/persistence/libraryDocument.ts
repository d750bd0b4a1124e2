// src/persistence/libraryDocument.ts

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Book } from '../models/Book';
import type { LoanRecord } from '../models/LoanRecord';
import { isIsoDate } from '../engine/calendar';
import { getErrorMessage } from '../errors';

// ============================================================================
// ON-DISK SHAPE
// ============================================================================

export const StoredBookSchema = z.object({
    id: z.string().min(1),
    title: z.string(),
    author: z.string(),
    copies: z.number().int().nonnegative()
});

export const StoredLoanSchema = z.object({
    user_id: z.string(),
    book_id: z.string(),
    due_date: z.string().refine(isIsoDate, { message: 'due_date must be a YYYY-MM-DD date' })
});

export const LibraryDocumentSchema = z.object({
    books: z.record(z.string(), StoredBookSchema).default({}),
    borrowed_records: z.array(StoredLoanSchema).default([])
});

export type LibraryDocument = z.infer<typeof LibraryDocumentSchema>;

/**
 * In-memory state the store restores from / snapshots into a document
 */
export interface LibrarySnapshot {
    books: Book[];       // Catalog insertion order
    loans: LoanRecord[];
}

export type ReadResult =
    | { status: 'missing' }
    | { status: 'ok'; snapshot: LibrarySnapshot }
    | { status: 'invalid'; error: string };

// ============================================================================
// CONVERSION
// ============================================================================

export function toDocument(snapshot: LibrarySnapshot): LibraryDocument {
    const books: LibraryDocument['books'] = {};
    for (const book of snapshot.books) {
        books[book.id] = { id: book.id, title: book.title, author: book.author, copies: book.copies };
    }

    return {
        books,
        borrowed_records: snapshot.loans.map(loan => ({
            user_id: loan.userId,
            book_id: loan.bookId,
            due_date: loan.dueDate
        }))
    };
}

export function fromDocument(document: LibraryDocument): LibrarySnapshot {
    return {
        books: Object.values(document.books).map(book => ({ ...book })),
        loans: document.borrowed_records.map(record => ({
            userId: record.user_id,
            bookId: record.book_id,
            dueDate: record.due_date
        }))
    };
}

/**
 * Validate an already-parsed JSON value against the document shape
 */
export function parseLibraryDocument(raw: unknown): ReadResult {
    const parsed = LibraryDocumentSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        return { status: 'invalid', error: `Malformed library document (${issues})` };
    }
    return { status: 'ok', snapshot: fromDocument(parsed.data) };
}

// ============================================================================
// FILE I/O
// ============================================================================

/**
 * Read and validate the document at filePath
 *
 * Never throws: a missing file and an unreadable or malformed one are
 * reported through the result.
 */
export function readLibraryDocument(filePath: string): ReadResult {
    if (!fs.existsSync(filePath)) {
        return { status: 'missing' };
    }

    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
        return { status: 'invalid', error: `Could not read ${filePath}: ${getErrorMessage(error)}` };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        return { status: 'invalid', error: `Could not parse ${filePath}: ${getErrorMessage(error)}` };
    }

    return parseLibraryDocument(raw);
}

/**
 * Overwrite the document at filePath with the snapshot
 *
 * Writes a sibling temp file first and renames it into place, so a crash
 * mid-write leaves the previous document intact. Throws on I/O failure.
 */
export function writeLibraryDocument(filePath: string, snapshot: LibrarySnapshot): void {
    const body = JSON.stringify(toDocument(snapshot), null, 4);
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);

    try {
        fs.writeFileSync(tempPath, body, 'utf8');
        fs.renameSync(tempPath, filePath);
    } catch (error) {
        fs.rmSync(tempPath, { force: true });
        throw error;
    }
}
