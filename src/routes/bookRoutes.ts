// src/routes/bookRoutes.ts

import { Router, type Request, type Response } from 'express';
import type { LibraryStore } from '../engine/libraryStore';
import type { UserDirectory } from '../auth/userDirectory';
import { requireStaff } from './access';
import { AddBookBodySchema, parseBody } from './schemas';

/**
 * Book routes - HTTP mapping only
 * Catalog rules live in LibraryStore; changes need a staff actor
 */
export function createBookRoutes(store: LibraryStore, users: UserDirectory): Router {
    const router = Router();
    const staffOnly = requireStaff(users);

    /**
     * List or search the catalog
     * GET /books?q=<title or author>
     */
    router.get('/', (req: Request, res: Response) => {
        const query = typeof req.query.q === 'string' ? req.query.q : undefined;
        const books = query === undefined ? store.listAllBooks() : store.searchBooks(query);

        res.json({ books });
    });

    /**
     * Books with at least one free copy
     * GET /books/available
     */
    router.get('/available', (_req: Request, res: Response) => {
        res.json({ books: store.listAvailableBooks() });
    });

    /**
     * Add a title
     * POST /books
     * Body: { title, author, copies }
     * Header: x-user-id of a staff account
     */
    router.post('/', staffOnly, (req: Request, res: Response) => {
        const body = parseBody(AddBookBodySchema, req.body, res);
        if (!body) {
            return;
        }

        const book = store.addBook(body.title, body.author, body.copies);
        res.status(201).json({ book });
    });

    /**
     * Remove a title
     * DELETE /books/:id
     * Header: x-user-id of a staff account
     */
    router.delete('/:id', staffOnly, (req: Request, res: Response) => {
        const outcome = store.removeBook(req.params.id);

        if (outcome.ok) {
            res.json({ book: outcome.book, message: 'Book removed' });
            return;
        }

        if (outcome.reason === 'BOOK_ON_LOAN') {
            res.status(409).json({ error: 'Copies are currently borrowed', borrowed: outcome.borrowed });
            return;
        }

        res.status(404).json({ error: 'Book not found' });
    });

    return router;
}
