// src/routes/loanRoutes.ts

import { Router, type Request, type Response } from 'express';
import type { BorrowFailure, LibraryStore } from '../engine/libraryStore';
import type { UserDirectory } from '../auth/userDirectory';
import { resolveCustomer } from './access';
import { LoanBodySchema, parseBody } from './schemas';

const BORROW_FAILURE_STATUS: Record<BorrowFailure, number> = {
    LOAN_LIMIT_REACHED: 409,
    BOOK_NOT_FOUND: 404,
    NO_COPIES_AVAILABLE: 409
};

/**
 * Loan routes - HTTP mapping only
 * Lending rules live in LibraryStore; only registered customers borrow and return
 */
export function createLoanRoutes(store: LibraryStore, users: UserDirectory): Router {
    const router = Router();

    /**
     * Borrow one copy
     * POST /loans/borrow
     * Body: { bookId, userId }
     */
    router.post('/borrow', (req: Request, res: Response) => {
        const body = parseBody(LoanBodySchema, req.body, res);
        if (!body) {
            return;
        }
        const customer = resolveCustomer(users, body.userId, res);
        if (!customer) {
            return;
        }

        const outcome = store.borrowBook(body.bookId, customer.id);
        if (!outcome.ok) {
            res.status(BORROW_FAILURE_STATUS[outcome.reason]).json({ error: outcome.reason });
            return;
        }

        res.status(201).json({ loan: outcome.record, book: outcome.book });
    });

    /**
     * Return one copy
     * POST /loans/return
     * Body: { bookId, userId }
     */
    router.post('/return', (req: Request, res: Response) => {
        const body = parseBody(LoanBodySchema, req.body, res);
        if (!body) {
            return;
        }
        const customer = resolveCustomer(users, body.userId, res);
        if (!customer) {
            return;
        }

        const outcome = store.returnBook(body.bookId, customer.id);
        if (!outcome.ok) {
            res.status(404).json({ error: outcome.reason });
            return;
        }

        res.json({ loan: outcome.record, title: outcome.title });
    });

    /**
     * Every customer with their current loans
     * GET /loans/customers
     */
    router.get('/customers', (_req: Request, res: Response) => {
        res.json({ customers: store.listAllUsersWithLoans(users.listCustomers()) });
    });

    /**
     * One user's loans
     * GET /loans/users/:userId
     */
    router.get('/users/:userId', (req: Request, res: Response) => {
        const userId = req.params.userId;
        res.json({
            userId,
            activeLoans: store.activeLoanCount(userId),
            loans: store.listLoansForUser(userId)
        });
    });

    return router;
}
