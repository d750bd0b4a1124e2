// src/app.ts

import express from 'express';
import type { LibraryStore } from './engine/libraryStore';
import type { UserDirectory } from './auth/userDirectory';
import { createBookRoutes } from './routes/bookRoutes';
import { createLoanRoutes } from './routes/loanRoutes';
import { createAuthRoutes } from './routes/authRoutes';
import { logError } from './telemetry/logger';

export interface AppDeps {
    store: LibraryStore;
    users: UserDirectory;
}

/**
 * Express application setup
 *
 * Shares the store and user directory with whoever created them:
 * - store: catalog, loans and the data file
 * - users: in-memory accounts
 */
export function createApp({ store, users }: AppDeps): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/books', createBookRoutes(store, users));
    app.use('/loans', createLoanRoutes(store, users));
    app.use('/auth', createAuthRoutes(users));

    app.get('/report', (_req, res) => {
        res.json({ report: store.generateReport() });
    });

    // Health check
    app.get('/health', (_req, res) => {
        const report = store.generateReport();
        res.json({
            status: 'healthy',
            books: report.totalUniqueBooks,
            loans: report.totalIssued
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        logError(`Unhandled request error: ${err.message}`);
        res.status(500).json({ error: err.message });
    });

    return app;
}
