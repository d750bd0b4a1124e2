// src/routes/authRoutes.ts

import { Router, type Request, type Response } from 'express';
import type { UserDirectory } from '../auth/userDirectory';
import { toPublicUser } from '../models/User';
import { CredentialsBodySchema, parseBody } from './schemas';

/**
 * Account routes - responses never carry the password
 */
export function createAuthRoutes(users: UserDirectory): Router {
    const router = Router();

    /**
     * POST /auth/register
     * Body: { username, password, role }
     */
    router.post('/register', (req: Request, res: Response) => {
        const body = parseBody(CredentialsBodySchema, req.body, res);
        if (!body) {
            return;
        }

        const outcome = users.register(body.username, body.password, body.role);
        if (!outcome.ok) {
            res.status(outcome.reason === 'USERNAME_TAKEN' ? 409 : 400).json({ error: outcome.reason });
            return;
        }

        res.status(201).json({ user: toPublicUser(outcome.user) });
    });

    /**
     * POST /auth/login
     * Body: { username, password, role }
     */
    router.post('/login', (req: Request, res: Response) => {
        const body = parseBody(CredentialsBodySchema, req.body, res);
        if (!body) {
            return;
        }

        const outcome = users.login(body.username, body.password, body.role);
        if (!outcome.ok) {
            res.status(401).json({ error: outcome.reason });
            return;
        }

        res.json({ user: toPublicUser(outcome.user) });
    });

    return router;
}
