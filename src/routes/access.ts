// src/routes/access.ts

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { UserDirectory } from '../auth/userDirectory';
import { type User, UserRole } from '../models/User';

/**
 * Header carrying the id of the acting account
 */
export const ACTOR_HEADER = 'x-user-id';

/**
 * Only a signed-up staff account may pass
 * 401 without a known actor, 403 for any other role
 */
export function requireStaff(users: UserDirectory): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const actorId = req.header(ACTOR_HEADER);
        const actor = actorId ? users.findById(actorId) : undefined;

        if (!actor) {
            res.status(401).json({ error: 'AUTHENTICATION_REQUIRED' });
            return;
        }
        if (actor.role !== UserRole.STAFF) {
            res.status(403).json({ error: 'STAFF_ONLY' });
            return;
        }

        next();
    };
}

/**
 * Look up the customer a loan request is for
 *
 * @returns The customer, or null once 404 (unknown id) or 403 (not a customer) has been sent
 */
export function resolveCustomer(users: UserDirectory, userId: string, res: Response): User | null {
    const user = users.findById(userId);
    if (!user) {
        res.status(404).json({ error: 'USER_NOT_FOUND' });
        return null;
    }
    if (user.role !== UserRole.CUSTOMER) {
        res.status(403).json({ error: 'CUSTOMERS_ONLY' });
        return null;
    }
    return user;
}
