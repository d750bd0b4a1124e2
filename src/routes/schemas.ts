// src/routes/schemas.ts

import { z } from 'zod';
import type { Response } from 'express';
import { UserRole } from '../models/User';

export const AddBookBodySchema = z.object({
    title: z.string().trim().min(1),
    author: z.string().trim().min(1),
    copies: z.number().int().positive()
});

export const LoanBodySchema = z.object({
    bookId: z.string().min(1),
    userId: z.string().min(1)
});

export const CredentialsBodySchema = z.object({
    username: z.string().trim().min(1),
    password: z.string(),
    role: z.nativeEnum(UserRole)
});

/**
 * Parse a request body or answer 400 with the issues
 *
 * @returns Parsed body, or null once the 400 has been sent
 */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, res: Response): T | null {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        res.status(400).json({
            error: 'Invalid request body',
            issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        });
        return null;
    }
    return parsed.data;
}
