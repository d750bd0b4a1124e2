// src/session/sessionContext.ts

import type { User, UserRole } from '../models/User';
import { LibraryError } from '../errors';

/**
 * Who is signed in for the current console session
 *
 * Passed explicitly to the menus that need it; one instance per session.
 */
export class SessionContext {
    private user: User | null = null;

    get current(): User | null {
        return this.user;
    }

    get isLoggedIn(): boolean {
        return this.user !== null;
    }

    signIn(user: User): void {
        this.user = user;
    }

    signOut(): void {
        this.user = null;
    }

    /**
     * The signed-in user, provided they hold `role`
     *
     * @throws LibraryError NOT_AUTHORIZED otherwise
     */
    requireRole(role: UserRole): User {
        if (!this.user || this.user.role !== role) {
            throw new LibraryError(`A signed-in ${role} is required`, 'NOT_AUTHORIZED', { role });
        }
        return this.user;
    }
}
