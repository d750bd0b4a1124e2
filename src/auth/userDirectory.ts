// src/auth/userDirectory.ts

import { randomUUID } from 'node:crypto';
import { type User, UserRole } from '../models/User';

/**
 * Accounts present at every start
 */
export const DEFAULT_ACCOUNTS: ReadonlyArray<Omit<User, 'id'>> = [
    { username: 'admin', password: '123', role: UserRole.STAFF },
    { username: 'jane_doe', password: '456', role: UserRole.CUSTOMER }
];

export type RegistrationOutcome =
    | { ok: true; user: User }
    | { ok: false; reason: 'USERNAME_TAKEN' | 'INVALID_ARGUMENT' };

export type LoginOutcome =
    | { ok: true; user: User }
    | { ok: false; reason: 'INVALID_CREDENTIALS' };

/**
 * In-memory account list
 *
 * Lives for the process only: registered accounts vanish on restart,
 * the default accounts are recreated with fresh ids.
 */
export class UserDirectory {
    private users: User[];

    constructor(seed: ReadonlyArray<Omit<User, 'id'>> = DEFAULT_ACCOUNTS) {
        this.users = seed.map(account => ({ id: randomUUID(), ...account }));
    }

    /**
     * Usernames are compared and stored without surrounding whitespace
     */
    findByUsername(username: string): User | undefined {
        const name = username.trim();
        return this.users.find(user => user.username === name);
    }

    findById(id: string): User | undefined {
        return this.users.find(user => user.id === id);
    }

    /**
     * Create an account; usernames are unique across roles
     */
    register(username: string, password: string, role: UserRole): RegistrationOutcome {
        const name = username.trim();
        if (!name) {
            return { ok: false, reason: 'INVALID_ARGUMENT' };
        }
        if (this.findByUsername(name)) {
            return { ok: false, reason: 'USERNAME_TAKEN' };
        }

        const user: User = { id: randomUUID(), username: name, password, role };
        this.users.push(user);
        return { ok: true, user };
    }

    /**
     * Succeeds only when username, password and role all match
     */
    login(username: string, password: string, role: UserRole): LoginOutcome {
        const user = this.findByUsername(username);
        if (!user || user.password !== password || user.role !== role) {
            return { ok: false, reason: 'INVALID_CREDENTIALS' };
        }
        return { ok: true, user };
    }

    list(): User[] {
        return [...this.users];
    }

    listCustomers(): User[] {
        return this.users.filter(user => user.role === UserRole.CUSTOMER);
    }
}
