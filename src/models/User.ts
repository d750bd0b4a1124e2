// src/models/User.ts

/**
 * Account roles - each role sees its own menu
 */
export enum UserRole {
    STAFF = 'staff',        // Catalog management, reports
    CUSTOMER = 'customer'   // Borrow and return
}

/**
 * User model - held in memory only, never persisted with the library state
 *
 * Passwords are stored as entered.
 */
export interface User {
    id: string;
    username: string;
    password: string;
    role: UserRole;
}

export type PublicUser = Omit<User, 'password'>;

export function toPublicUser(user: User): PublicUser {
    return { id: user.id, username: user.username, role: user.role };
}
