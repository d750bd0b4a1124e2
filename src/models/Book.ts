// src/models/Book.ts

/**
 * Book model - one catalog title and the number of copies the library owns
 *
 * Data only, no methods. Availability is derived by the store from loans.
 *
 * Invariant: id is unique across the catalog
 * Invariant: copies is a non-negative integer
 */
export interface Book {
    id: string;
    title: string;
    author: string;
    copies: number;   // Total owned copies, borrowed or not
}

/**
 * Book with availability computed against the current loan list
 */
export interface BookAvailability {
    book: Book;
    borrowed: number;
    available: number;   // copies - borrowed
}
