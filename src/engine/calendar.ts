// src/engine/calendar.ts

/**
 * Calendar-date helpers for due dates
 *
 * Pure functions - no side effects. Dates are local calendar days rendered
 * as YYYY-MM-DD, so plain string comparison orders them.
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

/**
 * Format a Date as its local calendar day
 */
export function toIsoDate(date: Date): string {
    return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

export function isIsoDate(value: string): boolean {
    const match = ISO_DATE.exec(value);
    if (!match) {
        return false;
    }

    const [, year, month, day] = match.map(Number);
    const candidate = new Date(year, month - 1, day);
    return candidate.getFullYear() === year && candidate.getMonth() === month - 1 && candidate.getDate() === day;
}

/**
 * Calendar day `days` after the day `from` falls on
 *
 * Works on the calendar, not on milliseconds, so DST shifts never move the result.
 */
export function addDays(from: Date, days: number): string {
    const day = new Date(from.getFullYear(), from.getMonth(), from.getDate());
    day.setDate(day.getDate() + days);
    return toIsoDate(day);
}

/**
 * True when the due date is strictly before today
 */
export function isOverdue(dueDate: string, today: string): boolean {
    return dueDate < today;
}
