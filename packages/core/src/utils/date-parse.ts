/**
 * Calendar date utilities.
 * All dates are UTC midnight.
 */

/**
 * Build a UTC date, rejecting impossible calendar dates (Feb 30, month 13).
 */
export function utcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
