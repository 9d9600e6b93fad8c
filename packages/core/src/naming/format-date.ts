import type { DateFormat } from '../types/index.js';

const FORMAT_TOKENS = /YYYY|MM|DD/g;

/**
 * Render a date in one of the naming-pattern formats (UTC fields).
 *
 * @example formatDate(new Date(Date.UTC(2023, 3, 9)), 'MM-DD-YYYY') // '04-09-2023'
 */
export function formatDate(date: Date, format: DateFormat): string {
    return format.replace(FORMAT_TOKENS, token => {
        switch (token) {
            case 'YYYY':
                return String(date.getUTCFullYear()).padStart(4, '0');
            case 'MM':
                return String(date.getUTCMonth() + 1).padStart(2, '0');
            default:
                return String(date.getUTCDate()).padStart(2, '0');
        }
    });
}
