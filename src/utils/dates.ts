const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Normalizes an invoice date to ISO `YYYY-MM-DD`.
 * Accepts DD/MM/YYYY, DD-MM-YYYY, DD.MM.YYYY (two-digit years are 20xx),
 * YYYY-MM-DD and DD-Mon-YYYY. Returns null for anything that is not a real
 * calendar date.
 */
export function normalizeDate(value: string | null | undefined): string | null {
    if (!value) return null;
    const text = value.trim();

    // YYYY-MM-DD (optionally followed by a time part)
    let match = text.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/);
    if (match) {
        return toIsoDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
    }

    // DD/MM/YYYY, DD-MM-YYYY, DD.MM.YYYY
    match = text.match(/^(\d{1,2})[./-](\d{1,2})[./-](\d{2}|\d{4})$/);
    if (match) {
        return toIsoDate(expandYear(match[3]), parseInt(match[2], 10), parseInt(match[1], 10));
    }

    // DD-Mon-YYYY, DD Mon YYYY
    match = text.match(/^(\d{1,2})[-\s]([A-Za-z]{3})[A-Za-z]*[-\s,]+(\d{4})$/);
    if (match) {
        const month = MONTHS.indexOf(match[2].toLowerCase()) + 1;
        if (month === 0) return null;
        return toIsoDate(parseInt(match[3], 10), month, parseInt(match[1], 10));
    }

    return null;
}

function expandYear(year: string): number {
    const parsed = parseInt(year, 10);
    return year.length === 2 ? 2000 + parsed : parsed;
}

function toIsoDate(year: number, month: number, day: number): string | null {
    if (month < 1 || month > 12 || day < 1) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }

    const mm = String(month).padStart(2, '0');
    const dd = String(day).padStart(2, '0');
    return `${year}-${mm}-${dd}`;
}
