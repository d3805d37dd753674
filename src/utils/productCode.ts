/**
 * Canonical HSN/SAC form: digits only, 4 to 8 long. Separators OCR tends to
 * keep ("9403.50.00", "9403 5000") are dropped. Returns null when the text
 * cannot be an HSN or SAC code.
 */
export function normalizeProductCode(raw: string | number): string | null {
    const text = String(raw).replace(/[\s.\-]/g, '');
    return /^\d{4,8}$/.test(text) ? text : null;
}

export function normalizeGstin(raw: string): string {
    return raw.replace(/\s+/g, '').toUpperCase();
}
