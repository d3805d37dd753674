import { FieldValue, RawRecord } from '../types/invoice.js';
import { Fixed } from './fixedPoint.js';

const canonicalKey = (key: string): string => key.toLowerCase().replace(/[^a-z0-9]/g, '');

/**
 * Reads the first alias present in a raw record. Keys are matched ignoring
 * case and punctuation, so "HSN/SAC", "hsn_sac" and "hsnSac" are the same key.
 * null, undefined and blank strings count as missing.
 */
export function readField(record: RawRecord, aliases: readonly string[]): FieldValue<unknown> {
    const wanted = aliases.map(canonicalKey);

    for (const alias of wanted) {
        for (const [key, value] of Object.entries(record)) {
            if (canonicalKey(key) !== alias) continue;
            if (value === null || value === undefined) continue;
            if (typeof value === 'string' && value.trim() === '') continue;
            return { kind: 'present', value };
        }
    }

    return { kind: 'missing' };
}

export function asText(field: FieldValue<unknown>): FieldValue<string> {
    switch (field.kind) {
        case 'missing':
        case 'malformed':
            return field;
        case 'present':
            if (typeof field.value === 'string') return { kind: 'present', value: field.value.trim() };
            if (typeof field.value === 'number' && Number.isFinite(field.value)) {
                return { kind: 'present', value: String(field.value) };
            }
            return { kind: 'malformed', raw: describeRaw(field.value) };
    }
}

export interface ParsedNumber {
    value: Fixed;
    unit: string | null;
}

/**
 * Coerces OCR-extracted numeric text: strips currency markers, thousands
 * separators, percent signs and stray spaces between digits, reads a letter O
 * next to a digit as zero, and splits off a trailing unit word ("2.00 SET").
 */
export function parseNumericText(input: string): ParsedNumber | null {
    const cleaned = input
        .replace(/₹|\bINR\b|\bRs\b\.?/gi, '')
        .replace(/[,%]/g, '')
        .replace(/(?<=\d)[Oo]|[Oo](?=\d)/g, '0')
        .replace(/(?<=\d)\s+(?=\d)/g, '')
        .trim();

    const match = cleaned.match(/^([+-]?(?:\d+(?:\.\d+)?|\.\d+))\s*([A-Za-z][A-Za-z.]*)?$/);
    if (!match) return null;

    const value = Fixed.parse(match[1]);
    if (!value) return null;

    const unit = match[2] ? match[2].replace(/\.$/, '') : null;
    return { value, unit };
}

export function asNumber(field: FieldValue<unknown>): FieldValue<ParsedNumber> {
    switch (field.kind) {
        case 'missing':
        case 'malformed':
            return field;
        case 'present': {
            if (typeof field.value === 'number') {
                const value = Fixed.parse(field.value);
                return value ? { kind: 'present', value: { value, unit: null } } : { kind: 'malformed', raw: String(field.value) };
            }
            if (typeof field.value === 'string') {
                const parsed = parseNumericText(field.value);
                return parsed ? { kind: 'present', value: parsed } : { kind: 'malformed', raw: field.value };
            }
            return { kind: 'malformed', raw: describeRaw(field.value) };
        }
    }
}

function describeRaw(value: unknown): string {
    if (typeof value === 'string') return value;
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}
