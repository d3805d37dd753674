import {
    ExtractedMetadata,
    ExtractionDefect,
    LineItem,
    LineItemField,
    MetadataField,
    RawRecord,
} from '../types/invoice.js';
import { AuditEntry } from '../types/output.js';
import { createAuditEntry } from '../utils/auditTrail.js';
import { normalizeDate } from '../utils/dates.js';
import { asNumber, asText, ParsedNumber, readField } from '../utils/fields.js';
import { Fixed } from '../utils/fixedPoint.js';
import { normalizeGstin, normalizeProductCode } from '../utils/productCode.js';

// Labels seen across extraction passes (invoice table headers, LLM JSON keys)
const LINE_ITEM_ALIASES: Record<LineItemField, readonly string[]> = {
    productCode: ['productCode', 'HSN/SAC', 'hsn', 'sac', 'hsnCode'],
    description: ['description', 'itemDescription', 'particulars', 'item'],
    unit: ['unit', 'uom'],
    quantity: ['quantity', 'qty'],
    unitPrice: ['unitPrice', 'rate', 'price'],
    taxRate: ['taxRate', 'gstRate', 'gstPercent', 'taxPercent'],
    taxAmount: ['taxAmount', 'gstAmount', 'taxAmt'],
    lineTotal: ['lineTotal', 'amount', 'total', 'taxableValue'],
};

const METADATA_ALIASES: Record<MetadataField, readonly string[]> = {
    invoiceNumber: ['invoiceNumber', 'invoiceNo', 'DocNo', 'billNo'],
    sellerGstin: ['sellerGstin', 'supplierGstin', 'gstin'],
    buyerGstin: ['buyerGstin', 'recipientGstin'],
    invoiceDate: ['invoiceDate', 'DocDt', 'date'],
};

const GSTIN_PATTERN = /^\d{2}[A-Z]{5}\d{4}[A-Z][A-Z0-9]Z[A-Z0-9]$/;

const HUNDRED = Fixed.fromInt(100);

interface Bounds {
    required: boolean;
    min: Fixed;
    exclusiveMin?: boolean;
    max?: Fixed;
}

const BOUNDS: Record<'quantity' | 'unitPrice' | 'taxRate' | 'taxAmount' | 'lineTotal', Bounds> = {
    quantity: { required: true, min: Fixed.ZERO, exclusiveMin: true },
    unitPrice: { required: true, min: Fixed.ZERO },
    taxRate: { required: false, min: Fixed.ZERO, max: HUNDRED },
    taxAmount: { required: false, min: Fixed.ZERO },
    lineTotal: { required: false, min: Fixed.ZERO },
};

export interface NormalizeResult {
    items: LineItem[];
    duplicatesRemoved: number;
    auditEntry: AuditEntry;
}

/**
 * Normalize Service - Coerces raw extracted line items into canonical LineItems.
 * Lines are never dropped for bad fields; each problem becomes an
 * ExtractionDefect on the line. Exact repeats from a second OCR pass are removed.
 */
export function normalizeLineItems(rawItems: readonly RawRecord[]): NormalizeResult {
    const details: string[] = [];
    const seen = new Set<string>();
    const kept: Omit<LineItem, 'position'>[] = [];
    let duplicatesRemoved = 0;

    for (const raw of rawItems) {
        const draft = normalizeOne(raw);
        const key = duplicateKey(draft);

        if (key !== null) {
            if (seen.has(key)) {
                duplicatesRemoved++;
                continue;
            }
            seen.add(key);
        }
        kept.push(draft);
    }

    const items: LineItem[] = kept.map((draft, position) =>
        Object.freeze({ ...draft, position, defects: Object.freeze([...draft.defects]) })
    );

    const defectCount = items.reduce((n, item) => n + item.defects.length, 0);
    details.push(`Normalized ${items.length} of ${rawItems.length} raw line item(s)`);
    if (duplicatesRemoved > 0) {
        details.push(`Removed ${duplicatesRemoved} exact duplicate(s)`);
    }
    if (defectCount > 0) {
        details.push(`${defectCount} extraction defect(s) recorded`);
    }

    return {
        items,
        duplicatesRemoved,
        auditEntry: createAuditEntry('normalize', details.join('; ')),
    };
}

/**
 * Normalizes the extracted invoice header (number, GSTINs, date).
 * Absent values stay null; unreadable ones are recorded as defects.
 */
export function normalizeMetadata(raw: RawRecord): ExtractedMetadata {
    const defects: ExtractionDefect[] = [];

    const readText = (field: MetadataField): string | null => {
        const value = asText(readField(raw, METADATA_ALIASES[field]));
        switch (value.kind) {
            case 'present':
                return value.value;
            case 'missing':
                return null;
            case 'malformed':
                defects.push({ field, reason: 'malformed', raw: value.raw });
                return null;
        }
    };

    const readGstin = (field: 'sellerGstin' | 'buyerGstin'): string | null => {
        const text = readText(field);
        if (text === null) return null;

        const gstin = normalizeGstin(text);
        if (!GSTIN_PATTERN.test(gstin)) {
            defects.push({ field, reason: 'malformed', raw: text });
        }
        return gstin;
    };

    const invoiceNumber = readText('invoiceNumber');
    const sellerGstin = readGstin('sellerGstin');
    const buyerGstin = readGstin('buyerGstin');

    const rawDate = readText('invoiceDate');
    const invoiceDate = normalizeDate(rawDate);
    if (rawDate !== null && invoiceDate === null) {
        defects.push({ field: 'invoiceDate', reason: 'malformed', raw: rawDate });
    }

    return Object.freeze({
        invoiceNumber,
        sellerGstin,
        buyerGstin,
        invoiceDate,
        defects: Object.freeze(defects),
    });
}

function normalizeOne(raw: RawRecord): Omit<LineItem, 'position'> {
    const defects: ExtractionDefect[] = [];

    // 1. Product code
    let productCode: string | null = null;
    const code = asText(readField(raw, LINE_ITEM_ALIASES.productCode));
    switch (code.kind) {
        case 'present':
            productCode = normalizeProductCode(code.value);
            if (productCode === null) {
                defects.push({ field: 'productCode', reason: 'malformed', raw: code.value });
            }
            break;
        case 'missing':
            defects.push({ field: 'productCode', reason: 'missing', raw: null });
            break;
        case 'malformed':
            defects.push({ field: 'productCode', reason: 'malformed', raw: code.raw });
            break;
    }

    // 2. Free-text fields
    const description = asText(readField(raw, LINE_ITEM_ALIASES.description));
    const unitField = asText(readField(raw, LINE_ITEM_ALIASES.unit));

    // 3. Numeric fields
    const quantity = readDecimal(raw, 'quantity', defects);
    const unitPrice = readDecimal(raw, 'unitPrice', defects);
    const taxRate = readDecimal(raw, 'taxRate', defects);
    const taxAmount = readDecimal(raw, 'taxAmount', defects);
    const lineTotal = readDecimal(raw, 'lineTotal', defects);

    return {
        productCode,
        description: description.kind === 'present' ? description.value : '',
        unit: unitField.kind === 'present' ? unitField.value : quantity?.unit ?? null,
        quantity: quantity?.value ?? null,
        unitPrice: unitPrice?.value ?? null,
        declaredRate: taxRate?.value ?? null,
        declaredTaxAmount: taxAmount?.value ?? null,
        lineTotal: lineTotal?.value ?? null,
        defects,
    };
}

function readDecimal(
    raw: RawRecord,
    field: keyof typeof BOUNDS,
    defects: ExtractionDefect[]
): ParsedNumber | null {
    const bounds = BOUNDS[field];
    const parsed = asNumber(readField(raw, LINE_ITEM_ALIASES[field]));

    switch (parsed.kind) {
        case 'missing':
            if (bounds.required) {
                defects.push({ field, reason: 'missing', raw: null });
            }
            return null;
        case 'malformed':
            defects.push({ field, reason: 'malformed', raw: parsed.raw });
            return null;
        case 'present':
            if (!withinBounds(parsed.value.value, bounds)) {
                defects.push({ field, reason: 'out_of_range', raw: parsed.value.value.toString() });
                return null;
            }
            return parsed.value;
    }
}

function withinBounds(value: Fixed, bounds: Bounds): boolean {
    const againstMin = value.compare(bounds.min);
    if (againstMin < 0 || (bounds.exclusiveMin && againstMin === 0)) return false;
    if (bounds.max && value.compare(bounds.max) > 0) return false;
    return true;
}

function duplicateKey(item: Omit<LineItem, 'position'>): string | null {
    if (item.productCode === null || item.quantity === null || item.unitPrice === null) {
        return null;
    }
    return [
        item.productCode,
        item.quantity.normalize().toString(),
        item.unitPrice.normalize().toString(),
    ].join('|');
}
