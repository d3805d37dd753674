import { Fixed } from '../utils/fixedPoint.js';

// Raw extraction output: unstructured field dictionaries from OCR/LLM passes
export type RawRecord = Record<string, unknown>;

export interface InvoiceInput {
    invoiceId: string;
    metadata: RawRecord;
    lineItems: RawRecord[];
    qrPayload: string | null;
}

// One raw field as read from a record, before coercion
export type FieldValue<T> =
    | { kind: 'present'; value: T }
    | { kind: 'missing' }
    | { kind: 'malformed'; raw: string };

export type LineItemField =
    | 'productCode'
    | 'description'
    | 'unit'
    | 'quantity'
    | 'unitPrice'
    | 'taxRate'
    | 'taxAmount'
    | 'lineTotal';

export type MetadataField = 'invoiceNumber' | 'sellerGstin' | 'buyerGstin' | 'invoiceDate';

export type DefectReason = 'missing' | 'malformed' | 'out_of_range';

export interface ExtractionDefect {
    field: LineItemField | MetadataField;
    reason: DefectReason;
    raw: string | null;
}

export interface LineItem {
    readonly position: number;
    readonly productCode: string | null;
    readonly description: string;
    readonly unit: string | null;
    readonly quantity: Fixed | null;
    readonly unitPrice: Fixed | null;
    readonly declaredRate: Fixed | null;
    readonly declaredTaxAmount: Fixed | null;
    readonly lineTotal: Fixed | null;
    readonly defects: readonly ExtractionDefect[];
}

export interface ExtractedMetadata {
    readonly invoiceNumber: string | null;
    readonly sellerGstin: string | null;
    readonly buyerGstin: string | null;
    readonly invoiceDate: string | null;
    readonly defects: readonly ExtractionDefect[];
}
