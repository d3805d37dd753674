import { Fixed } from '../utils/fixedPoint.js';

export interface TaxSplit {
    cgst: Fixed | null;
    sgst: Fixed | null;
    igst: Fixed | null;
    cess: Fixed | null;
}

// Decoded, signature-verified summary from the authority's QR code
export interface QrSummary {
    readonly version: string | null;
    readonly sellerGstin: string;
    readonly buyerGstin: string | null;
    readonly documentType: string | null;
    readonly invoiceNumber: string;
    readonly invoiceDate: string;
    readonly taxableValue: Fixed | null;
    readonly taxes: Readonly<TaxSplit>;
    readonly taxTotal: Fixed | null;
    readonly grandTotal: Fixed;
    readonly itemCount: number | null;
    readonly mainHsnCode: string | null;
    readonly irn: string | null;
    readonly irnDate: string | null;
}

export type MalformedPayloadKind =
    | 'no_payload'
    | 'structure'
    | 'encoding'
    | 'signature'
    | 'issuer'
    | 'schema'
    | 'unsupported_version';

export interface MalformedPayload {
    kind: MalformedPayloadKind;
    message: string;
}

export type QrParseResult =
    | { ok: true; summary: QrSummary }
    | { ok: false; error: MalformedPayload };
