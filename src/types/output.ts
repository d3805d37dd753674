import { Fixed } from '../utils/fixedPoint.js';
import { ExtractedMetadata, LineItem } from './invoice.js';
import { QrSummary } from './qr.js';
import { RateSource } from './rates.js';

// Output Contract Types
export type Severity = 'INFO' | 'WARNING' | 'CRITICAL';

export type Verdict = 'PASS' | 'FLAGGED' | 'FAILED';

export type MismatchCode =
    | 'extraction_defect'
    | 'rate_drift'
    | 'rate_implausible'
    | 'rate_unresolved'
    | 'no_taxable_base'
    | 'amount_mismatch'
    | 'not_declared'
    | 'item_count'
    | 'main_hsn_code'
    | 'identity'
    | 'identity_missing'
    | 'invoice_date';

export interface Mismatch {
    field: string;
    lineIndex: number | null;
    expected: string | null;
    actual: string | null;
    delta: string | null;      // actual - expected
    severity: Severity;
    code: MismatchCode;
    message: string;
}

export type InputFailureKind = 'EngineInputMissing' | 'MalformedPayload' | 'Cancelled' | 'InternalError';

export interface InputFailure {
    kind: InputFailureKind;
    detail: string;
}

export interface LineComputation {
    position: number;
    resolvedRate: Fixed | null;
    rateSource: RateSource | null;
    effectiveRate: Fixed | null;
    taxableValue: Fixed | null;
    recomputedTax: Fixed | null;
}

export interface ReconciliationResult {
    invoiceId: string;
    items: readonly LineItem[];
    metadata: ExtractedMetadata;
    qrSummary: QrSummary | null;
    lines: LineComputation[];
    recomputedTaxableValue: Fixed | null;
    recomputedTaxTotal: Fixed | null;
    mismatches: Mismatch[];
    failures: InputFailure[];
    verdict: Verdict;
}

export type AuditStep = 'normalize' | 'parse' | 'resolve' | 'reconcile' | 'report';

export interface AuditEntry {
    step: AuditStep;
    timestamp: string;
    details: string;
}
