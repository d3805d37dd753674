import { z } from 'zod';

// Sheet-ready row shapes. Amounts are fixed-point text so that the sink never
// reintroduces float rounding; counts and positions are plain numbers.
const text = z.string();
const optionalText = z.string().nullable();

export const reviewSummaryRowSchema = z.object({
    invoiceId: text,
    invoiceNumber: optionalText,
    sellerGstin: optionalText,
    buyerGstin: optionalText,
    invoiceDate: optionalText,
    verdict: z.enum(['PASS', 'FLAGGED', 'FAILED']),
    lineCount: z.number().int(),
    recomputedTaxableValue: optionalText,
    declaredTaxableValue: optionalText,
    recomputedTaxTotal: optionalText,
    declaredTaxTotal: optionalText,
    declaredGrandTotal: optionalText,
    criticalCount: z.number().int(),
    warningCount: z.number().int(),
    infoCount: z.number().int(),
    failureReasons: optionalText,
});

export const reviewLineRowSchema = z.object({
    invoiceId: text,
    position: z.number().int(),
    productCode: optionalText,
    description: text,
    unit: optionalText,
    quantity: optionalText,
    unitPrice: optionalText,
    declaredRate: optionalText,
    resolvedRate: optionalText,
    rateSource: optionalText,
    effectiveRate: optionalText,
    taxableValue: optionalText,
    declaredTaxAmount: optionalText,
    recomputedTaxAmount: optionalText,
    defects: optionalText,
});

export const reviewMismatchRowSchema = z.object({
    invoiceId: text,
    sequence: z.number().int(),
    field: text,
    lineIndex: z.number().int().nullable(),
    severity: z.enum(['INFO', 'WARNING', 'CRITICAL']),
    code: text,
    expected: optionalText,
    actual: optionalText,
    delta: optionalText,
    message: text,
});

export type ReviewSummaryRow = z.infer<typeof reviewSummaryRowSchema>;
export type ReviewLineRow = z.infer<typeof reviewLineRowSchema>;
export type ReviewMismatchRow = z.infer<typeof reviewMismatchRowSchema>;

export const SUMMARY_COLUMNS = reviewSummaryRowSchema.keyof().options;
export const LINE_COLUMNS = reviewLineRowSchema.keyof().options;
export const MISMATCH_COLUMNS = reviewMismatchRowSchema.keyof().options;

export type CellValue = string | number | null;

export interface ReviewRecord {
    summary: ReviewSummaryRow;
    lines: ReviewLineRow[];
    mismatches: ReviewMismatchRow[];
}
