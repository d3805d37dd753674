import { ReconciliationResult, Severity } from '../types/output.js';
import {
    CellValue,
    ReviewLineRow,
    ReviewMismatchRow,
    ReviewRecord,
    ReviewSummaryRow,
} from '../types/report.js';
import { Fixed } from '../utils/fixedPoint.js';

const amount = (value: Fixed | null): string | null => (value === null ? null : value.toFixed(2));
const rate = (value: Fixed | null): string | null => (value === null ? null : value.normalize().toString());

/**
 * Report Service - flattens a reconciliation result into review rows
 * (one summary, one row per line, one row per mismatch) for a spreadsheet
 * or table sink. Building the record never mutates the result.
 */
export function buildReviewRecord(result: ReconciliationResult): ReviewRecord {
    return {
        summary: buildSummaryRow(result),
        lines: buildLineRows(result),
        mismatches: buildMismatchRows(result),
    };
}

function buildSummaryRow(result: ReconciliationResult): ReviewSummaryRow {
    const counts: Record<Severity, number> = { INFO: 0, WARNING: 0, CRITICAL: 0 };
    for (const mismatch of result.mismatches) {
        counts[mismatch.severity]++;
    }

    const qr = result.qrSummary;
    return {
        invoiceId: result.invoiceId,
        invoiceNumber: qr?.invoiceNumber ?? result.metadata.invoiceNumber,
        sellerGstin: qr?.sellerGstin ?? result.metadata.sellerGstin,
        buyerGstin: qr?.buyerGstin ?? result.metadata.buyerGstin,
        invoiceDate: qr?.invoiceDate ?? result.metadata.invoiceDate,
        verdict: result.verdict,
        lineCount: result.items.length,
        recomputedTaxableValue: amount(result.recomputedTaxableValue),
        declaredTaxableValue: amount(qr?.taxableValue ?? null),
        recomputedTaxTotal: amount(result.recomputedTaxTotal),
        declaredTaxTotal: amount(qr?.taxTotal ?? null),
        declaredGrandTotal: amount(qr?.grandTotal ?? null),
        criticalCount: counts.CRITICAL,
        warningCount: counts.WARNING,
        infoCount: counts.INFO,
        failureReasons:
            result.failures.length > 0 ? result.failures.map(f => `${f.kind}: ${f.detail}`).join('; ') : null,
    };
}

function buildLineRows(result: ReconciliationResult): ReviewLineRow[] {
    const computations = new Map(result.lines.map(line => [line.position, line]));

    return result.items.map(item => {
        const computed = computations.get(item.position);
        return {
            invoiceId: result.invoiceId,
            position: item.position,
            productCode: item.productCode,
            description: item.description,
            unit: item.unit,
            quantity: item.quantity === null ? null : item.quantity.normalize().toString(),
            unitPrice: amount(item.unitPrice),
            declaredRate: rate(item.declaredRate),
            resolvedRate: rate(computed?.resolvedRate ?? null),
            rateSource: computed?.rateSource ?? null,
            effectiveRate: rate(computed?.effectiveRate ?? null),
            taxableValue: amount(computed?.taxableValue ?? null),
            declaredTaxAmount: amount(item.declaredTaxAmount),
            recomputedTaxAmount: amount(computed?.recomputedTax ?? null),
            defects:
                item.defects.length > 0 ? item.defects.map(d => `${d.field}:${d.reason}`).join(', ') : null,
        };
    });
}

function buildMismatchRows(result: ReconciliationResult): ReviewMismatchRow[] {
    return result.mismatches.map((mismatch, index) => ({
        invoiceId: result.invoiceId,
        sequence: index + 1,
        field: mismatch.field,
        lineIndex: mismatch.lineIndex,
        severity: mismatch.severity,
        code: mismatch.code,
        expected: mismatch.expected,
        actual: mismatch.actual,
        delta: mismatch.delta,
        message: mismatch.message,
    }));
}

/** Orders a row's cells by a column list, e.g. for appending to a sheet. */
export function toRowValues<Row extends Record<string, CellValue>>(
    row: Row,
    columns: readonly (keyof Row & string)[]
): CellValue[] {
    return columns.map(column => row[column]);
}
