import { ContractViolationError } from '../errors.js';
import { ExtractedMetadata, ExtractionDefect, LineItem } from '../types/invoice.js';
import {
    InputFailure,
    LineComputation,
    Mismatch,
    MismatchCode,
    ReconciliationResult,
    Severity,
    Verdict,
} from '../types/output.js';
import { QrParseResult, QrSummary } from '../types/qr.js';
import { RateResolution } from '../types/rates.js';
import { Fixed } from '../utils/fixedPoint.js';

export interface ReconcileOptions {
    /** Upper bound on the amount tolerance, in currency units */
    absoluteTolerance: Fixed;
    /** Tolerance as a percentage of the compared total */
    relativeTolerancePercent: Fixed;
    /** Allowed gap between declared and resolved rate, in percentage points */
    rateDriftTolerance: Fixed;
    /** Deltas beyond tolerance x multiplier are CRITICAL, otherwise WARNING */
    criticalMultiplier: Fixed;
    rateSlabs: readonly Fixed[];
    /** Minor-unit places amounts are rounded to */
    amountPlaces: number;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = Object.freeze({
    absoluteTolerance: Fixed.of(100n, 2),
    relativeTolerancePercent: Fixed.fromInt(1),
    rateDriftTolerance: Fixed.of(1n, 2),
    criticalMultiplier: Fixed.fromInt(5),
    rateSlabs: Object.freeze([0, 5, 12, 18, 28].map(Fixed.fromInt)),
    amountPlaces: 2,
});

export interface ReconcileInput {
    invoiceId: string;
    metadata: ExtractedMetadata;
    items: readonly LineItem[];
    /** null when the invoice carried no QR code */
    qr: QrParseResult | null;
}

interface RateCheck {
    resolvedRate: Fixed | null;
    rateSource: LineComputation['rateSource'];
    effectiveRate: Fixed | null;
}

const HALF = Fixed.of(5n, 1);

const SEVERITY_RANK: Record<Severity, number> = { INFO: 0, WARNING: 1, CRITICAL: 2 };

const lineField = (position: number, field: string) => `line[${position}].${field}`;

/**
 * Reconciliation Engine - aligns normalized line items with the verified QR
 * summary, recomputes tax from the effective rates and reports every
 * discrepancy in a fixed order: line rate checks, line amount and tax
 * checks, invoice totals, identity fields.
 *
 * Pure and synchronous: `rates` must already be resolved, index-aligned with
 * `input.items`. Data problems never throw; only contract violations do.
 */
export function reconcile(
    input: ReconcileInput,
    rates: readonly RateResolution[],
    options: ReconcileOptions = DEFAULT_RECONCILE_OPTIONS
): ReconciliationResult {
    assertContract(input, rates);

    // 0. Required inputs
    const failures: InputFailure[] = [];
    const qrResult = input.qr;
    if (qrResult === null) {
        failures.push({ kind: 'EngineInputMissing', detail: 'Invoice has no QR payload' });
    } else if (!qrResult.ok) {
        failures.push({ kind: 'MalformedPayload', detail: `${qrResult.error.kind}: ${qrResult.error.message}` });
    }
    if (input.items.length === 0) {
        failures.push({ kind: 'EngineInputMissing', detail: 'Invoice has no line items' });
    }
    if (qrResult === null || !qrResult.ok) {
        return failedResult(input, null, failures);
    }
    if (failures.length > 0) {
        return failedResult(input, qrResult.summary, failures);
    }

    if (rates.length !== input.items.length) {
        throw new ContractViolationError(
            `Expected ${input.items.length} rate resolution(s), received ${rates.length}`
        );
    }

    const qr = qrResult.summary;
    const mismatches: Mismatch[] = [];
    const places = options.amountPlaces;

    // 1. Rates: defects, plausibility, cross-check against the resolver
    const rateChecks = input.items.map((item, i) => checkRate(item, rates[i], options, mismatches));

    // 2. Line totals and tax recomputation
    const lines: LineComputation[] = input.items.map((item, i) =>
        checkLineTax(item, rateChecks[i], options, mismatches)
    );

    // 3. Invoice totals against the QR summary
    const taxableParts = lines.map(l => l.taxableValue).filter((v): v is Fixed => v !== null);
    const taxParts = lines.map(l => l.recomputedTax).filter((v): v is Fixed => v !== null);
    const recomputedTaxableValue = taxableParts.length > 0 ? Fixed.sum(taxableParts).round(places) : null;
    const recomputedTaxTotal = taxParts.length > 0 ? Fixed.sum(taxParts).round(places) : null;

    compareInvoiceAmount('taxable_value', recomputedTaxableValue, qr.taxableValue, options, mismatches);
    compareInvoiceAmount('tax_total', recomputedTaxTotal, qr.taxTotal, options, mismatches);

    // Intra-state supply: tax splits evenly between CGST and SGST
    const { cgst, sgst, igst } = qr.taxes;
    if (recomputedTaxTotal !== null && (igst === null || igst.isZero())) {
        const half = recomputedTaxTotal.mul(HALF).round(places);
        if (cgst !== null) compareInvoiceAmount('cgst', half, cgst, options, mismatches);
        if (sgst !== null) compareInvoiceAmount('sgst', half, sgst, options, mismatches);
    }

    const recomputedGrandTotal =
        recomputedTaxableValue === null ? null : recomputedTaxableValue.add(recomputedTaxTotal ?? Fixed.ZERO);
    compareInvoiceAmount('grand_total', recomputedGrandTotal, qr.grandTotal, options, mismatches);

    if (qr.itemCount !== null && qr.itemCount !== input.items.length) {
        mismatches.push({
            field: 'item_count',
            lineIndex: null,
            expected: String(qr.itemCount),
            actual: String(input.items.length),
            delta: String(input.items.length - qr.itemCount),
            severity: 'WARNING',
            code: 'item_count',
            message: `QR declares ${qr.itemCount} item(s), ${input.items.length} extracted`,
        });
    }

    if (qr.mainHsnCode !== null && !input.items.some(item => item.productCode === qr.mainHsnCode)) {
        mismatches.push({
            field: 'main_hsn_code',
            lineIndex: null,
            expected: qr.mainHsnCode,
            actual: null,
            delta: null,
            severity: 'INFO',
            code: 'main_hsn_code',
            message: `QR main HSN code ${qr.mainHsnCode} does not appear on any extracted line`,
        });
    }

    // 4. Identity: a different invoice number or seller means the wrong pairing
    checkIdentity(input.metadata, qr, failures, mismatches);

    return {
        invoiceId: input.invoiceId,
        items: input.items,
        metadata: input.metadata,
        qrSummary: qr,
        lines,
        recomputedTaxableValue,
        recomputedTaxTotal,
        mismatches,
        failures,
        verdict: computeVerdict(mismatches, failures),
    };
}

/**
 * Result for an invoice that could not be reconciled at all. Carries no
 * mismatches: nothing was recomputed.
 */
export function failedResult(
    input: Pick<ReconcileInput, 'invoiceId' | 'metadata' | 'items'>,
    qrSummary: QrSummary | null,
    failures: InputFailure[]
): ReconciliationResult {
    return {
        invoiceId: input.invoiceId,
        items: input.items,
        metadata: input.metadata,
        qrSummary,
        lines: [],
        recomputedTaxableValue: null,
        recomputedTaxTotal: null,
        mismatches: [],
        failures,
        verdict: 'FAILED',
    };
}

export function computeVerdict(mismatches: readonly Mismatch[], failures: readonly InputFailure[]): Verdict {
    if (failures.length > 0) return 'FAILED';
    const flagged = mismatches.some(m => SEVERITY_RANK[m.severity] >= SEVERITY_RANK.WARNING);
    return flagged ? 'FLAGGED' : 'PASS';
}

/**
 * Tolerance for comparing an amount: the smaller of the absolute cap and
 * the relative percentage of `total`.
 */
export function toleranceFor(total: Fixed, options: ReconcileOptions): Fixed {
    return Fixed.min(options.absoluteTolerance, options.relativeTolerancePercent.percentOf(total.abs()));
}

/** null within tolerance, WARNING up to multiplier x tolerance, CRITICAL beyond. */
export function classifyDelta(delta: Fixed, tolerance: Fixed, options: ReconcileOptions): Severity | null {
    const magnitude = delta.abs();
    if (magnitude.compare(tolerance) <= 0) return null;
    if (magnitude.compare(tolerance.mul(options.criticalMultiplier)) <= 0) return 'WARNING';
    return 'CRITICAL';
}

/** Tax for a taxable base at a percentage rate, rounded half-up to the minor unit. */
export function computeTax(base: Fixed, rate: Fixed, places: number): Fixed {
    return rate.percentOf(base).round(places);
}

export function isRateSlab(rate: Fixed, options: ReconcileOptions): boolean {
    return options.rateSlabs.some(slab => slab.equals(rate));
}

/**
 * Short deterministic description of a result, used for the audit trail
 * and log lines.
 */
export function summarizeReconciliation(result: ReconciliationResult): string {
    const counts = { INFO: 0, WARNING: 0, CRITICAL: 0 };
    result.mismatches.forEach(m => counts[m.severity]++);

    const details = [`Verdict ${result.verdict}`];
    if (result.failures.length > 0) {
        details.push(`Failures: ${result.failures.map(f => `${f.kind} (${f.detail})`).join(', ')}`);
    } else {
        details.push(
            `${result.items.length} line(s), taxable ${result.recomputedTaxableValue?.toString() ?? 'n/a'}, tax ${result.recomputedTaxTotal?.toString() ?? 'n/a'}`
        );
        details.push(`${counts.CRITICAL} critical, ${counts.WARNING} warning, ${counts.INFO} info mismatch(es)`);
    }
    return details.join('; ');
}

function assertContract(input: ReconcileInput, rates: readonly RateResolution[]): void {
    if (input === null || input === undefined) {
        throw new ContractViolationError('reconcile() requires an input');
    }
    if (!Array.isArray(input.items)) {
        throw new ContractViolationError('reconcile() requires an items array');
    }
    if (input.metadata === null || input.metadata === undefined) {
        throw new ContractViolationError('reconcile() requires extracted metadata');
    }
    if (!Array.isArray(rates)) {
        throw new ContractViolationError('reconcile() requires a rates array');
    }
}

function checkRate(
    item: LineItem,
    resolution: RateResolution,
    options: ReconcileOptions,
    mismatches: Mismatch[]
): RateCheck {
    const position = item.position;

    item.defects.forEach(defect => mismatches.push(defectMismatch(defect, position)));

    const resolvedRate = resolution.status === 'resolved' ? resolution.rate : null;
    const rateSource = resolution.status === 'resolved' ? resolution.source : null;
    const declared = item.declaredRate;

    // Declared slab rate: used for the totals, but an unresolved code is still critical
    if (declared !== null && isRateSlab(declared, options)) {
        if (resolvedRate === null) {
            mismatches.push({
                field: lineField(position, 'tax_amount'),
                lineIndex: position,
                expected: null,
                actual: item.declaredTaxAmount === null ? null : formatAmount(item.declaredTaxAmount, options),
                delta: null,
                severity: 'CRITICAL',
                code: 'rate_unresolved',
                message: `No GST rate available for HSN ${item.productCode ?? '?'} (${describeUnresolved(resolution)}); declared ${formatRate(declared)}% is unverified`,
            });
        } else {
            const drift = declared.sub(resolvedRate);
            if (drift.abs().compare(options.rateDriftTolerance) > 0) {
                mismatches.push({
                    field: lineField(position, 'tax_rate'),
                    lineIndex: position,
                    expected: formatRate(resolvedRate),
                    actual: formatRate(declared),
                    delta: formatRate(drift),
                    severity: 'WARNING',
                    code: 'rate_drift',
                    message: `Declared rate ${formatRate(declared)}% differs from the ${formatRate(resolvedRate)}% rate for HSN ${item.productCode ?? '?'}`,
                });
            }
        }
        return { resolvedRate, rateSource, effectiveRate: declared };
    }

    // Absent or implausible declared rate: fall back to the resolved one
    if (declared !== null) {
        mismatches.push({
            field: lineField(position, 'tax_rate'),
            lineIndex: position,
            expected: resolvedRate === null ? null : formatRate(resolvedRate),
            actual: formatRate(declared),
            delta: resolvedRate === null ? null : formatRate(declared.sub(resolvedRate)),
            severity: 'WARNING',
            code: 'rate_implausible',
            message: `Declared rate ${formatRate(declared)}% is not a GST slab`,
        });
    }

    if (resolvedRate === null) {
        mismatches.push({
            field: lineField(position, 'tax_amount'),
            lineIndex: position,
            expected: null,
            actual: item.declaredTaxAmount === null ? null : formatAmount(item.declaredTaxAmount, options),
            delta: null,
            severity: 'CRITICAL',
            code: 'rate_unresolved',
            message: `No GST rate available for HSN ${item.productCode ?? '?'} (${describeUnresolved(resolution)}); tax cannot be recomputed`,
        });
    }

    return { resolvedRate, rateSource, effectiveRate: resolvedRate };
}

function checkLineTax(
    item: LineItem,
    rate: RateCheck,
    options: ReconcileOptions,
    mismatches: Mismatch[]
): LineComputation {
    const position = item.position;
    const places = options.amountPlaces;

    // Taxable base: quantity x unit price, else the declared line total
    const exactBase =
        item.quantity !== null && item.unitPrice !== null ? item.quantity.mul(item.unitPrice) : item.lineTotal;

    const computation: LineComputation = {
        position,
        resolvedRate: rate.resolvedRate,
        rateSource: rate.rateSource,
        effectiveRate: rate.effectiveRate,
        taxableValue: exactBase === null ? null : exactBase.round(places),
        recomputedTax: null,
    };

    // Declared line total against quantity x unit price
    if (item.quantity !== null && item.unitPrice !== null && item.lineTotal !== null) {
        const expectedTotal = item.quantity.mul(item.unitPrice).round(places);
        const actualTotal = item.lineTotal.round(places);
        const totalDelta = actualTotal.sub(expectedTotal);
        const totalTolerance = toleranceFor(item.lineTotal, options);
        const totalSeverity = classifyDelta(totalDelta, totalTolerance, options);
        if (totalSeverity !== null) {
            mismatches.push(
                amountMismatch(
                    lineField(position, 'line_total'),
                    position,
                    expectedTotal,
                    actualTotal,
                    totalDelta,
                    totalSeverity,
                    totalTolerance,
                    options
                )
            );
        }
    }

    // Unresolved rate was already reported in step 1
    if (rate.effectiveRate === null) {
        return computation;
    }

    if (exactBase === null) {
        mismatches.push({
            field: lineField(position, 'tax_amount'),
            lineIndex: position,
            expected: null,
            actual: item.declaredTaxAmount === null ? null : formatAmount(item.declaredTaxAmount, options),
            delta: null,
            severity: 'CRITICAL',
            code: 'no_taxable_base',
            message: 'Neither quantity x unit price nor a line total is available; tax cannot be recomputed',
        });
        return computation;
    }

    const expected = computeTax(exactBase, rate.effectiveRate, places);
    computation.recomputedTax = expected;

    if (item.declaredTaxAmount === null) {
        return computation;
    }

    const actual = item.declaredTaxAmount.round(places);
    const delta = actual.sub(expected);
    const tolerance = toleranceFor(item.lineTotal ?? exactBase, options);
    const severity = classifyDelta(delta, tolerance, options);

    if (severity !== null) {
        mismatches.push(
            amountMismatch(lineField(position, 'tax_amount'), position, expected, actual, delta, severity, tolerance, options)
        );
    }

    return computation;
}

function compareInvoiceAmount(
    field: 'taxable_value' | 'tax_total' | 'cgst' | 'sgst' | 'grand_total',
    recomputed: Fixed | null,
    declared: Fixed | null,
    options: ReconcileOptions,
    mismatches: Mismatch[]
): void {
    if (declared === null) {
        mismatches.push({
            field,
            lineIndex: null,
            expected: null,
            actual: recomputed === null ? null : formatAmount(recomputed, options),
            delta: null,
            severity: 'INFO',
            code: 'not_declared',
            message: `QR payload does not declare ${field}`,
        });
        return;
    }

    const expected = declared.round(options.amountPlaces);
    const actual = (recomputed ?? Fixed.ZERO).round(options.amountPlaces);
    const delta = actual.sub(expected);
    const tolerance = toleranceFor(declared, options);
    const severity = classifyDelta(delta, tolerance, options);

    if (severity !== null) {
        mismatches.push(amountMismatch(field, null, expected, actual, delta, severity, tolerance, options));
    }
}

function checkIdentity(
    metadata: ExtractedMetadata,
    qr: QrSummary,
    failures: InputFailure[],
    mismatches: Mismatch[]
): void {
    metadata.defects.forEach(defect => mismatches.push(defectMismatch(defect, null)));

    const required: Array<['invoice_number' | 'seller_gstin', string | null, string]> = [
        ['invoice_number', metadata.invoiceNumber?.trim() ?? null, qr.invoiceNumber],
        ['seller_gstin', metadata.sellerGstin, qr.sellerGstin],
    ];

    for (const [field, extracted, declared] of required) {
        if (extracted === null || extracted === '') {
            failures.push({ kind: 'EngineInputMissing', detail: `Extracted ${field} is missing` });
            mismatches.push(identityMismatch(field, declared, null, 'identity_missing', 'CRITICAL'));
        } else if (extracted !== declared) {
            mismatches.push(identityMismatch(field, declared, extracted, 'identity', 'CRITICAL'));
        }
    }

    if (metadata.buyerGstin !== null && qr.buyerGstin !== null && metadata.buyerGstin !== qr.buyerGstin) {
        mismatches.push(identityMismatch('buyer_gstin', qr.buyerGstin, metadata.buyerGstin, 'identity', 'CRITICAL'));
    }

    if (metadata.invoiceDate !== null && metadata.invoiceDate !== qr.invoiceDate) {
        mismatches.push(identityMismatch('invoice_date', qr.invoiceDate, metadata.invoiceDate, 'invoice_date', 'WARNING'));
    }
}

function identityMismatch(
    field: string,
    expected: string,
    actual: string | null,
    code: MismatchCode,
    severity: Severity
): Mismatch {
    return {
        field,
        lineIndex: null,
        expected,
        actual,
        delta: null,
        severity,
        code,
        message:
            actual === null
                ? `${field} missing from extracted invoice (QR: ${expected})`
                : `${field} differs: QR ${expected}, extracted ${actual}`,
    };
}

function defectMismatch(defect: ExtractionDefect, position: number | null): Mismatch {
    const field = position === null ? defect.field : lineField(position, defect.field);
    return {
        field,
        lineIndex: position,
        expected: null,
        actual: defect.raw,
        delta: null,
        severity: 'WARNING',
        code: 'extraction_defect',
        message: `Extraction defect on ${defect.field}: ${defect.reason}${defect.raw === null ? '' : ` (${defect.raw})`}`,
    };
}

function amountMismatch(
    field: string,
    lineIndex: number | null,
    expected: Fixed,
    actual: Fixed,
    delta: Fixed,
    severity: Severity,
    tolerance: Fixed,
    options: ReconcileOptions
): Mismatch {
    return {
        field,
        lineIndex,
        expected: formatAmount(expected, options),
        actual: formatAmount(actual, options),
        delta: formatAmount(delta, options),
        severity,
        code: 'amount_mismatch',
        message: `${field} off by ${formatAmount(delta, options)} (tolerance ${formatAmount(tolerance, options)})`,
    };
}

function describeUnresolved(resolution: RateResolution): string {
    if (resolution.status === 'resolved') return 'resolved';
    return resolution.detail ? `${resolution.reason}: ${resolution.detail}` : resolution.reason;
}

const formatAmount = (value: Fixed, options: ReconcileOptions): string => value.toFixed(options.amountPlaces);

const formatRate = (value: Fixed): string => value.normalize().toString();
