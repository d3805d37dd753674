import { describe, expect, it } from 'vitest';
import { ContractViolationError } from '../../src/errors.js';
import {
    classifyDelta,
    DEFAULT_RECONCILE_OPTIONS,
    reconcile,
    ReconcileInput,
    summarizeReconciliation,
    toleranceFor,
} from '../../src/services/reconcile.js';
import { ExtractedMetadata, LineItem } from '../../src/types/invoice.js';
import { QrSummary } from '../../src/types/qr.js';
import { RateResolution } from '../../src/types/rates.js';
import { dec, makeItem, makeMetadata, makeSummary } from '../helpers.js';

function resolved(rate: string, productCode = '94035000'): RateResolution {
    return { status: 'resolved', productCode, rate: dec(rate), source: 'local-cache' };
}

const notFound: RateResolution = { status: 'unresolved', productCode: '94035000', reason: 'not_found' };

function makeInput(
    items: LineItem[] = [makeItem(0)],
    summary: QrSummary = makeSummary(),
    metadata: ExtractedMetadata = makeMetadata()
): ReconcileInput {
    return { invoiceId: 'inv-1', metadata, items, qr: { ok: true, summary } };
}

describe('reconcile', () => {
    describe('clean invoice', () => {
        it('passes with no mismatches', () => {
            const result = reconcile(makeInput(), [resolved('18')]);

            expect(result.verdict).toBe('PASS');
            expect(result.mismatches).toEqual([]);
            expect(result.failures).toEqual([]);
            expect(result.recomputedTaxableValue?.toString()).toBe('1000.00');
            expect(result.recomputedTaxTotal?.toString()).toBe('180.00');
            expect(result.lines).toHaveLength(1);
            expect(result.lines[0].effectiveRate?.toString()).toBe('18');
            expect(result.lines[0].rateSource).toBe('local-cache');
            expect(result.lines[0].recomputedTax?.toString()).toBe('180.00');
        });

        it('is idempotent', () => {
            const input = makeInput([makeItem(0, { declaredTaxAmount: dec('183') })]);
            const first = reconcile(input, [resolved('18')]);
            const second = reconcile(input, [resolved('18')]);

            expect(second).toEqual(first);
            expect(JSON.stringify(second)).toBe(JSON.stringify(first));
        });
    });

    describe('rounding', () => {
        it('rounds the tax on the exact base, not on a pre-rounded one', () => {
            // 3 x 33.335 = 100.005; 18% = 18.0009 -> 18.00
            const item = makeItem(0, {
                quantity: dec('3'),
                unitPrice: dec('33.335'),
                declaredTaxAmount: dec('18.00'),
                lineTotal: null,
            });
            const summary = makeSummary({
                taxableValue: dec('100.01'),
                taxes: { cgst: dec('9'), sgst: dec('9'), igst: null, cess: null },
                taxTotal: dec('18.00'),
                grandTotal: dec('118.01'),
            });

            const result = reconcile(makeInput([item], summary), [resolved('18')]);

            expect(result.lines[0].recomputedTax?.toString()).toBe('18.00');
            expect(result.lines[0].taxableValue?.toString()).toBe('100.01');
            expect(result.mismatches).toEqual([]);
            expect(result.verdict).toBe('PASS');
        });
    });

    describe('line tax tolerance', () => {
        const runWithDeclaredTax = (tax: string) =>
            reconcile(makeInput([makeItem(0, { declaredTaxAmount: dec(tax) })]), [resolved('18')]);

        it('accepts a delta equal to the tolerance', () => {
            expect(runWithDeclaredTax('181.00').mismatches).toEqual([]);
            expect(runWithDeclaredTax('179.00').mismatches).toEqual([]);
        });

        it('warns just beyond the tolerance', () => {
            const result = runWithDeclaredTax('181.01');

            expect(result.mismatches).toEqual([
                {
                    field: 'line[0].tax_amount',
                    lineIndex: 0,
                    expected: '180.00',
                    actual: '181.01',
                    delta: '1.01',
                    severity: 'WARNING',
                    code: 'amount_mismatch',
                    message: 'line[0].tax_amount off by 1.01 (tolerance 1.00)',
                },
            ]);
            expect(result.verdict).toBe('FLAGGED');
        });

        it('stays a warning up to five times the tolerance', () => {
            expect(runWithDeclaredTax('185.00').mismatches[0].severity).toBe('WARNING');
        });

        it('is critical beyond five times the tolerance', () => {
            const result = runWithDeclaredTax('185.01');

            expect(result.mismatches[0].severity).toBe('CRITICAL');
            expect(result.mismatches[0].delta).toBe('5.01');
        });

        it('uses the relative tolerance on small lines', () => {
            // 10 x 5 = 50, 1% = 0.50 is below the 1.00 cap
            const item = makeItem(0, {
                unitPrice: dec('5'),
                declaredTaxAmount: dec('9.60'),
                lineTotal: dec('50'),
            });
            const summary = makeSummary({
                taxableValue: dec('50'),
                taxes: { cgst: dec('4.50'), sgst: dec('4.50'), igst: null, cess: null },
                taxTotal: dec('9'),
                grandTotal: dec('59'),
            });

            const result = reconcile(makeInput([item], summary), [resolved('18')]);

            expect(result.mismatches).toHaveLength(1);
            expect(result.mismatches[0].delta).toBe('0.60');
            expect(result.mismatches[0].message).toBe('line[0].tax_amount off by 0.60 (tolerance 0.50)');
        });

        it('skips the comparison when no tax amount was declared', () => {
            const result = reconcile(makeInput([makeItem(0, { declaredTaxAmount: null })]), [resolved('18')]);

            expect(result.mismatches).toEqual([]);
            expect(result.lines[0].recomputedTax?.toString()).toBe('180.00');
        });
    });

    describe('rates', () => {
        it('flags drift between the declared and resolved rate but keeps the declared one', () => {
            const result = reconcile(makeInput(), [resolved('12')]);

            expect(result.mismatches).toEqual([
                {
                    field: 'line[0].tax_rate',
                    lineIndex: 0,
                    expected: '12',
                    actual: '18',
                    delta: '6',
                    severity: 'WARNING',
                    code: 'rate_drift',
                    message: 'Declared rate 18% differs from the 12% rate for HSN 94035000',
                },
            ]);
            expect(result.lines[0].effectiveRate?.toString()).toBe('18');
            expect(result.lines[0].resolvedRate?.toString()).toBe('12');
        });

        it('is critical when a declared slab rate cannot be confirmed', () => {
            const result = reconcile(makeInput(), [notFound]);

            expect(result.mismatches).toEqual([
                {
                    field: 'line[0].tax_amount',
                    lineIndex: 0,
                    expected: null,
                    actual: '180.00',
                    delta: null,
                    severity: 'CRITICAL',
                    code: 'rate_unresolved',
                    message: 'No GST rate available for HSN 94035000 (not_found); declared 18% is unverified',
                },
            ]);
            expect(result.verdict).toBe('FLAGGED');
        });

        it('still totals an unconfirmed slab rate at the declared rate', () => {
            const result = reconcile(makeInput(), [notFound]);

            expect(result.lines[0].effectiveRate?.toString()).toBe('18');
            expect(result.lines[0].recomputedTax?.toString()).toBe('180.00');
            expect(result.recomputedTaxTotal?.toString()).toBe('180.00');
        });

        it('replaces an implausible declared rate with the resolved one', () => {
            const result = reconcile(makeInput([makeItem(0, { declaredRate: dec('15') })]), [resolved('18')]);

            expect(result.mismatches).toEqual([
                {
                    field: 'line[0].tax_rate',
                    lineIndex: 0,
                    expected: '18',
                    actual: '15',
                    delta: '-3',
                    severity: 'WARNING',
                    code: 'rate_implausible',
                    message: 'Declared rate 15% is not a GST slab',
                },
            ]);
            expect(result.lines[0].effectiveRate?.toString()).toBe('18');
        });

        it('accepts custom slabs', () => {
            const options = { ...DEFAULT_RECONCILE_OPTIONS, rateSlabs: [dec('15')] };
            const item = makeItem(0, { declaredRate: dec('15'), declaredTaxAmount: dec('150') });
            const summary = makeSummary({
                taxes: { cgst: dec('75'), sgst: dec('75'), igst: null, cess: null },
                taxTotal: dec('150'),
                grandTotal: dec('1150'),
            });

            const result = reconcile(makeInput([item], summary), [resolved('15')], options);

            expect(result.mismatches).toEqual([]);
        });

        it('is critical when no rate is available at all', () => {
            const result = reconcile(makeInput([makeItem(0, { declaredRate: null })]), [notFound]);

            expect(result.mismatches.map(m => [m.field, m.code, m.severity])).toEqual([
                ['line[0].tax_amount', 'rate_unresolved', 'CRITICAL'],
                ['tax_total', 'amount_mismatch', 'CRITICAL'],
                ['grand_total', 'amount_mismatch', 'CRITICAL'],
            ]);
            expect(result.lines[0].recomputedTax).toBeNull();
            expect(result.recomputedTaxTotal).toBeNull();
            expect(result.verdict).toBe('FLAGGED');
        });
    });

    describe('taxable base', () => {
        it('falls back to the line total without quantity and price', () => {
            const result = reconcile(makeInput([makeItem(0, { quantity: null })]), [resolved('18')]);

            expect(result.lines[0].taxableValue?.toString()).toBe('1000.00');
            expect(result.mismatches).toEqual([]);
        });

        it('is critical when there is nothing to tax', () => {
            const result = reconcile(
                makeInput([makeItem(0, { quantity: null, lineTotal: null })]),
                [resolved('18')]
            );

            expect(result.mismatches[0]).toMatchObject({
                field: 'line[0].tax_amount',
                severity: 'CRITICAL',
                code: 'no_taxable_base',
            });
            expect(result.recomputedTaxableValue).toBeNull();
        });
    });

    describe('line totals', () => {
        it('flags a line total that does not match quantity x unit price', () => {
            const result = reconcile(makeInput([makeItem(0, { lineTotal: dec('5000') })]), [resolved('18')]);

            expect(result.mismatches).toEqual([
                {
                    field: 'line[0].line_total',
                    lineIndex: 0,
                    expected: '1000.00',
                    actual: '5000.00',
                    delta: '4000.00',
                    severity: 'CRITICAL',
                    code: 'amount_mismatch',
                    message: 'line[0].line_total off by 4000.00 (tolerance 1.00)',
                },
            ]);
            expect(result.verdict).toBe('FLAGGED');
        });

        it('accepts a line total within tolerance', () => {
            const result = reconcile(makeInput([makeItem(0, { lineTotal: dec('1000.90') })]), [resolved('18')]);

            expect(result.mismatches).toEqual([]);
        });

        it('reports the line total before the line tax', () => {
            const item = makeItem(0, { lineTotal: dec('1003'), declaredTaxAmount: dec('190') });

            const result = reconcile(makeInput([item]), [resolved('18')]);

            expect(result.mismatches.map(m => [m.field, m.severity])).toEqual([
                ['line[0].line_total', 'WARNING'],
                ['line[0].tax_amount', 'CRITICAL'],
            ]);
        });
    });

    describe('extraction defects', () => {
        it('surfaces each defect as a warning on its line', () => {
            const item = makeItem(0, {
                lineTotal: null,
                defects: [{ field: 'lineTotal', reason: 'malformed', raw: '1,OOO.x' }],
            });

            const result = reconcile(makeInput([item]), [resolved('18')]);

            expect(result.mismatches).toEqual([
                {
                    field: 'line[0].lineTotal',
                    lineIndex: 0,
                    expected: null,
                    actual: '1,OOO.x',
                    delta: null,
                    severity: 'WARNING',
                    code: 'extraction_defect',
                    message: 'Extraction defect on lineTotal: malformed (1,OOO.x)',
                },
            ]);
        });
    });

    describe('ordering', () => {
        it('reports rate checks for every line before any line tax check', () => {
            const items = [
                makeItem(0, { declaredTaxAmount: dec('190') }),
                makeItem(1, { productCode: '94036000' }),
            ];
            const summary = makeSummary({
                taxableValue: dec('2000'),
                taxes: { cgst: dec('180'), sgst: dec('180'), igst: null, cess: null },
                taxTotal: dec('360'),
                grandTotal: dec('2360'),
                itemCount: 2,
            });

            const result = reconcile(makeInput(items, summary), [resolved('18'), resolved('12', '94036000')]);

            expect(result.mismatches.map(m => [m.field, m.code])).toEqual([
                ['line[1].tax_rate', 'rate_drift'],
                ['line[0].tax_amount', 'amount_mismatch'],
            ]);
        });
    });

    describe('invoice totals', () => {
        it('notes totals the QR does not declare', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary({ taxableValue: null })), [
                resolved('18'),
            ]);

            expect(result.mismatches).toEqual([
                {
                    field: 'taxable_value',
                    lineIndex: null,
                    expected: null,
                    actual: '1000.00',
                    delta: null,
                    severity: 'INFO',
                    code: 'not_declared',
                    message: 'QR payload does not declare taxable_value',
                },
            ]);
            expect(result.verdict).toBe('PASS');
        });

        it('compares the grand total against taxable value plus tax', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary({ grandTotal: dec('1183') })), [
                resolved('18'),
            ]);

            expect(result.mismatches).toEqual([
                {
                    field: 'grand_total',
                    lineIndex: null,
                    expected: '1183.00',
                    actual: '1180.00',
                    delta: '-3.00',
                    severity: 'WARNING',
                    code: 'amount_mismatch',
                    message: 'grand_total off by -3.00 (tolerance 1.00)',
                },
            ]);
        });

        it('checks that CGST and SGST each carry half the tax', () => {
            const summary = makeSummary({ taxes: { cgst: dec('100'), sgst: dec('90'), igst: null, cess: null } });

            const result = reconcile(makeInput(makeDefaultItems(), summary), [resolved('18')]);

            expect(result.mismatches).toEqual([
                {
                    field: 'cgst',
                    lineIndex: null,
                    expected: '100.00',
                    actual: '90.00',
                    delta: '-10.00',
                    severity: 'CRITICAL',
                    code: 'amount_mismatch',
                    message: 'cgst off by -10.00 (tolerance 1.00)',
                },
            ]);
        });

        it('skips the CGST and SGST split for an inter-state invoice', () => {
            const summary = makeSummary({ taxes: { cgst: dec('50'), sgst: dec('50'), igst: dec('180'), cess: null } });

            const result = reconcile(makeInput(makeDefaultItems(), summary), [resolved('18')]);

            expect(result.mismatches).toEqual([]);
        });

        it('warns when the item count differs', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary({ itemCount: 3 })), [resolved('18')]);

            expect(result.mismatches).toEqual([
                {
                    field: 'item_count',
                    lineIndex: null,
                    expected: '3',
                    actual: '1',
                    delta: '-2',
                    severity: 'WARNING',
                    code: 'item_count',
                    message: 'QR declares 3 item(s), 1 extracted',
                },
            ]);
        });

        it('notes a main HSN code that no line carries', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary({ mainHsnCode: '94036000' })), [
                resolved('18'),
            ]);

            expect(result.mismatches.map(m => [m.code, m.severity])).toEqual([['main_hsn_code', 'INFO']]);
            expect(result.verdict).toBe('PASS');
        });
    });

    describe('identity', () => {
        it('reports exactly one critical mismatch for a different invoice number', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary(), makeMetadata({ invoiceNumber: 'INV-002' })), [
                resolved('18'),
            ]);

            expect(result.mismatches).toEqual([
                {
                    field: 'invoice_number',
                    lineIndex: null,
                    expected: 'INV-001',
                    actual: 'INV-002',
                    delta: null,
                    severity: 'CRITICAL',
                    code: 'identity',
                    message: 'invoice_number differs: QR INV-001, extracted INV-002',
                },
            ]);
            expect(result.verdict).toBe('FLAGGED');
        });

        it('fails when the extracted seller GSTIN is missing', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary(), makeMetadata({ sellerGstin: null })), [
                resolved('18'),
            ]);

            expect(result.verdict).toBe('FAILED');
            expect(result.failures).toEqual([
                { kind: 'EngineInputMissing', detail: 'Extracted seller_gstin is missing' },
            ]);
            expect(result.mismatches.map(m => [m.field, m.code])).toEqual([['seller_gstin', 'identity_missing']]);
        });

        it('ignores a buyer GSTIN missing on either side', () => {
            const result = reconcile(makeInput(makeDefaultItems(), makeSummary({ buyerGstin: null })), [resolved('18')]);

            expect(result.mismatches).toEqual([]);
        });

        it('warns on a different invoice date', () => {
            const result = reconcile(
                makeInput(makeDefaultItems(), makeSummary(), makeMetadata({ invoiceDate: '2024-03-13' })),
                [resolved('18')]
            );

            expect(result.mismatches.map(m => [m.field, m.severity, m.expected, m.actual])).toEqual([
                ['invoice_date', 'WARNING', '2024-03-12', '2024-03-13'],
            ]);
        });
    });

    describe('input failures', () => {
        it('fails an invoice with no line items without recomputing anything', () => {
            const result = reconcile(makeInput([]), []);

            expect(result.verdict).toBe('FAILED');
            expect(result.mismatches).toEqual([]);
            expect(result.lines).toEqual([]);
            expect(result.failures).toEqual([{ kind: 'EngineInputMissing', detail: 'Invoice has no line items' }]);
            expect(result.qrSummary?.invoiceNumber).toBe('INV-001');
        });

        it('fails an invoice without a QR payload', () => {
            const result = reconcile({ ...makeInput(), qr: null }, [resolved('18')]);

            expect(result.verdict).toBe('FAILED');
            expect(result.failures).toEqual([{ kind: 'EngineInputMissing', detail: 'Invoice has no QR payload' }]);
            expect(result.qrSummary).toBeNull();
        });

        it('fails an invoice whose QR was rejected', () => {
            const result = reconcile(
                { ...makeInput(), qr: { ok: false, error: { kind: 'signature', message: 'signature verification failed' } } },
                [resolved('18')]
            );

            expect(result.verdict).toBe('FAILED');
            expect(result.mismatches).toEqual([]);
            expect(result.failures).toEqual([
                { kind: 'MalformedPayload', detail: 'signature: signature verification failed' },
            ]);
        });
    });

    describe('contract', () => {
        it('throws when the input is missing', () => {
            expect(() => reconcile(null as unknown as ReconcileInput, [])).toThrow(ContractViolationError);
        });

        it('throws when rates are not aligned with items', () => {
            expect(() => reconcile(makeInput(), [])).toThrow(ContractViolationError);
        });
    });
});

describe('toleranceFor', () => {
    it('takes the smaller of the cap and the relative share', () => {
        expect(toleranceFor(dec('1000'), DEFAULT_RECONCILE_OPTIONS).toString()).toBe('1.00');
        expect(toleranceFor(dec('20'), DEFAULT_RECONCILE_OPTIONS).toString()).toBe('0.20');
    });
});

describe('classifyDelta', () => {
    const tolerance = dec('1.00');

    it('grades by distance from the tolerance', () => {
        expect(classifyDelta(dec('-1.00'), tolerance, DEFAULT_RECONCILE_OPTIONS)).toBeNull();
        expect(classifyDelta(dec('-1.01'), tolerance, DEFAULT_RECONCILE_OPTIONS)).toBe('WARNING');
        expect(classifyDelta(dec('5.00'), tolerance, DEFAULT_RECONCILE_OPTIONS)).toBe('WARNING');
        expect(classifyDelta(dec('5.01'), tolerance, DEFAULT_RECONCILE_OPTIONS)).toBe('CRITICAL');
    });
});

describe('summarizeReconciliation', () => {
    it('describes a reconciled invoice', () => {
        const result = reconcile(makeInput(), [resolved('18')]);

        expect(summarizeReconciliation(result)).toBe(
            'Verdict PASS; 1 line(s), taxable 1000.00, tax 180.00; 0 critical, 0 warning, 0 info mismatch(es)'
        );
    });

    it('lists failures for a failed invoice', () => {
        const result = reconcile(makeInput([]), []);

        expect(summarizeReconciliation(result)).toBe(
            'Verdict FAILED; Failures: EngineInputMissing (Invoice has no line items)'
        );
    });
});

function makeDefaultItems(): LineItem[] {
    return [makeItem(0)];
}
