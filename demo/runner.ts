import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { CompactSign } from 'jose';
import { z } from 'zod';
import { createPipeline, loadConfig, ProcessingOutcome } from '../src/index.js';
import { InvoiceInput } from '../src/types/invoice.js';

// ==========================================
// DEMO RUNNER - GST Invoice Reconciliation
// ==========================================

const DIVIDER = '='.repeat(80);
const SECTION = '-'.repeat(80);

// Placeholder secret for locally signed demo QR codes
const DEMO_SECRET = 'demo-secret-demo-secret-demo-secret';

const sampleSchema = z.array(
    z.object({
        invoiceId: z.string(),
        description: z.string(),
        metadata: z.record(z.unknown()),
        lineItems: z.array(z.record(z.unknown())),
        qr: z.object({ iss: z.string(), data: z.record(z.unknown()) }).optional(),
        rawQr: z.string().optional(),
    })
);

type Sample = z.infer<typeof sampleSchema>[number];

async function signQr(claims: NonNullable<Sample['qr']>): Promise<string> {
    // The authority stores the invoice summary as a JSON string in `data`
    const payload = JSON.stringify({ iss: claims.iss, data: JSON.stringify(claims.data) });
    return new CompactSign(new TextEncoder().encode(payload))
        .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
        .sign(new TextEncoder().encode(DEMO_SECRET));
}

async function loadData(): Promise<{ samples: Sample[]; inputs: InvoiceInput[] }> {
    const file = path.join(process.cwd(), 'data', 'sample_invoices.json');
    const samples = sampleSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));

    const inputs = await Promise.all(
        samples.map(async sample => ({
            invoiceId: sample.invoiceId,
            metadata: sample.metadata,
            lineItems: sample.lineItems,
            qrPayload: sample.qr ? await signQr(sample.qr) : sample.rawQr ?? null,
        }))
    );

    return { samples, inputs };
}

function printHeader(text: string) {
    console.log('\n' + chalk.cyan(DIVIDER));
    console.log(chalk.cyan.bold(`  ${text.toUpperCase()}`));
    console.log(chalk.cyan(DIVIDER));
}

function printSubHeader(text: string) {
    console.log('\n' + chalk.yellow(SECTION));
    console.log(chalk.yellow.bold(`  ${text}`));
    console.log(chalk.yellow(SECTION));
}

function printOutcome(outcome: ProcessingOutcome) {
    const { result, record } = outcome;

    console.log('\n' + chalk.white.bold('Verdict:'));
    switch (result.verdict) {
        case 'PASS':
            console.log(chalk.green.bold('  PASS'));
            break;
        case 'FLAGGED':
            console.log(chalk.yellow.bold('  FLAGGED FOR REVIEW'));
            break;
        case 'FAILED':
            console.log(chalk.red.bold('  FAILED'));
            break;
    }

    if (!outcome.persisted) {
        console.log(chalk.red('  Review record was not saved'));
    }

    if (result.failures.length > 0) {
        console.log('\n' + chalk.white.bold('Failures:'));
        result.failures.forEach(f => console.log(chalk.red(`  ${f.kind}: ${f.detail}`)));
    }

    const summary = record.summary;
    console.log('\n' + chalk.white.bold('Totals:'));
    console.log(chalk.gray(`  Taxable   recomputed ${summary.recomputedTaxableValue ?? '-'}  declared ${summary.declaredTaxableValue ?? '-'}`));
    console.log(chalk.gray(`  Tax       recomputed ${summary.recomputedTaxTotal ?? '-'}  declared ${summary.declaredTaxTotal ?? '-'}`));
    console.log(chalk.gray(`  Invoice   declared ${summary.declaredGrandTotal ?? '-'}`));

    if (record.mismatches.length > 0) {
        console.log('\n' + chalk.white.bold('Mismatches:'));
        record.mismatches.forEach(m => {
            const colour = m.severity === 'CRITICAL' ? chalk.red : m.severity === 'WARNING' ? chalk.yellow : chalk.gray;
            console.log(`  ${colour(`[${m.severity}]`)} ${chalk.white(m.field)} ${chalk.gray(m.code)}`);
            console.log(chalk.gray(`    ${m.message}`));
        });
    }

    console.log('\n' + chalk.white.bold('Audit Trail:'));
    outcome.auditTrail.forEach(entry => {
        console.log(chalk.gray(`  [${entry.step.toUpperCase()}] ${entry.timestamp}`));
        console.log(chalk.gray(`    ${entry.details.substring(0, 100)}${entry.details.length > 100 ? '...' : ''}`));
    });
}

async function runDemo() {
    console.log(chalk.cyan.bold(`
${DIVIDER}
GST INVOICE RECONCILIATION - DEMONSTRATION
${DIVIDER}

Extracted line items are cross-checked against the signed e-invoice QR:
normalize -> parse -> resolve -> reconcile -> report

${DIVIDER}
  `));

    // Demo defaults: in-repo rate table and a separate database
    process.env['NODE_ENV'] ??= 'development';
    process.env['LOG_LEVEL'] ??= 'warn';
    process.env['GST_DB_PATH'] ??= path.join('data', 'demo.db');

    // Sample QR codes are signed locally, so the demo key replaces any key from .env
    const config = loadConfig({
        ...process.env,
        QR_PUBLIC_KEY_PEM: undefined,
        QR_SHARED_SECRET: DEMO_SECRET,
        QR_ALGORITHMS: 'HS256',
    });
    const pipeline = await createPipeline(config);

    try {
        const { samples, inputs } = await loadData();
        const outcomes = await pipeline.processBatch(inputs);

        outcomes.forEach((outcome, i) => {
            printHeader(`${samples[i].invoiceId}: ${samples[i].description}`);
            printOutcome(outcome);
        });

        printSubHeader('Stored Review Summaries');
        pipeline.listReviews().forEach(row => {
            console.log(chalk.gray(`  ${row.invoiceId}  ${row.invoiceNumber ?? '-'}  ${row.verdict}  critical=${row.criticalCount} warning=${row.warningCount}`));
        });

        printHeader('SAMPLE OUTPUT - JSON Format (demo-002)');
        console.log(JSON.stringify(outcomes[1]?.record, null, 2));
    } finally {
        pipeline.shutdown();
    }

    console.log(chalk.cyan.bold(`\n${DIVIDER}\nDEMONSTRATION COMPLETE\n${DIVIDER}\n`));
}

// Run the demo
runDemo().catch(err => {
    console.error(chalk.red('Demo failed:'), err);
    process.exit(1);
});
