import { Database } from 'sql.js';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
    ReviewRecord,
    ReviewSummaryRow,
    reviewLineRowSchema,
    reviewMismatchRowSchema,
    reviewSummaryRowSchema,
} from '../types/report.js';
import { Clock, systemClock } from '../utils/clock.js';
import { inTransaction, queryRows, textColumn } from './connection.js';

function parseRow<S extends z.ZodTypeAny>(schema: S, json: string): z.infer<S> {
    return schema.parse(JSON.parse(json));
}

/**
 * Review Store - persists review records. Saving an invoice again replaces
 * its previous rows, so reprocessing never duplicates output.
 */
export class ReviewStore {
    constructor(
        private readonly db: Database,
        private readonly clock: Clock = systemClock
    ) {}

    save(record: ReviewRecord): void {
        const invoiceId = record.summary.invoiceId;
        const createdAt = this.clock.now().toISOString();

        inTransaction(this.db, () => {
            this.db.run('DELETE FROM review_summaries WHERE invoice_id = ?', [invoiceId]);
            this.db.run('DELETE FROM review_lines WHERE invoice_id = ?', [invoiceId]);
            this.db.run('DELETE FROM review_mismatches WHERE invoice_id = ?', [invoiceId]);

            this.db.run(
                `INSERT INTO review_summaries (id, invoice_id, invoice_number, verdict, row_json, created_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
                [
                    uuidv4(),
                    invoiceId,
                    record.summary.invoiceNumber,
                    record.summary.verdict,
                    JSON.stringify(record.summary),
                    createdAt,
                ]
            );

            for (const line of record.lines) {
                this.db.run(
                    'INSERT INTO review_lines (id, invoice_id, position, row_json) VALUES (?, ?, ?, ?)',
                    [uuidv4(), invoiceId, line.position, JSON.stringify(line)]
                );
            }

            for (const mismatch of record.mismatches) {
                this.db.run(
                    `INSERT INTO review_mismatches (id, invoice_id, sequence, severity, row_json)
           VALUES (?, ?, ?, ?, ?)`,
                    [uuidv4(), invoiceId, mismatch.sequence, mismatch.severity, JSON.stringify(mismatch)]
                );
            }
        });
    }

    getByInvoice(invoiceId: string): ReviewRecord | null {
        const [summaryRow] = queryRows(this.db, 'SELECT row_json FROM review_summaries WHERE invoice_id = ?', [
            invoiceId,
        ]);
        if (!summaryRow) return null;

        const lines = queryRows(
            this.db,
            'SELECT row_json FROM review_lines WHERE invoice_id = ? ORDER BY position',
            [invoiceId]
        ).map(row => parseRow(reviewLineRowSchema, textColumn(row, 'row_json')));

        const mismatches = queryRows(
            this.db,
            'SELECT row_json FROM review_mismatches WHERE invoice_id = ? ORDER BY sequence',
            [invoiceId]
        ).map(row => parseRow(reviewMismatchRowSchema, textColumn(row, 'row_json')));

        return {
            summary: parseRow(reviewSummaryRowSchema, textColumn(summaryRow, 'row_json')),
            lines,
            mismatches,
        };
    }

    listSummaries(): ReviewSummaryRow[] {
        return queryRows(this.db, 'SELECT row_json FROM review_summaries ORDER BY invoice_id').map(row =>
            parseRow(reviewSummaryRowSchema, textColumn(row, 'row_json'))
        );
    }
}
