import { Database } from 'sql.js';
import { RateStore } from '../rates/rateCache.js';
import { RateEntry, RateSource } from '../types/rates.js';
import { Fixed } from '../utils/fixedPoint.js';
import { optionalTextColumn, queryRows, textColumn } from './connection.js';

const isRateSource = (value: string): value is RateSource => value === 'local-cache' || value === 'remote';

/**
 * sql.js-backed RateStore. Rates are stored as decimal text so that they
 * reload bit-for-bit.
 */
export class SqlRateStore implements RateStore {
    constructor(private readonly db: Database) {}

    loadAll(): RateEntry[] {
        const rows = queryRows(
            this.db,
            'SELECT product_code, rate, description, source, resolved_at FROM rate_cache ORDER BY product_code'
        );

        const entries: RateEntry[] = [];
        for (const row of rows) {
            const rate = Fixed.parse(textColumn(row, 'rate'));
            const source = textColumn(row, 'source');
            if (!rate || !isRateSource(source)) continue;

            entries.push({
                productCode: textColumn(row, 'product_code'),
                rate,
                description: optionalTextColumn(row, 'description'),
                source,
                resolvedAt: textColumn(row, 'resolved_at'),
            });
        }
        return entries;
    }

    upsert(entry: RateEntry): void {
        this.db.run(
            `INSERT INTO rate_cache (product_code, rate, description, source, resolved_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(product_code) DO UPDATE SET
         rate = excluded.rate,
         description = excluded.description,
         source = excluded.source,
         resolved_at = excluded.resolved_at`,
            [entry.productCode, entry.rate.toString(), entry.description, entry.source, entry.resolvedAt]
        );
    }
}
