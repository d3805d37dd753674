import * as fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { RateEntry } from '../types/rates.js';
import { Clock, systemClock } from '../utils/clock.js';
import { Fixed } from '../utils/fixedPoint.js';
import { normalizeProductCode } from '../utils/productCode.js';

// { "94035000": { "gst_rate": 18, "description": "Wooden furniture" } }
export const rateTableEntrySchema = z.object({
    gst_rate: z.union([z.number(), z.string()]),
    description: z.string().nullish(),
});

export const rateTableSchema = z.record(rateTableEntrySchema);

export type RateTableEntry = z.infer<typeof rateTableEntrySchema>;
export type RateTable = z.infer<typeof rateTableSchema>;

/**
 * Converts a parsed rate table into cache entries. Rows with an unusable
 * code or a rate outside 0-100 are reported back rather than loaded.
 */
export function rateTableToEntries(
    table: RateTable,
    clock: Clock = systemClock
): { entries: RateEntry[]; rejected: string[] } {
    const resolvedAt = clock.now().toISOString();
    const entries: RateEntry[] = [];
    const rejected: string[] = [];

    for (const [rawCode, row] of Object.entries(table)) {
        const productCode = normalizeProductCode(rawCode);
        const rate = Fixed.parse(row.gst_rate);

        if (!productCode || !rate || rate.isNegative() || rate.compare(Fixed.fromInt(100)) > 0) {
            rejected.push(rawCode);
            continue;
        }

        entries.push({
            productCode,
            rate,
            description: row.description ?? null,
            source: 'local-cache',
            resolvedAt,
        });
    }

    return { entries, rejected };
}

/**
 * Reads the local HSN -> GST JSON table. A missing file is an empty table;
 * an unreadable one is a configuration error.
 */
export function loadLocalRateTable(
    filePath: string,
    clock: Clock = systemClock
): { entries: RateEntry[]; rejected: string[] } {
    if (!fs.existsSync(filePath)) {
        return { entries: [], rejected: [] };
    }

    let json: unknown;
    try {
        json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError([`GST_RATE_TABLE_PATH: ${filePath} is not valid JSON (${reason})`]);
    }

    const parsed = rateTableSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(e => `GST_RATE_TABLE_PATH: ${e.path.join('.')}: ${e.message}`);
        throw new ConfigurationError(issues);
    }

    return rateTableToEntries(parsed.data, clock);
}
