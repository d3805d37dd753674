import type { Logger } from 'pino';
import { z } from 'zod';
import { RemoteRateLookup } from '../types/rates.js';
import { Fixed } from '../utils/fixedPoint.js';
import { RateTableEntry, rateTableEntrySchema } from './localRateTable.js';

export interface RemoteRateSource {
    fetchRate(productCode: string): Promise<RemoteRateLookup>;
}

export interface HttpRateSourceConfig {
    /** Base URL; the code is appended as the last path segment */
    baseUrl: string;
    /** Per-request timeout (ms) */
    timeoutMs: number;
}

// The remote answers with a single entry or with a table keyed by code
const remoteTableSchema = z.record(rateTableEntrySchema);

/**
 * HTTP rate source: GET {baseUrl}/{code}. Every failure mode is returned as
 * a lookup status; nothing is thrown to the resolver.
 */
export class HttpRateSource implements RemoteRateSource {
    private readonly log: Logger;

    constructor(
        private readonly config: HttpRateSourceConfig,
        logger: Logger,
        private readonly fetchImpl: typeof fetch = fetch
    ) {
        this.log = logger.child({ component: 'HttpRateSource' });
    }

    async fetchRate(productCode: string): Promise<RemoteRateLookup> {
        const url = `${this.config.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(productCode)}`;

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                headers: { accept: 'application/json' },
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (error) {
            const name = error instanceof Error ? error.name : '';
            const detail = error instanceof Error ? error.message : String(error);
            if (name === 'TimeoutError' || name === 'AbortError') {
                this.log.warn({ productCode, timeoutMs: this.config.timeoutMs }, 'Rate lookup timed out');
                return { status: 'error', reason: 'timeout', detail };
            }
            this.log.warn({ productCode, err: error }, 'Rate lookup failed');
            return { status: 'error', reason: 'fetch_failed', detail };
        }

        if (response.status === 404) {
            return { status: 'not_found' };
        }
        if (!response.ok) {
            return { status: 'error', reason: 'fetch_failed', detail: `HTTP ${response.status}` };
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (error) {
            const detail = error instanceof Error ? error.message : String(error);
            return { status: 'error', reason: 'malformed_response', detail };
        }

        let entry: RateTableEntry | undefined;
        const single = rateTableEntrySchema.safeParse(body);
        if (single.success) {
            entry = single.data;
        } else {
            const table = remoteTableSchema.safeParse(body);
            if (!table.success) {
                return { status: 'error', reason: 'malformed_response', detail: table.error.errors[0]?.message ?? 'invalid body' };
            }
            entry = table.data[productCode];
        }

        if (!entry) {
            return { status: 'not_found' };
        }

        const rate = Fixed.parse(entry.gst_rate);
        if (!rate || rate.isNegative() || rate.compare(Fixed.fromInt(100)) > 0) {
            return { status: 'error', reason: 'malformed_response', detail: `Unusable rate ${String(entry.gst_rate)}` };
        }

        return { status: 'found', rate, description: entry.description ?? null };
    }
}
