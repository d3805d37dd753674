import type { Logger } from 'pino';
import { LineItem } from '../types/invoice.js';
import { RateResolution, RemoteRateLookup } from '../types/rates.js';
import { raceAbort } from '../utils/abort.js';
import { Clock, systemClock } from '../utils/clock.js';
import { normalizeProductCode } from '../utils/productCode.js';
import { RateCache } from './rateCache.js';
import { RemoteRateSource } from './remoteRateSource.js';

/**
 * Rate Resolver - HSN/SAC code to GST rate.
 *
 * Lookup order: shared cache, then the remote source. Concurrent lookups of
 * the same uncached code share a single in-flight fetch; lookups of other
 * codes never wait on it. Failures come back as `unresolved`, never thrown.
 */
export class RateResolver {
    private readonly inflight = new Map<string, Promise<RateResolution>>();
    private readonly log: Logger;

    constructor(
        private readonly cache: RateCache,
        private readonly remote: RemoteRateSource | null,
        logger: Logger,
        private readonly clock: Clock = systemClock
    ) {
        this.log = logger.child({ component: 'RateResolver' });
    }

    async resolve(productCode: string | null, signal?: AbortSignal): Promise<RateResolution> {
        const code = productCode === null ? null : normalizeProductCode(productCode);
        if (code === null) {
            return { status: 'unresolved', productCode, reason: 'invalid_code' };
        }

        if (signal?.aborted) {
            return { status: 'unresolved', productCode: code, reason: 'cancelled' };
        }

        const cached = this.cache.get(code);
        if (cached) {
            return { status: 'resolved', productCode: code, rate: cached.rate, source: 'local-cache' };
        }

        if (!this.remote) {
            return { status: 'unresolved', productCode: code, reason: 'no_remote_source' };
        }

        let pending = this.inflight.get(code);
        if (!pending) {
            pending = this.fetchAndStore(code, this.remote).finally(() => this.inflight.delete(code));
            this.inflight.set(code, pending);
        } else {
            this.log.debug({ productCode: code }, 'Joining in-flight rate lookup');
        }

        if (!signal) {
            return pending;
        }
        return raceAbort<RateResolution>(pending, signal, () => ({
            status: 'unresolved',
            productCode: code,
            reason: 'cancelled',
        }));
    }

    get pendingLookups(): number {
        return this.inflight.size;
    }

    private async fetchAndStore(code: string, remote: RemoteRateSource): Promise<RateResolution> {
        let lookup: RemoteRateLookup;
        try {
            lookup = await remote.fetchRate(code);
        } catch (error) {
            this.log.warn({ productCode: code, err: error }, 'Remote rate source threw');
            const detail = error instanceof Error ? error.message : String(error);
            return { status: 'unresolved', productCode: code, reason: 'fetch_failed', detail };
        }

        switch (lookup.status) {
            case 'not_found':
                this.log.info({ productCode: code }, 'No GST rate found for code');
                return { status: 'unresolved', productCode: code, reason: 'not_found' };
            case 'error':
                return { status: 'unresolved', productCode: code, reason: lookup.reason, detail: lookup.detail };
            case 'found':
                break;
        }

        try {
            this.cache.upsert({
                productCode: code,
                rate: lookup.rate,
                description: lookup.description,
                source: 'remote',
                resolvedAt: this.clock.now().toISOString(),
            });
        } catch (error) {
            // The rate is still good for this invoice; the next lookup retries.
            this.log.error({ productCode: code, err: error }, 'Failed to persist fetched rate');
        }

        this.log.info({ productCode: code, rate: lookup.rate.toString() }, 'Fetched GST rate from remote source');
        return { status: 'resolved', productCode: code, rate: lookup.rate, source: 'remote' };
    }
}

/**
 * Resolves every line's rate concurrently. The output is index-aligned with
 * `items`, whatever order the lookups finish in.
 */
export function resolveLineRates(
    items: readonly LineItem[],
    resolver: RateResolver,
    signal?: AbortSignal
): Promise<RateResolution[]> {
    return Promise.all(items.map(item => resolver.resolve(item.productCode, signal)));
}
