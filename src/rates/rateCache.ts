import { RateEntry } from '../types/rates.js';

// Durable backing for the cache (the sql.js rate_cache table in production)
export interface RateStore {
    loadAll(): RateEntry[];
    upsert(entry: RateEntry): void;
}

/**
 * Shared HSN/SAC -> rate cache. One instance is handed to every resolver
 * that should share lookups. Reads are plain map lookups; writes go to the
 * store first and only then become visible, so a failed or abandoned write
 * leaves no partial entry behind.
 */
export class RateCache {
    private readonly entries = new Map<string, RateEntry>();

    constructor(private readonly store: RateStore | null = null) {}

    /** Loads entries without writing them back (local table, persisted rows). */
    seed(entries: Iterable<RateEntry>): number {
        let count = 0;
        for (const entry of entries) {
            this.entries.set(entry.productCode, Object.freeze({ ...entry }));
            count++;
        }
        return count;
    }

    /** Seeds from the persistent store, if any. */
    warm(): number {
        return this.store ? this.seed(this.store.loadAll()) : 0;
    }

    get(productCode: string): RateEntry | undefined {
        return this.entries.get(productCode);
    }

    has(productCode: string): boolean {
        return this.entries.has(productCode);
    }

    upsert(entry: RateEntry): void {
        const frozen = Object.freeze({ ...entry });
        this.store?.upsert(frozen);
        this.entries.set(frozen.productCode, frozen);
    }

    get size(): number {
        return this.entries.size;
    }

    snapshot(): RateEntry[] {
        return [...this.entries.values()].sort((a, b) => a.productCode.localeCompare(b.productCode));
    }
}
