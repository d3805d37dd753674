import { Fixed } from '../utils/fixedPoint.js';

export type RateSource = 'local-cache' | 'remote';

export interface RateEntry {
    productCode: string;
    rate: Fixed;
    description: string | null;
    source: RateSource;
    resolvedAt: string;
}

export type RateUnresolvedReason =
    | 'invalid_code'
    | 'no_remote_source'
    | 'not_found'
    | 'timeout'
    | 'malformed_response'
    | 'fetch_failed'
    | 'cancelled';

export type RateResolution =
    | { status: 'resolved'; productCode: string; rate: Fixed; source: RateSource }
    | { status: 'unresolved'; productCode: string | null; reason: RateUnresolvedReason; detail?: string };

export type RemoteRateLookup =
    | { status: 'found'; rate: Fixed; description: string | null }
    | { status: 'not_found' }
    | { status: 'error'; reason: 'timeout' | 'malformed_response' | 'fetch_failed'; detail: string };
