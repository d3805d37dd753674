import type { Logger } from 'pino';
import { Database } from 'sql.js';
import { Config, toReconcileOptions } from './config.js';
import { closeDatabase, openDatabase, saveDatabase } from './db/connection.js';
import { SqlRateStore } from './db/rateStore.js';
import { ReviewStore } from './db/reviewStore.js';
import { ContractViolationError } from './errors.js';
import { createLogger } from './logger.js';
import { createQrVerificationKey, QrPayloadParser, QrVerificationKey } from './qr/qrParser.js';
import { loadLocalRateTable } from './rates/localRateTable.js';
import { RateCache } from './rates/rateCache.js';
import { resolveLineRates, RateResolver } from './rates/rateResolver.js';
import { HttpRateSource, RemoteRateSource } from './rates/remoteRateSource.js';
import { normalizeLineItems, normalizeMetadata } from './services/normalize.js';
import { failedResult, reconcile, summarizeReconciliation } from './services/reconcile.js';
import { buildReviewRecord } from './services/report.js';
import { InvoiceInput } from './types/invoice.js';
import { AuditEntry, InputFailure, ReconciliationResult } from './types/output.js';
import { QrParseResult, QrSummary } from './types/qr.js';
import { RateResolution } from './types/rates.js';
import { ReviewRecord, ReviewSummaryRow } from './types/report.js';
import { createAuditEntry } from './utils/auditTrail.js';
import { Clock, systemClock } from './utils/clock.js';

export interface PipelineDependencies {
    logger?: Logger;
    clock?: Clock;
    /** Use this database instead of opening `config.dbPath`; it is never written to disk. */
    db?: Database;
    /** Overrides the HTTP source built from `GST_REMOTE_RATE_URL`; null disables remote lookups. */
    remote?: RemoteRateSource | null;
    qrKey?: QrVerificationKey;
    /** Shares one rate cache between pipelines. */
    rateCache?: RateCache;
}

export interface ProcessingOutcome {
    result: ReconciliationResult;
    record: ReviewRecord;
    auditTrail: AuditEntry[];
    /** false when the review record could not be written; the result still stands */
    persisted: boolean;
}

export interface BatchOptions {
    signal?: AbortSignal;
    concurrency?: number;
}

export interface Pipeline {
    processInvoice(input: InvoiceInput, signal?: AbortSignal): Promise<ProcessingOutcome>;
    processBatch(inputs: readonly InvoiceInput[], options?: BatchOptions): Promise<ProcessingOutcome[]>;
    getReview(invoiceId: string): ReviewRecord | null;
    listReviews(): ReviewSummaryRow[];
    readonly rateCache: RateCache;
    shutdown(): void;
}

const cancelledFailure: InputFailure = { kind: 'Cancelled', detail: 'Processing was cancelled' };

/**
 * Main Invoice Processor - wires the rate cache, resolver, QR parser and
 * review store, and runs each invoice through
 * normalize -> parse -> resolve -> reconcile -> report.
 */
export async function createPipeline(config: Config, deps: PipelineDependencies = {}): Promise<Pipeline> {
    const logger = deps.logger ?? createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });
    const log = logger.child({ component: 'Pipeline' });
    const clock = deps.clock ?? systemClock;

    const db = deps.db ?? (await openDatabase(config.dbPath));
    const dbPath = deps.db ? null : config.dbPath;

    // Rate cache: persisted lookups first, then the local table on top
    let rateCache = deps.rateCache;
    if (!rateCache) {
        rateCache = new RateCache(new SqlRateStore(db));
        const restored = rateCache.warm();
        const table = loadLocalRateTable(config.rateTablePath, clock);
        rateCache.seed(table.entries);
        if (table.rejected.length > 0) {
            log.warn({ rejected: table.rejected }, 'Skipped unusable rate table rows');
        }
        log.info({ restored, local: table.entries.length }, 'Rate cache ready');
    }

    const remote =
        deps.remote !== undefined
            ? deps.remote
            : config.remoteRateUrl
              ? new HttpRateSource({ baseUrl: config.remoteRateUrl, timeoutMs: config.remoteTimeoutMs }, logger)
              : null;

    const qrKey =
        deps.qrKey ??
        (await createQrVerificationKey({
            publicKeyPem: config.qrPublicKeyPem,
            sharedSecret: config.qrSharedSecret,
            algorithm: config.qrAlgorithms[0],
        }));

    const parser = new QrPayloadParser(
        {
            key: qrKey,
            algorithms: config.qrAlgorithms,
            issuers: config.qrIssuers,
            supportedVersions: config.qrSupportedVersions,
        },
        logger
    );
    const resolver = new RateResolver(rateCache, remote, logger, clock);
    const reviewStore = new ReviewStore(db, clock);
    const reconcileOptions = toReconcileOptions(config);
    const cache = rateCache;

    async function runSteps(input: InvoiceInput, auditTrail: AuditEntry[], signal?: AbortSignal) {
        // Step 1: NORMALIZE - coerce raw extraction output
        const normalized = normalizeLineItems(input.lineItems);
        const metadata = normalizeMetadata(input.metadata);
        auditTrail.push(normalized.auditEntry);
        const base = { invoiceId: input.invoiceId, metadata, items: normalized.items };

        // Step 2: PARSE - verify and decode the QR payload
        const qr: QrParseResult | null = input.qrPayload === null ? null : await parser.parse(input.qrPayload);
        auditTrail.push(createAuditEntry('parse', describeQr(qr), clock));

        if (signal?.aborted) {
            return failedResult(base, verifiedSummary(qr), [cancelledFailure]);
        }

        // Step 3: RESOLVE - rates for every line, only when the invoice can be reconciled
        let rates: RateResolution[] = [];
        if (qr !== null && qr.ok && normalized.items.length > 0) {
            rates = await resolveLineRates(normalized.items, resolver, signal);
            const resolved = rates.filter(r => r.status === 'resolved').length;
            auditTrail.push(
                createAuditEntry('resolve', `Resolved ${resolved} of ${rates.length} line rate(s)`, clock)
            );

            if (signal?.aborted) {
                return failedResult(base, qr.summary, [cancelledFailure]);
            }
        }

        // Step 4: RECONCILE - recompute and compare
        return reconcile({ ...base, qr }, rates, reconcileOptions);
    }

    async function processInvoice(input: InvoiceInput, signal?: AbortSignal): Promise<ProcessingOutcome> {
        const invoiceLog = log.child({ invoiceId: input.invoiceId });
        const auditTrail: AuditEntry[] = [];

        let result: ReconciliationResult;
        if (signal?.aborted) {
            result = failedResult(
                { invoiceId: input.invoiceId, metadata: normalizeMetadata(input.metadata), items: [] },
                null,
                [cancelledFailure]
            );
        } else {
            try {
                result = await runSteps(input, auditTrail, signal);
            } catch (error) {
                if (error instanceof ContractViolationError) {
                    throw error;
                }
                invoiceLog.error({ err: error }, 'Unexpected error while processing invoice');
                const detail = error instanceof Error ? error.message : String(error);
                result = failedResult(
                    { invoiceId: input.invoiceId, metadata: normalizeMetadata(input.metadata), items: [] },
                    null,
                    [{ kind: 'InternalError', detail }]
                );
            }
        }
        auditTrail.push(createAuditEntry('reconcile', summarizeReconciliation(result), clock));

        // Step 5: REPORT - flatten and persist
        const record = buildReviewRecord(result);
        let persisted = true;
        try {
            reviewStore.save(record);
            saveDatabase(db, dbPath);
            auditTrail.push(
                createAuditEntry(
                    'report',
                    `Saved review record: ${record.lines.length} line row(s), ${record.mismatches.length} mismatch row(s)`,
                    clock
                )
            );
        } catch (error) {
            persisted = false;
            invoiceLog.error({ err: error }, 'Failed to persist review record');
            const detail = error instanceof Error ? error.message : String(error);
            auditTrail.push(createAuditEntry('report', `Review record not saved: ${detail}`, clock));
        }

        invoiceLog.info(
            {
                verdict: result.verdict,
                mismatches: result.mismatches.length,
                failures: result.failures.length,
                persisted,
            },
            'Invoice reconciled'
        );
        return { result, record, auditTrail, persisted };
    }

    async function processBatch(
        inputs: readonly InvoiceInput[],
        options: BatchOptions = {}
    ): Promise<ProcessingOutcome[]> {
        const concurrency = options.concurrency ?? config.workerConcurrency;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new ContractViolationError(`Concurrency must be a positive integer, got ${concurrency}`);
        }

        const outcomes = new Array<ProcessingOutcome>(inputs.length);
        let next = 0;

        // Each worker pulls the next unstarted invoice until none are left
        const worker = async (): Promise<void> => {
            while (next < inputs.length) {
                const index = next++;
                outcomes[index] = await processInvoice(inputs[index], options.signal);
            }
        };

        const workers = Array.from({ length: Math.min(concurrency, inputs.length) }, () => worker());
        await Promise.all(workers);

        log.info({ invoices: inputs.length, concurrency }, 'Batch complete');
        return outcomes;
    }

    return {
        processInvoice,
        processBatch,
        getReview: invoiceId => reviewStore.getByInvoice(invoiceId),
        listReviews: () => reviewStore.listSummaries(),
        rateCache: cache,
        shutdown: () => closeDatabase(db, dbPath),
    };
}

function verifiedSummary(qr: QrParseResult | null): QrSummary | null {
    if (qr === null || !qr.ok) return null;
    return qr.summary;
}

function describeQr(qr: QrParseResult | null): string {
    if (qr === null) return 'No QR payload supplied';
    if (!qr.ok) return `QR payload rejected (${qr.error.kind}): ${qr.error.message}`;
    return `Verified QR for ${qr.summary.invoiceNumber} from ${qr.summary.sellerGstin}`;
}

// Export all types
export * from './types/index.js';
export { loadConfig, toReconcileOptions } from './config.js';
export type { Config } from './config.js';
export { ConfigurationError, ContractViolationError } from './errors.js';
export { createLogger } from './logger.js';
export { openDatabase, saveDatabase, closeDatabase } from './db/connection.js';
export { ReviewStore } from './db/reviewStore.js';
export { SqlRateStore } from './db/rateStore.js';
export { createQrVerificationKey, QrPayloadParser } from './qr/qrParser.js';
export { RateCache } from './rates/rateCache.js';
export { RateResolver, resolveLineRates } from './rates/rateResolver.js';
export { HttpRateSource } from './rates/remoteRateSource.js';
export type { RemoteRateSource } from './rates/remoteRateSource.js';
export { normalizeLineItems, normalizeMetadata } from './services/normalize.js';
export { reconcile, DEFAULT_RECONCILE_OPTIONS } from './services/reconcile.js';
export type { ReconcileOptions } from './services/reconcile.js';
export { buildReviewRecord, toRowValues } from './services/report.js';
