import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { ReconcileOptions } from './services/reconcile.js';
import { Fixed } from './utils/fixedPoint.js';

const decimalText = (name: string) =>
    z.string().refine(value => {
        const parsed = Fixed.parse(value);
        return parsed !== null && !parsed.isNegative();
    }, `${name} must be a non-negative decimal`);

const list = (value: string | undefined, fallback: string): string[] =>
    (value ?? fallback)
        .split(',')
        .map(part => part.trim())
        .filter(part => part.length > 0);

/**
 * Configuration schema with validation
 */
const configSchema = z
    .object({
        nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
        logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

        // Persistence (sql.js file)
        dbPath: z.string().min(1),

        // Rates
        rateTablePath: z.string().min(1),
        remoteRateUrl: z.string().url('GST_REMOTE_RATE_URL must be a valid URL').optional(),
        remoteTimeoutMs: z.number().int().min(100).max(60000),

        // QR verification: exactly one of a public key or a shared secret
        qrPublicKeyPem: z.string().min(1).optional(),
        qrSharedSecret: z.string().min(16, 'QR_SHARED_SECRET must be at least 16 characters').optional(),
        qrAlgorithms: z.array(z.enum(['RS256', 'RS384', 'RS512', 'PS256', 'ES256', 'HS256', 'HS384', 'HS512'])).min(1),
        qrIssuers: z.array(z.string()),
        qrSupportedVersions: z.array(z.string()).min(1),

        // Reconciliation thresholds
        absoluteTolerance: decimalText('RECON_ABSOLUTE_TOLERANCE'),
        relativeTolerancePercent: decimalText('RECON_RELATIVE_TOLERANCE_PCT'),
        rateDriftTolerance: decimalText('RECON_RATE_DRIFT_PCT'),
        criticalMultiplier: decimalText('RECON_CRITICAL_MULTIPLIER'),
        rateSlabs: z.array(decimalText('RECON_RATE_SLABS')).min(1),

        workerConcurrency: z.number().int().min(1).max(64),
    })
    .superRefine((config, ctx) => {
        const keys = [config.qrPublicKeyPem, config.qrSharedSecret].filter(Boolean).length;
        if (keys !== 1) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['qrPublicKeyPem'],
                message: 'Set exactly one of QR_PUBLIC_KEY_PEM or QR_SHARED_SECRET',
            });
        }
        const symmetric = config.qrAlgorithms.filter(alg => alg.startsWith('HS'));
        if (config.qrSharedSecret && symmetric.length !== config.qrAlgorithms.length) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['qrAlgorithms'],
                message: 'QR_SHARED_SECRET requires HS* algorithms only',
            });
        }
        if (config.qrPublicKeyPem && symmetric.length > 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['qrAlgorithms'],
                message: 'QR_PUBLIC_KEY_PEM cannot be used with HS* algorithms',
            });
        }
    });

export type Config = z.infer<typeof configSchema>;

const toInt = (value: string | undefined, fallback: number): number =>
    value ? parseInt(value, 10) : fallback;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const raw = {
        nodeEnv: env['NODE_ENV'] || 'development',
        logLevel: env['LOG_LEVEL'] || 'info',
        dbPath: env['GST_DB_PATH'] || 'data/reconciliation.db',
        rateTablePath: env['GST_RATE_TABLE_PATH'] || 'data/hsn_gst_map.json',
        remoteRateUrl: env['GST_REMOTE_RATE_URL'] || undefined,
        remoteTimeoutMs: toInt(env['GST_REMOTE_TIMEOUT_MS'], 10000),
        qrPublicKeyPem: env['QR_PUBLIC_KEY_PEM']?.replace(/\\n/g, '\n') || undefined,
        qrSharedSecret: env['QR_SHARED_SECRET'] || undefined,
        qrAlgorithms: list(env['QR_ALGORITHMS'], 'RS256'),
        qrIssuers: list(env['QR_ISSUERS'], 'NIC'),
        qrSupportedVersions: list(env['QR_SUPPORTED_VERSIONS'], '1.0,1.1'),
        absoluteTolerance: env['RECON_ABSOLUTE_TOLERANCE'] || '1.00',
        relativeTolerancePercent: env['RECON_RELATIVE_TOLERANCE_PCT'] || '1',
        rateDriftTolerance: env['RECON_RATE_DRIFT_PCT'] || '0.01',
        criticalMultiplier: env['RECON_CRITICAL_MULTIPLIER'] || '5',
        rateSlabs: list(env['RECON_RATE_SLABS'], '0,5,12,18,28'),
        workerConcurrency: toInt(env['WORKER_CONCURRENCY'], 4),
    };

    const result = configSchema.safeParse(raw);

    if (!result.success) {
        const errors = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
        throw new ConfigurationError(errors);
    }

    return result.data;
}

/** Reconciliation thresholds as fixed-point values. */
export function toReconcileOptions(config: Config): ReconcileOptions {
    return {
        absoluteTolerance: parseDecimal(config.absoluteTolerance),
        relativeTolerancePercent: parseDecimal(config.relativeTolerancePercent),
        rateDriftTolerance: parseDecimal(config.rateDriftTolerance),
        criticalMultiplier: parseDecimal(config.criticalMultiplier),
        rateSlabs: config.rateSlabs.map(parseDecimal),
        amountPlaces: 2,
    };
}

function parseDecimal(value: string): Fixed {
    const parsed = Fixed.parse(value);
    if (parsed === null) {
        throw new ConfigurationError([`Not a decimal: ${value}`]);
    }
    return parsed;
}
