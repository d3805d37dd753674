import { describe, expect, it } from 'vitest';
import { loadConfig, toReconcileOptions } from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import { TEST_SECRET } from './helpers.js';

const base = { QR_SHARED_SECRET: TEST_SECRET, QR_ALGORITHMS: 'HS256' };

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig(base);

        expect(config).toEqual({
            nodeEnv: 'development',
            logLevel: 'info',
            dbPath: 'data/reconciliation.db',
            rateTablePath: 'data/hsn_gst_map.json',
            remoteRateUrl: undefined,
            remoteTimeoutMs: 10000,
            qrPublicKeyPem: undefined,
            qrSharedSecret: TEST_SECRET,
            qrAlgorithms: ['HS256'],
            qrIssuers: ['NIC'],
            qrSupportedVersions: ['1.0', '1.1'],
            absoluteTolerance: '1.00',
            relativeTolerancePercent: '1',
            rateDriftTolerance: '0.01',
            criticalMultiplier: '5',
            rateSlabs: ['0', '5', '12', '18', '28'],
            workerConcurrency: 4,
        });
    });

    it('reads lists and numbers from the environment', () => {
        const config = loadConfig({
            ...base,
            QR_ISSUERS: 'NIC, GSTN',
            RECON_RATE_SLABS: '0,3,5',
            WORKER_CONCURRENCY: '8',
            GST_REMOTE_RATE_URL: 'https://rates.test/hsn',
        });

        expect(config.qrIssuers).toEqual(['NIC', 'GSTN']);
        expect(config.rateSlabs).toEqual(['0', '3', '5']);
        expect(config.workerConcurrency).toBe(8);
        expect(config.remoteRateUrl).toBe('https://rates.test/hsn');
    });

    it('requires exactly one QR key', () => {
        expect(() => loadConfig({})).toThrow('qrPublicKeyPem: Set exactly one of QR_PUBLIC_KEY_PEM or QR_SHARED_SECRET');
        expect(() => loadConfig({ ...base, QR_PUBLIC_KEY_PEM: 'pem' })).toThrow(ConfigurationError);
    });

    it('lists every invalid setting', () => {
        let error: unknown;
        try {
            loadConfig({ ...base, RECON_ABSOLUTE_TOLERANCE: '-1', WORKER_CONCURRENCY: '0', LOG_LEVEL: 'loud' });
        } catch (caught) {
            error = caught;
        }

        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error instanceof ConfigurationError && error.issues).toEqual([
            "logLevel: Invalid enum value. Expected 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent', received 'loud'",
            'absoluteTolerance: RECON_ABSOLUTE_TOLERANCE must be a non-negative decimal',
            'workerConcurrency: Number must be greater than or equal to 1',
        ]);
    });

    it('rejects a shared secret with asymmetric algorithms', () => {
        expect(() => loadConfig({ QR_SHARED_SECRET: TEST_SECRET })).toThrow(
            'qrAlgorithms: QR_SHARED_SECRET requires HS* algorithms only'
        );
    });
});

describe('toReconcileOptions', () => {
    it('converts thresholds to fixed-point values', () => {
        const options = toReconcileOptions(loadConfig({ ...base, RECON_ABSOLUTE_TOLERANCE: '2.50' }));

        expect(options.absoluteTolerance.toString()).toBe('2.50');
        expect(options.criticalMultiplier.toString()).toBe('5');
        expect(options.rateSlabs.map(s => s.toString())).toEqual(['0', '5', '12', '18', '28']);
        expect(options.amountPlaces).toBe(2);
    });
});
