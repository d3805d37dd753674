import { compactVerify, errors, importSPKI, type KeyLike } from 'jose';
import type { Logger } from 'pino';
import { z } from 'zod';
import { MalformedPayload, MalformedPayloadKind, QrParseResult, QrSummary } from '../types/qr.js';
import { normalizeDate } from '../utils/dates.js';
import { Fixed } from '../utils/fixedPoint.js';
import { normalizeGstin, normalizeProductCode } from '../utils/productCode.js';

export type QrVerificationKey = KeyLike | Uint8Array;

export interface QrParserOptions {
    key: QrVerificationKey;
    /** JWS algorithms accepted for the signature, e.g. ['RS256'] */
    algorithms: string[];
    /** Accepted `iss` claims; empty accepts any issuer */
    issuers: string[];
    supportedVersions: string[];
}

const SEGMENT = /^[A-Za-z0-9_-]+$/;

const decimal = z.union([z.number(), z.string()]);

const claimsSchema = z
    .object({
        iss: z.string().optional(),
        data: z.union([z.string(), z.record(z.unknown())]),
    })
    .passthrough();

// Field names follow the e-invoice signed QR schema
const invoiceDataSchema = z
    .object({
        SellerGstin: z.string().min(1),
        BuyerGstin: z.string().nullish(),
        DocNo: z.string().min(1),
        DocTyp: z.string().nullish(),
        DocDt: z.string().min(1),
        TotInvVal: decimal,
        ItemCnt: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]).nullish(),
        MainHsnCode: z.union([z.string(), z.number()]).nullish(),
        Irn: z.string().nullish(),
        IrnDt: z.string().nullish(),
        AssVal: decimal.nullish(),
        CgstVal: decimal.nullish(),
        SgstVal: decimal.nullish(),
        IgstVal: decimal.nullish(),
        CesVal: decimal.nullish(),
        Version: z.union([z.string(), z.number()]).nullish(),
    })
    .passthrough();

class PayloadRejected extends Error {
    constructor(readonly kind: MalformedPayloadKind, message: string) {
        super(message);
    }
}

/**
 * Builds the verification key: an SPKI PEM public key for asymmetric
 * algorithms, or the raw bytes of a shared secret for HS*.
 */
export async function createQrVerificationKey(options: {
    publicKeyPem?: string;
    sharedSecret?: string;
    algorithm: string;
}): Promise<QrVerificationKey> {
    if (options.publicKeyPem) {
        return importSPKI(options.publicKeyPem, options.algorithm);
    }
    if (options.sharedSecret) {
        return new TextEncoder().encode(options.sharedSecret);
    }
    throw new Error('A QR public key or shared secret is required');
}

/**
 * QR Payload Parser - verifies the signed authority token and decodes it
 * into a QrSummary. Nothing in the payload is read before the signature has
 * been checked. Every rejection is returned as a MalformedPayload value.
 */
export class QrPayloadParser {
    private readonly log: Logger;

    constructor(private readonly options: QrParserOptions, logger: Logger) {
        this.log = logger.child({ component: 'QrPayloadParser' });
    }

    async parse(raw: string | null | undefined): Promise<QrParseResult> {
        try {
            const summary = await this.decode(raw);
            return { ok: true, summary };
        } catch (error) {
            if (error instanceof PayloadRejected) {
                this.log.warn({ kind: error.kind, reason: error.message }, 'Rejected QR payload');
                const rejection: MalformedPayload = { kind: error.kind, message: error.message };
                return { ok: false, error: rejection };
            }
            throw error;
        }
    }

    private async decode(raw: string | null | undefined): Promise<QrSummary> {
        // 1. Structure: header.claims.signature
        const token = raw?.trim() ?? '';
        if (token.length === 0) {
            throw new PayloadRejected('no_payload', 'QR payload is empty');
        }

        const segments = token.split('.');
        if (segments.length !== 3 || !segments.every(s => SEGMENT.test(s))) {
            throw new PayloadRejected('structure', `Expected 3 base64url segments, found ${segments.length}`);
        }

        // 2. Signature
        let payload: Uint8Array;
        try {
            const verified = await compactVerify(token, this.options.key, {
                algorithms: this.options.algorithms,
            });
            payload = verified.payload;
        } catch (error) {
            throw new PayloadRejected(classifyJoseError(error), describeError(error));
        }

        // 3. Claims
        const claims = claimsSchema.safeParse(parseJson(new TextDecoder().decode(payload)));
        if (!claims.success) {
            throw new PayloadRejected('schema', `Invalid claims: ${formatIssues(claims.error)}`);
        }

        const { iss } = claims.data;
        if (this.options.issuers.length > 0 && (!iss || !this.options.issuers.includes(iss))) {
            throw new PayloadRejected('issuer', `Untrusted issuer ${iss ?? '(none)'}`);
        }

        const rawData = typeof claims.data.data === 'string' ? parseJson(claims.data.data) : claims.data.data;
        const data = invoiceDataSchema.safeParse(rawData);
        if (!data.success) {
            throw new PayloadRejected('schema', `Invalid invoice data: ${formatIssues(data.error)}`);
        }

        // 4. Version tag
        const version = data.data.Version === null || data.data.Version === undefined ? null : String(data.data.Version);
        if (version !== null && !this.options.supportedVersions.includes(version)) {
            throw new PayloadRejected('unsupported_version', `Unsupported QR schema version ${version}`);
        }

        return toSummary(data.data, version);
    }
}

function toSummary(data: z.infer<typeof invoiceDataSchema>, version: string | null): QrSummary {
    const amount = (field: string, value: string | number | null | undefined): Fixed | null => {
        if (value === null || value === undefined) return null;
        const parsed = Fixed.parse(value);
        if (!parsed || parsed.isNegative()) {
            throw new PayloadRejected('schema', `${field} is not a non-negative decimal: ${String(value)}`);
        }
        return parsed;
    };

    const invoiceDate = normalizeDate(data.DocDt);
    if (!invoiceDate) {
        throw new PayloadRejected('schema', `DocDt is not a date: ${data.DocDt}`);
    }

    const grandTotal = amount('TotInvVal', data.TotInvVal);
    if (!grandTotal) {
        throw new PayloadRejected('schema', 'TotInvVal is required');
    }

    const taxes = {
        cgst: amount('CgstVal', data.CgstVal),
        sgst: amount('SgstVal', data.SgstVal),
        igst: amount('IgstVal', data.IgstVal),
        cess: amount('CesVal', data.CesVal),
    };
    const declaredTaxes = Object.values(taxes).filter((t): t is Fixed => t !== null);

    const mainHsnCode =
        data.MainHsnCode === null || data.MainHsnCode === undefined
            ? null
            : normalizeProductCode(data.MainHsnCode);

    return Object.freeze({
        version,
        sellerGstin: normalizeGstin(data.SellerGstin),
        buyerGstin: data.BuyerGstin ? normalizeGstin(data.BuyerGstin) : null,
        documentType: data.DocTyp ?? null,
        invoiceNumber: data.DocNo.trim(),
        invoiceDate,
        taxableValue: amount('AssVal', data.AssVal),
        taxes: Object.freeze(taxes),
        taxTotal: declaredTaxes.length > 0 ? Fixed.sum(declaredTaxes) : null,
        grandTotal,
        itemCount: data.ItemCnt === null || data.ItemCnt === undefined ? null : Number(data.ItemCnt),
        mainHsnCode,
        irn: data.Irn ?? null,
        irnDate: data.IrnDt ?? null,
    });
}

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new PayloadRejected('encoding', `Payload is not JSON: ${describeError(error)}`);
    }
}

function classifyJoseError(error: unknown): MalformedPayloadKind {
    if (error instanceof errors.JWSInvalid) return 'encoding';
    return 'signature';
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function formatIssues(error: z.ZodError): string {
    return error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}
