import { CompactSign } from 'jose';
import pino, { type Logger } from 'pino';
import { ExtractedMetadata, LineItem } from '../src/types/invoice.js';
import { QrSummary } from '../src/types/qr.js';
import { Fixed } from '../src/utils/fixedPoint.js';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';
export const SELLER_GSTIN = '29ABCDE1234F1Z5';
export const BUYER_GSTIN = '27AAPFU0939F1ZV';

export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}

export function dec(text: string): Fixed {
    const value = Fixed.parse(text);
    if (value === null) {
        throw new Error(`Bad decimal fixture: ${text}`);
    }
    return value;
}

export function makeItem(position: number, overrides: Partial<Omit<LineItem, 'position'>> = {}): LineItem {
    return {
        position,
        productCode: '94035000',
        description: `Item ${position}`,
        unit: null,
        quantity: dec('10'),
        unitPrice: dec('100'),
        declaredRate: dec('18'),
        declaredTaxAmount: dec('180'),
        lineTotal: dec('1000'),
        defects: [],
        ...overrides,
    };
}

export function makeMetadata(overrides: Partial<ExtractedMetadata> = {}): ExtractedMetadata {
    return {
        invoiceNumber: 'INV-001',
        sellerGstin: SELLER_GSTIN,
        buyerGstin: BUYER_GSTIN,
        invoiceDate: '2024-03-12',
        defects: [],
        ...overrides,
    };
}

export function makeSummary(overrides: Partial<QrSummary> = {}): QrSummary {
    return {
        version: '1.1',
        sellerGstin: SELLER_GSTIN,
        buyerGstin: BUYER_GSTIN,
        documentType: 'INV',
        invoiceNumber: 'INV-001',
        invoiceDate: '2024-03-12',
        taxableValue: dec('1000'),
        taxes: { cgst: dec('90'), sgst: dec('90'), igst: null, cess: null },
        taxTotal: dec('180'),
        grandTotal: dec('1180'),
        itemCount: 1,
        mainHsnCode: '94035000',
        irn: null,
        irnDate: null,
        ...overrides,
    };
}

/** Signs QR claims the way the authority does: invoice fields as a JSON string in `data`. */
export async function signQr(
    data: Record<string, unknown>,
    options: { iss?: string; secret?: string } = {}
): Promise<string> {
    const claims = { iss: options.iss ?? 'NIC', data: JSON.stringify(data) };
    return new CompactSign(new TextEncoder().encode(JSON.stringify(claims)))
        .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
        .sign(new TextEncoder().encode(options.secret ?? TEST_SECRET));
}

export function qrData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        SellerGstin: SELLER_GSTIN,
        BuyerGstin: BUYER_GSTIN,
        DocNo: 'INV-001',
        DocTyp: 'INV',
        DocDt: '12/03/2024',
        AssVal: 1000,
        CgstVal: 90,
        SgstVal: 90,
        TotInvVal: 1180,
        ItemCnt: 1,
        MainHsnCode: '94035000',
        Version: '1.1',
        ...overrides,
    };
}
