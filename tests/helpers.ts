import fs from 'fs';
import os from 'os';
import path from 'path';
import pino from 'pino';
import { QuoteRequest, QuoteResult, ServiceTier } from '../src/domain/models';
import { PricingClient } from '../src/carriers/types';
import { RangeCatalog } from '../src/catalog';
import { Logger } from '../src/utils/logger';

export function buildQuoteRequest(overrides?: Partial<QuoteRequest>): QuoteRequest {
    return {
        tier: ServiceTier.Standard,
        destinationPostalCode: '01000000',
        weightGrams: 5500,
        declaredValue: 0,
        dimensions: { heightCm: 10, widthCm: 15, depthCm: 20 },
        ...overrides,
    };
}
export const TEST_TOTAL_EXPRESS_CONFIG = {
    username: 'test-user',
    password: 'test-secret',
    endpointUrl: 'https://edi.totalexpress.com.br/webservice_calculo_frete.php',
};

export function readFixture(name: string): string {
    return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

export const silentLogger = pino({ level: 'silent' });

export interface LogRecord {
    level: number;
    msg: string;
    [key: string]: unknown;
}

/** A trace-level logger that keeps every record it writes. */
export function createCaptureLogger(): { logger: Logger; records: LogRecord[] } {
    const records: LogRecord[] = [];
    const logger = pino({ level: 'trace' }, {
        write(line: string) {
            records.push(JSON.parse(line));
        },
    });
    return { logger, records };
}

export function createNoopSleep(): jest.Mock<Promise<void>, [number]> {
    return jest.fn((_ms: number) => Promise.resolve());
}

/** Two ranges by two brackets, small enough to trace by hand. */
export function buildSmallCatalog(): RangeCatalog {
    return new RangeCatalog({
        postalRanges: [
            { start: 1000001, end: 1099999, label: 'A' },
            { start: 20000000, end: 28999999, label: 'B' },
        ],
        weightBrackets: [
            { startGrams: 1, endGrams: 250 },
            { startGrams: 251, endGrams: 500 },
        ],
    });
}

export function createStubClient(
    impl: (request: QuoteRequest, call: number) => QuoteResult | Error,
): PricingClient & { quote: jest.Mock<Promise<QuoteResult>, [QuoteRequest]> } {
    let call = 0;
    return {
        name: 'stub',
        quote: jest.fn((request: QuoteRequest) => {
            call++;
            const result = impl(request, call);
            return result instanceof Error ? Promise.reject(result) : Promise.resolve(result);
        }),
    };
}

export async function makeTempDir(): Promise<string> {
    return fs.promises.mkdtemp(path.join(os.tmpdir(), 'shipping-tables-'));
}
