import { PricingClient } from '../types';
import { QuoteRequest, QuoteResult } from '../../domain/models';
import { CarrierError, MalformedResponseError, TransportError } from '../../domain/errors';
import { validateQuoteRequest } from '../../domain/schemas';
import { HttpClient } from '../../http/client';
import { TotalExpressConfig } from '../../config';
import { createLogger, Logger } from '../../utils/logger';
import { sleep as defaultSleep } from '../../utils/sleep';
import { buildSoapEnvelope, parseCalcularFreteResponse, SOAP_ACTION } from './mapper';

export interface TotalExpressClientOptions {
    timeoutMs: number;
    retryDelayMs: number;
    httpClient?: HttpClient;
    logger?: Logger;
    sleep?: (ms: number) => Promise<void>;
}

export class TotalExpressClient implements PricingClient {
    readonly name = 'total-express';

    private httpClient: HttpClient;
    private config: TotalExpressConfig;
    private authHeader: string;
    private retryDelayMs: number;
    private logger: Logger;
    private sleep: (ms: number) => Promise<void>;

    constructor(config: TotalExpressConfig, options: TotalExpressClientOptions) {
        this.config = config;
        this.retryDelayMs = options.retryDelayMs;
        this.httpClient = options.httpClient ?? new HttpClient(this.name, {
            timeoutMs: options.timeoutMs,
        });
        this.logger = options.logger ?? createLogger(this.name);
        this.sleep = options.sleep ?? defaultSleep;
        const credentials = Buffer.from(`${config.username}:${config.password}`).toString('base64');
        this.authHeader = `Basic ${credentials}`;
    }

    async quote(request: QuoteRequest): Promise<QuoteResult> {
        const envelope = buildSoapEnvelope(validateQuoteRequest(request));

        try {
            return await this.execute(envelope, request);
        } catch (err) {
            if (err instanceof TransportError && err.retryable) {
                this.logger.warn(
                    { code: err.code, retryInMs: this.retryDelayMs, cep: request.destinationPostalCode },
                    `Transient failure, retrying once: ${err.message}`,
                );
                await this.sleep(this.retryDelayMs);
                return await this.execute(envelope, request);
            }
            throw err;
        }
    }

    private async execute(envelope: string, request: QuoteRequest): Promise<QuoteResult> {
        this.logger.debug(
            { tier: request.tier, cep: request.destinationPostalCode, weightGrams: request.weightGrams },
            'calcularFrete request',
        );
        const response = await this.httpClient.post<unknown>(
            this.config.endpointUrl,
            envelope,
            {
                headers: {
                    'Authorization': this.authHeader,
                    'Content-Type': 'text/xml; charset=utf-8',
                    'SOAPAction': SOAP_ACTION,
                },
                responseType: 'text',
            },
        );
        try {
            return parseCalcularFreteResponse(response.data);
        } catch (err) {
            if (err instanceof CarrierError) throw err;

            throw new MalformedResponseError(
                this.name,
                'Unexpected response structure from calcularFrete',
                undefined,
                err instanceof Error ? err : undefined,
            );
        }
    }
}
