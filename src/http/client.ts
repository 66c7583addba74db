import axios, {
    AxiosInstance,
    AxiosRequestConfig,
    AxiosResponse,
    AxiosError,
} from 'axios';
import { XMLParser } from 'fast-xml-parser';
import {
    CarrierError,
    AuthenticationError,
    NetworkError,
    TimeoutError,
    RateLimitError,
    TransportError,
} from '../domain/errors';

export interface HttpClientOptions {
    timeoutMs: number;
}

export interface HttpResponse<T = unknown> {
    status: number;
    data: T;
}

const faultParser = new XMLParser({ removeNSPrefix: true, parseTagValue: false });

export class HttpClient {
    private client: AxiosInstance;
    private carrier: string;

    constructor(carrier: string, options: HttpClientOptions) {
        this.carrier = carrier;
        this.client = axios.create({ timeout: options.timeoutMs });
    }

    async post<T>(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<HttpResponse<T>> {
        try {
            const response: AxiosResponse<T> = await this.client.post(url, data, config);
            return this.wrapResponse(response);
        } catch (err) {
            throw this.handleError(err);
        }
    }

    private wrapResponse<T>(response: AxiosResponse<T>): HttpResponse<T> {
        return { status: response.status, data: response.data };
    }
    private handleError(err: unknown): CarrierError {
        if (!axios.isAxiosError(err)) {
            return new NetworkError(
                this.carrier,
                `Unexpected error: ${err instanceof Error ? err.message : 'unknown'}`,
                err instanceof Error ? err : undefined,
            );
        }

        const axiosErr: AxiosError = err;
        if (axiosErr.code === 'ECONNABORTED' || axiosErr.code === 'ETIMEDOUT') {
            return new TimeoutError(this.carrier, this.client.defaults.timeout ?? 0);
        }
        if (!axiosErr.response) {
            return new NetworkError(
                this.carrier,
                `Network error: ${axiosErr.message}`,
                axiosErr,
            );
        }

        const { status, data } = axiosErr.response;
        if (status === 401 || status === 403) {
            return new AuthenticationError(
                this.carrier,
                `${this.carrier} rejected the credentials (HTTP ${status}): ${this.extractErrorMessage(data)}`,
                status,
                axiosErr,
            );
        }
        if (status === 429) {
            const retryAfter = axiosErr.response.headers['retry-after'];
            const retryMs = retryAfter ? parseInt(String(retryAfter), 10) * 1000 : undefined;
            return new RateLimitError(this.carrier, retryMs);
        }
        return new TransportError({
            message: `${this.carrier} API error (HTTP ${status}): ${this.extractErrorMessage(data)}`,
            code: 'CARRIER_API_ERROR',
            carrier: this.carrier,
            statusCode: status,
            retryable: status >= 500,
            details: typeof data === 'string' ? { raw: data } : { body: data },
        });
    }
    // SOAP servers report failures as a Fault envelope, usually with HTTP 500
    private extractErrorMessage(data: unknown): string {
        if (typeof data === 'string') {
            const trimmed = data.trim();
            if (trimmed.startsWith('<')) {
                const fault = this.extractFaultString(trimmed);
                if (fault) return fault;
            }
            return trimmed.length > 0 ? trimmed.slice(0, 200) : 'Unknown error';
        }
        if (data && typeof data === 'object' && 'message' in data) {
            return String(data.message);
        }
        return 'Unknown error';
    }
    private extractFaultString(xml: string): string | undefined {
        try {
            const doc: unknown = faultParser.parse(xml);
            const fault = pick(pick(pick(doc, 'Envelope'), 'Body'), 'Fault');
            const text = pick(fault, 'faultstring');
            return typeof text === 'string' && text.length > 0 ? text : undefined;
        } catch {
            return undefined;   // not XML after all; caller falls back to raw text
        }
    }
}

function pick(node: unknown, key: string): unknown {
    if (node === null || typeof node !== 'object') return undefined;
    const value: unknown = Reflect.get(node, key);
    return value;
}
