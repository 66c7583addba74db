export type ErrorCode =
    | 'VALIDATION_ERROR'
    | 'AUTH_FAILED'
    | 'RATE_LIMITED'
    | 'CARRIER_API_ERROR'
    | 'NETWORK_ERROR'
    | 'TIMEOUT'
    | 'TRANSPORT_ERROR'
    | 'PARSE_ERROR'
    | 'CONFIG_ERROR'
    | 'UNKNOWN';
export class CarrierError extends Error {
    public readonly code: ErrorCode;
    public readonly carrier: string;
    public readonly retryable: boolean;
    public readonly statusCode?: number;
    public readonly details?: Record<string, unknown>;

    constructor(opts: {
        message: string;
        code: ErrorCode;
        carrier?: string;
        retryable?: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super(opts.message);
        this.name = 'CarrierError';
        this.code = opts.code;
        this.carrier = opts.carrier ?? 'unknown';
        this.retryable = opts.retryable ?? false;
        this.statusCode = opts.statusCode;
        this.details = opts.details;
        if (opts.cause) {
            this.cause = opts.cause;
        }
    }
    toJSON() {
        return {
            error: {
                code: this.code,
                message: this.message,
                carrier: this.carrier,
                retryable: this.retryable,
                ...(this.statusCode ? { statusCode: this.statusCode } : {}),
                ...(this.details ? { details: this.details } : {}),
            },
        };
    }
}

export class AuthenticationError extends CarrierError {
    constructor(carrier: string, message: string, statusCode = 401, cause?: Error) {
        super({
            message,
            code: 'AUTH_FAILED',
            carrier,
            retryable: false,
            statusCode,
            cause,
        });
        this.name = 'AuthenticationError';
    }
}

/**
 * Anything that went wrong between us and the provider before a usable
 * response came back. Subclasses narrow the cause; `retryable` decides
 * whether the pricing client spends its single retry on it.
 */
export class TransportError extends CarrierError {
    constructor(opts: {
        carrier: string;
        message: string;
        code?: Extract<ErrorCode, 'TRANSPORT_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT' | 'RATE_LIMITED' | 'CARRIER_API_ERROR'>;
        retryable?: boolean;
        statusCode?: number;
        details?: Record<string, unknown>;
        cause?: Error;
    }) {
        super({
            message: opts.message,
            code: opts.code ?? 'TRANSPORT_ERROR',
            carrier: opts.carrier,
            retryable: opts.retryable ?? true,
            statusCode: opts.statusCode,
            details: opts.details,
            cause: opts.cause,
        });
        this.name = 'TransportError';
    }
}

export class RateLimitError extends TransportError {
    public readonly retryAfterMs?: number;

    constructor(carrier: string, retryAfterMs?: number) {
        super({
            message: `Rate limited by ${carrier}. ${retryAfterMs ? `Retry after ${retryAfterMs}ms` : 'Try again later.'}`,
            code: 'RATE_LIMITED',
            carrier,
            retryable: true,
            statusCode: 429,
        });
        this.name = 'RateLimitError';
        this.retryAfterMs = retryAfterMs;
    }
}

export class NetworkError extends TransportError {
    constructor(carrier: string, message: string, cause?: Error) {
        super({
            message,
            code: 'NETWORK_ERROR',
            carrier,
            retryable: true,
            cause,
        });
        this.name = 'NetworkError';
    }
}

export class TimeoutError extends TransportError {
    constructor(carrier: string, timeoutMs: number) {
        super({
            message: `Request to ${carrier} timed out after ${timeoutMs}ms`,
            code: 'TIMEOUT',
            carrier,
            retryable: true,
        });
        this.name = 'TimeoutError';
    }
}

export class ValidationError extends CarrierError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({
            message,
            code: 'VALIDATION_ERROR',
            retryable: false,
            details,
        });
        this.name = 'ValidationError';
    }
}

export class MalformedResponseError extends CarrierError {
    constructor(carrier: string, message: string, details?: Record<string, unknown>, cause?: Error) {
        super({
            message,
            code: 'PARSE_ERROR',
            carrier,
            retryable: false,
            details,
            cause,
        });
        this.name = 'MalformedResponseError';
    }
}

export class ConfigError extends CarrierError {
    constructor(message: string) {
        super({
            message,
            code: 'CONFIG_ERROR',
            retryable: false,
        });
        this.name = 'ConfigError';
    }
}
