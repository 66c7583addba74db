import { QuoteRequest, QuoteResult } from '../domain/models';
import { CarrierError } from '../domain/errors';

/** One remote pricing call. Implementations surface every failure as a CarrierError. */
export interface PricingClient {
    readonly name: string;
    quote(request: QuoteRequest): Promise<QuoteResult>;
}

export type QuoteOutcome =
    | { kind: 'ok'; quote: QuoteResult }
    | { kind: 'recoverable'; error: CarrierError }
    | { kind: 'fatal'; error: CarrierError };
