import { QuoteRequest } from '../domain/models';
import { AuthenticationError, CarrierError, ValidationError } from '../domain/errors';
import { PricingClient, QuoteOutcome } from './types';

// no later cell can succeed after one of these
function isFatal(err: CarrierError): boolean {
    return err instanceof AuthenticationError || err instanceof ValidationError;
}

export async function settleQuote(client: PricingClient, request: QuoteRequest): Promise<QuoteOutcome> {
    try {
        const quote = await client.quote(request);
        return { kind: 'ok', quote };
    } catch (err) {
        const error = err instanceof CarrierError
            ? err
            : new CarrierError({
                message: err instanceof Error ? err.message : String(err),
                code: 'UNKNOWN',
                carrier: client.name,
                cause: err instanceof Error ? err : undefined,
            });
        return isFatal(error) ? { kind: 'fatal', error } : { kind: 'recoverable', error };
    }
}
