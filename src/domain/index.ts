export { ServiceTier, RunState } from './models';
export type {
    PostalRange,
    WeightBracket,
    ParcelDimensions,
    ParcelSpec,
    QuoteRequest,
    QuoteResult,
    OutputRow,
    CellFailure,
    RunSummary,
} from './models';

export {
    postalRangeSchema,
    weightBracketSchema,
    catalogSchema,
    quoteRequestSchema,
    validateCatalog,
    validateQuoteRequest,
} from './schemas';
export type { CatalogDefinition } from './schemas';

export {
    CarrierError,
    AuthenticationError,
    TransportError,
    RateLimitError,
    NetworkError,
    TimeoutError,
    ValidationError,
    MalformedResponseError,
    ConfigError,
} from './errors';
export type { ErrorCode } from './errors';
