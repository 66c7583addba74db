export {
    ServiceTier,
    RunState,
    type PostalRange,
    type WeightBracket,
    type ParcelDimensions,
    type ParcelSpec,
    type QuoteRequest,
    type QuoteResult,
    type OutputRow,
    type CellFailure,
    type RunSummary,
} from './domain/models';
export { validateCatalog, validateQuoteRequest } from './domain/schemas';
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
} from './domain/errors';
export type { PricingClient, QuoteOutcome } from './carriers/types';
export { settleQuote } from './carriers/outcome';
export { TotalExpressClient } from './carriers/total-express/client';
export { RangeCatalog, formatPostalCode } from './catalog';
export { CSV_HEADER, formatTable, writeTable } from './output/csv';
export {
    TableGenerator,
    DEFAULT_PARCEL,
    DEFAULT_REQUEST_DELAY_MS,
    outputFileName,
} from './services/table-generator.service';
export { loadConfig } from './config';
export type { AppConfig, TotalExpressConfig } from './config';
export { createLogger, createRootLogger } from './utils/logger';
