export enum ServiceTier {
    Standard = 'standard',
    Express = 'express',
}
export interface PostalRange {
    start: number;         // 8-digit CEP as integer, leading zero dropped
    end: number;
    label: string;         // state/region, e.g. "SP"
}
export interface WeightBracket {
    startGrams: number;
    endGrams: number;
}
export interface ParcelDimensions {
    heightCm: number;
    widthCm: number;
    depthCm: number;
}
export interface ParcelSpec {
    declaredValue: number;   // BRL
    dimensions: ParcelDimensions;
}
export interface QuoteRequest {
    tier: ServiceTier;
    destinationPostalCode: string;
    weightGrams: number;
    declaredValue: number;
    dimensions: ParcelDimensions;
}
export interface QuoteResult {
    moneyCost: number;     // BRL
    timeDays: number;
}
export interface OutputRow {
    zipStart: number;
    zipEnd: number;
    weightStart: number;
    weightEnd: number;
    moneyCost: number;
    timeDays: number;
}
export enum RunState {
    NotStarted = 'not_started',
    Running = 'running',
    Completed = 'completed',
    Aborted = 'aborted',
}
export interface CellFailure {
    range: PostalRange;
    bracket: WeightBracket;
    tier: ServiceTier;
    errorKind: string;
    message: string;
}
export interface RunSummary {
    tier: ServiceTier;
    status: RunState.Completed | RunState.Aborted;
    totalCells: number;
    attempted: number;
    succeeded: number;
    failed: number;
    failures: CellFailure[];
    outputPath: string | null;     // null when nothing was written
    fatalError?: { kind: string; message: string };
}
