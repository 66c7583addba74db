import path from 'path';
import {
    CellFailure,
    OutputRow,
    ParcelSpec,
    PostalRange,
    RunState,
    RunSummary,
    ServiceTier,
    WeightBracket,
} from '../domain/models';
import { RangeCatalog, formatPostalCode } from '../catalog';
import { PricingClient } from '../carriers/types';
import { settleQuote } from '../carriers/outcome';
import { tableExists, writeTable } from '../output/csv';
import { createLogger, Logger } from '../utils/logger';
import { sleep as defaultSleep } from '../utils/sleep';

export const DEFAULT_REQUEST_DELAY_MS = 1000;

export const DEFAULT_PARCEL: ParcelSpec = {
    declaredValue: 0,
    dimensions: { heightCm: 10, widthCm: 15, depthCm: 20 },
};

export function outputFileName(tier: ServiceTier): string {
    return `total_express_${tier}.csv`;
}

/** Weight sent for a bracket: its midpoint, rounded down. */
export function representativeWeight(bracket: WeightBracket): number {
    return Math.floor((bracket.startGrams + bracket.endGrams) / 2);
}

interface TableGeneratorDeps {
    client: PricingClient;
    catalog: RangeCatalog;
    parcel?: ParcelSpec;
    delayMs?: number;
    logger?: Logger;
    sleep?: (ms: number) => Promise<void>;
}

export class TableGenerator {
    private client: PricingClient;
    private catalog: RangeCatalog;
    private parcel: ParcelSpec;
    private delayMs: number;
    private logger: Logger;
    private sleep: (ms: number) => Promise<void>;

    private runState: RunState = RunState.NotStarted;
    private callsIssued = 0;

    constructor(deps: TableGeneratorDeps) {
        this.client = deps.client;
        this.catalog = deps.catalog;
        this.parcel = deps.parcel ?? DEFAULT_PARCEL;
        this.delayMs = deps.delayMs ?? DEFAULT_REQUEST_DELAY_MS;
        this.logger = deps.logger ?? createLogger('table-generator');
        this.sleep = deps.sleep ?? defaultSleep;
    }

    get state(): RunState {
        return this.runState;
    }

    /**
     * Quotes every (range, bracket) cell for one tier and writes the CSV.
     *
     * Cells are visited range-major, bracket-minor and rows keep that order.
     * A failed cell is logged and skipped; a fatal failure (rejected
     * credentials, invalid request) stops the run and nothing is written.
     */
    async generateTable(tier: ServiceTier, outputPath: string): Promise<RunSummary> {
        if (this.runState === RunState.Running) {
            throw new Error('A table run is already in progress on this generator');
        }
        this.runState = RunState.Running;

        const ranges = this.catalog.postalRanges();
        const brackets = this.catalog.weightBrackets();
        const totalCells = this.catalog.cellCount;
        const rows: OutputRow[] = [];
        const failures: CellFailure[] = [];
        let attempted = 0;

        this.logger.info({ tier, totalCells, outputPath }, 'Starting table generation');

        for (const range of ranges) {
            for (const bracket of brackets) {
                if (this.callsIssued > 0) {
                    await this.sleep(this.delayMs);
                }
                attempted++;
                this.callsIssued++;

                this.logger.info(
                    { tier, cell: attempted, totalCells, range: range.label },
                    `Processing cell ${attempted}/${totalCells}: CEP ${range.start}-${range.end}, ` +
                    `weight ${bracket.startGrams}-${bracket.endGrams}g`,
                );

                const outcome = await settleQuote(this.client, {
                    tier,
                    destinationPostalCode: formatPostalCode(range.start),
                    weightGrams: representativeWeight(bracket),
                    declaredValue: this.parcel.declaredValue,
                    dimensions: this.parcel.dimensions,
                });

                if (outcome.kind === 'ok') {
                    rows.push(toOutputRow(range, bracket, outcome.quote.moneyCost, outcome.quote.timeDays));
                    this.logger.info(
                        { tier, cell: attempted },
                        `Success: cost R$ ${outcome.quote.moneyCost.toFixed(2)}, ${outcome.quote.timeDays} days`,
                    );
                    continue;
                }

                const failure: CellFailure = {
                    range,
                    bracket,
                    tier,
                    errorKind: outcome.error.code,
                    message: outcome.error.message,
                };
                failures.push(failure);

                if (outcome.kind === 'fatal') {
                    this.runState = RunState.Aborted;
                    this.logger.error(
                        { tier, cell: attempted, error: outcome.error.toJSON() },
                        'Fatal error, aborting run; no table written',
                    );
                    if (await tableExists(outputPath)) {
                        this.logger.warn(
                            { tier, outputPath },
                            `${outputPath} was left by an earlier run and does not reflect this one`,
                        );
                    }
                    return {
                        tier,
                        status: RunState.Aborted,
                        totalCells,
                        attempted,
                        succeeded: rows.length,
                        failed: failures.length,
                        failures,
                        outputPath: null,
                        fatalError: { kind: outcome.error.code, message: outcome.error.message },
                    };
                }

                this.logger.warn(
                    { tier, cell: attempted, errorKind: failure.errorKind },
                    `Failed to quote CEP ${formatPostalCode(range.start)}, weight ${bracket.startGrams}-${bracket.endGrams}g: ${failure.message}`,
                );
            }
        }

        try {
            await writeTable(outputPath, rows);
        } catch (err) {
            this.runState = RunState.Aborted;
            throw err;
        }
        this.runState = RunState.Completed;

        this.logger.info(
            { tier, succeeded: rows.length, failed: failures.length, outputPath },
            'Table generation completed',
        );
        return {
            tier,
            status: RunState.Completed,
            totalCells,
            attempted,
            succeeded: rows.length,
            failed: failures.length,
            failures,
            outputPath,
        };
    }

    /**
     * Runs several tiers back to back into `outputDir`. Stops after the
     * first aborted run, since a rejected login fails every later tier too.
     */
    async generateTables(tiers: readonly ServiceTier[], outputDir: string): Promise<RunSummary[]> {
        const summaries: RunSummary[] = [];
        for (const tier of tiers) {
            const summary = await this.generateTable(tier, path.join(outputDir, outputFileName(tier)));
            summaries.push(summary);
            if (summary.status === RunState.Aborted) break;
        }
        return summaries;
    }
}

function toOutputRow(range: PostalRange, bracket: WeightBracket, moneyCost: number, timeDays: number): OutputRow {
    return {
        zipStart: range.start,
        zipEnd: range.end,
        weightStart: bracket.startGrams,
        weightEnd: bracket.endGrams,
        moneyCost,
        timeDays,
    };
}
