#!/usr/bin/env node
/**
 * shipping-tables CLI
 *
 * Commands:
 * - shipping-tables generate   quote every cell and write one CSV per tier
 * - shipping-tables catalog    show ranges, brackets and the planned call count
 */
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config';
import { RangeCatalog, formatPostalCode } from './catalog';
import { TotalExpressClient } from './carriers/total-express/client';
import { getServiceName, getSupportedTiers } from './carriers/total-express/service-codes';
import { TableGenerator } from './services/table-generator.service';
import { CarrierError, ConfigError, RunState, ServiceTier } from './domain';
import { createRootLogger } from './utils/logger';

function parseTiers(value: string): ServiceTier[] {
    if (value === 'all') return getSupportedTiers();
    const tier = Object.values(ServiceTier).find(t => t === value);
    if (!tier) {
        throw new InvalidArgumentError(`Expected one of: ${[...Object.values(ServiceTier), 'all'].join(', ')}`);
    }
    return [tier];
}

function parseMillis(value: string): number {
    const ms = parseInt(value, 10);
    if (isNaN(ms) || ms < 0) {
        throw new InvalidArgumentError('Expected a non-negative number of milliseconds');
    }
    return ms;
}

function loadCatalog(file?: string): RangeCatalog {
    return file ? RangeCatalog.fromFile(file) : RangeCatalog.brazil();
}

interface GenerateOptions {
    tier: ServiceTier[];
    outDir?: string;
    catalog?: string;
    delay?: number;
}

async function runGenerate(options: GenerateOptions): Promise<void> {
    const config = loadConfig();
    const logger = createRootLogger(config.log);
    const catalog = loadCatalog(options.catalog);
    const delayMs = options.delay ?? config.requestDelayMs;

    const client = new TotalExpressClient(config.totalExpress, {
        timeoutMs: config.requestTimeoutMs,
        retryDelayMs: config.retryDelayMs,
        logger: logger.child({ name: 'total-express' }),
    });
    const generator = new TableGenerator({
        client,
        catalog,
        delayMs,
        logger: logger.child({ name: 'table-generator' }),
    });

    for (const tier of options.tier) {
        logger.info(`Queued ${getServiceName(tier)} table (${catalog.cellCount} quotes)`);
    }
    const summaries = await generator.generateTables(options.tier, options.outDir ?? config.outputDir);

    for (const summary of summaries) {
        if (summary.status === RunState.Aborted) {
            logger.error(
                { tier: summary.tier, cause: summary.fatalError },
                `${getServiceName(summary.tier)} table aborted after ${summary.attempted} of ${summary.totalCells} cells`,
            );
            process.exitCode = 1;
            continue;
        }
        logger.info(
            { tier: summary.tier, succeeded: summary.succeeded, failed: summary.failed },
            `${getServiceName(summary.tier)} table saved to ${summary.outputPath}`,
        );
    }
}

function runCatalog(file: string | undefined, delayMs: number): void {
    const catalog = loadCatalog(file);
    console.log('Postal ranges:');
    for (const range of catalog.postalRanges()) {
        console.log(`  ${range.label.padEnd(4)} ${formatPostalCode(range.start)} - ${formatPostalCode(range.end)}`);
    }
    console.log('\nWeight brackets (g):');
    for (const bracket of catalog.weightBrackets()) {
        console.log(`  ${bracket.startGrams} - ${bracket.endGrams}`);
    }
    const tiers = getSupportedTiers().length;
    const calls = catalog.cellCount * tiers;
    const floorSeconds = Math.max(calls - 1, 0) * delayMs / 1000;
    console.log(`\n${catalog.cellCount} cells per tier, ${calls} calls for ${tiers} tiers`);
    console.log(`Minimum run time at ${delayMs}ms between calls: ${floorSeconds}s`);
}

const program = new Command();

program
    .name('shipping-tables')
    .description('Build Total Express shipping cost tables per CEP range and weight bracket')
    .version('1.0.0');

program
    .command('generate')
    .description('Quote every range/bracket cell and write a CSV per service tier')
    .option('-t, --tier <tier>', 'standard, express or all', parseTiers, getSupportedTiers())
    .option('-o, --out-dir <dir>', 'output directory (default: OUTPUT_DIR or ./output)')
    .option('-c, --catalog <file>', 'JSON catalog to use instead of the built-in Brazil table')
    .option('-d, --delay <ms>', 'delay between calls (default: REQUEST_DELAY_MS or 1000)', parseMillis)
    .action(async (options: GenerateOptions) => {
        await runGenerate(options);
    });

program
    .command('catalog')
    .description('Print the ranges and brackets and the number of calls a full run makes')
    .option('-c, --catalog <file>', 'JSON catalog to inspect')
    .option('-d, --delay <ms>', 'delay between calls used for the estimate', parseMillis, 1000)
    .action((options: { catalog?: string; delay: number }) => {
        runCatalog(options.catalog, options.delay);
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    if (err instanceof ConfigError) {
        console.error('Config error:', err.message);
        console.log('\nHint: copy env-example.txt to .env and fill in your Total Express credentials.\n');
    } else if (err instanceof CarrierError) {
        console.error(JSON.stringify(err.toJSON(), null, 2));
    } else {
        console.error('Unexpected error:', err);
    }
    process.exit(1);
});
