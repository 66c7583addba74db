import dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from '../domain/errors';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export interface TotalExpressConfig {
    username: string;
    password: string;
    endpointUrl: string;
}

export interface LogConfig {
    level: string;
    file?: string;
}

export interface AppConfig {
    requestTimeoutMs: number;
    requestDelayMs: number;
    retryDelayMs: number;
    outputDir: string;
    log: LogConfig;
    totalExpress: TotalExpressConfig;
}

// values shipped in env-example; treat them as unset
const PLACEHOLDER_CREDENTIALS = new Set(['your_username', 'your_password']);

function readEnv(key: string, fallback?: string): string {
    const val = process.env[key] ?? fallback;
    if (val === undefined) {
        throw new ConfigError(
            `Missing required environment variable: ${key}. ` +
            `Check your .env file or environment.`
        );
    }
    return val;
}
function readCredential(key: string): string {
    const val = readEnv(key).trim();
    if (val === '' || PLACEHOLDER_CREDENTIALS.has(val)) {
        throw new ConfigError(
            `${key} is not set to a real credential. ` +
            `Copy env-example.txt to .env and fill in your Total Express account.`
        );
    }
    return val;
}
function readMillis(key: string, fallback: string): number {
    const raw = readEnv(key, fallback);
    const val = parseInt(raw, 10);
    if (isNaN(val) || val < 0) {
        throw new ConfigError(`${key} must be a non-negative number of milliseconds, got "${raw}"`);
    }
    return val;
}
export function loadConfig(): AppConfig {
    const logFile = readEnv('LOG_FILE', 'shipping_table_generator.log');
    return {
        requestTimeoutMs: readMillis('REQUEST_TIMEOUT_MS', '15000'),
        requestDelayMs: readMillis('REQUEST_DELAY_MS', '1000'),
        retryDelayMs: readMillis('RETRY_DELAY_MS', '500'),
        outputDir: readEnv('OUTPUT_DIR', 'output'),
        log: {
            level: readEnv('LOG_LEVEL', 'info'),
            file: logFile === '' ? undefined : logFile,
        },
        totalExpress: {
            username: readCredential('TOTAL_EXPRESS_USERNAME'),
            password: readCredential('TOTAL_EXPRESS_PASSWORD'),
            endpointUrl: readEnv('TOTAL_EXPRESS_URL', 'https://edi.totalexpress.com.br/webservice_calculo_frete.php'),
        },
    };
}
