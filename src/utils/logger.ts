/**
 * Logger utility using Pino
 */
import pino from 'pino';

export type Logger = pino.Logger;

export interface RootLoggerOptions {
    level: string;
    file?: string;     // run log, appended alongside stdout
}

let rootLogger: Logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export function createRootLogger(options: RootLoggerOptions): Logger {
    // the root logger filters by level; streams take whatever reaches them
    const streams: pino.StreamEntry[] = [{ level: 'trace', stream: process.stdout }];
    if (options.file) {
        streams.push({
            level: 'trace',
            stream: pino.destination({ dest: options.file, append: true, mkdir: true, sync: true }),
        });
    }
    rootLogger = pino({ level: options.level }, pino.multistream(streams));
    return rootLogger;
}

export function createLogger(name: string): Logger {
    return rootLogger.child({ name });
}
