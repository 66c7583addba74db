import fs from 'fs';
import path from 'path';
import { createLogger, createRootLogger } from '../../src/utils/logger';
import { makeTempDir } from '../helpers';

function readLogLines(file: string): Array<Record<string, unknown>> {
    return fs.readFileSync(file, 'utf-8').trim().split('\n').map(line => JSON.parse(line));
}

describe('createRootLogger', () => {
    let stdoutWrite: jest.SpyInstance;

    beforeEach(() => {
        stdoutWrite = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        stdoutWrite.mockRestore();
    });

    it('should write each record to stdout and the run log', async () => {
        const file = path.join(await makeTempDir(), 'logs', 'run.log');
        const logger = createRootLogger({ level: 'info', file });

        logger.info({ cell: 1 }, 'Processing cell 1/4');

        expect(readLogLines(file)).toEqual([
            expect.objectContaining({ level: 30, cell: 1, msg: 'Processing cell 1/4' }),
        ]);
        expect(stdoutWrite).toHaveBeenCalledWith(expect.stringContaining('"msg":"Processing cell 1/4"'));
    });

    it('should append to an existing run log', async () => {
        const file = path.join(await makeTempDir(), 'run.log');

        createRootLogger({ level: 'info', file }).info('first run');
        createRootLogger({ level: 'info', file }).info('second run');

        expect(readLogLines(file).map(record => record.msg)).toEqual(['first run', 'second run']);
    });

    it('should drop records below the configured level', async () => {
        const file = path.join(await makeTempDir(), 'run.log');
        const logger = createRootLogger({ level: 'warn', file });

        logger.info('skipped');
        logger.warn('kept');

        expect(readLogLines(file).map(record => record.msg)).toEqual(['kept']);
    });

    it('should route named child loggers through the root', async () => {
        const file = path.join(await makeTempDir(), 'run.log');
        createRootLogger({ level: 'info', file });

        createLogger('table-generator').warn('Failed to quote CEP 01000000');

        expect(readLogLines(file)).toEqual([
            expect.objectContaining({ name: 'table-generator', level: 40, msg: 'Failed to quote CEP 01000000' }),
        ]);
    });
});
