// src/services/logging.service.test.ts
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';

const readWhenWritten = async (filePath: string, attempts = 40): Promise<string> => {
    for (let attempt = 0; attempt < attempts; attempt += 1) {
        const content = await fs.readFile(filePath, 'utf8').catch(() => '');
        if (content.includes('\n')) return content;
        await new Promise(resolve => setTimeout(resolve, 25));
    }
    throw new Error(`Nothing was written to ${filePath}`);
};

describe('LoggingService', () => {
    const originalEnv = process.env;
    let logsDirectory: string;

    beforeEach(async () => {
        logsDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'audit-logs-'));
        process.env = { ...originalEnv };
    });

    afterEach(async () => {
        process.env = originalEnv;
        await fs.rm(logsDirectory, { recursive: true, force: true });
    });

    it('hands out silent loggers when the level is silent', () => {
        const logging = new LoggingService(new ConfigService());
        const logger = logging.getLogger({ service: 'Quiet' });
        expect(logger.level).toBe('silent');
    });

    it('writes JSON lines with the service context to the log file', async () => {
        Object.assign(process.env, {
            LOG_LEVEL: 'info',
            LOG_TO_CONSOLE: 'false',
            LOG_TO_FILE: 'true',
            LOGS_DIRECTORY: logsDirectory,
            APP_LOG_FILE_NAME: 'audit.log',
        });
        const logging = new LoggingService(new ConfigService());

        logging.getLogger({ service: 'FileTest' }).info({ event: 'file_test' }, 'hello');
        const content = await readWhenWritten(path.join(logsDirectory, 'audit.log'));
        logging.flushLogsAndClose();

        const [line] = content.trim().split('\n');
        expect(JSON.parse(line)).toMatchObject({ level: 'info', service: 'FileTest', event: 'file_test', msg: 'hello' });
    });
});
