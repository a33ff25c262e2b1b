// src/services/audit/expectationLoader.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import fs from 'fs/promises';
import { LoggingService } from '../logging.service';
import { ExpectationSet } from '../../types';
import { parseExpectationSet } from '../../utils/rules/expectationSchema';
import { ConfigError } from '../../utils/errors';
import { getErrorMessageAndStack } from '../../utils/errorUtils';

@singleton()
export class ExpectationLoaderService {
    private readonly serviceLogger: Logger;

    constructor(@inject(LoggingService) private readonly loggingService: LoggingService) {
        this.serviceLogger = this.loggingService.getLogger({ service: 'ExpectationLoaderService' });
    }

    /** Validates a plain object definition. Throws `ConfigError` listing every issue. */
    parse(raw: unknown): ExpectationSet {
        const logger = this.serviceLogger.child({ function: 'parse' });
        try {
            const set = parseExpectationSet(raw);
            logger.debug({ event: 'expectation_set_parsed', rules: set.rules.length, groups: set.groups.length }, 'Expectation set parsed.');
            return set;
        } catch (error) {
            if (error instanceof ConfigError) {
                logger.error({ event: 'expectation_set_invalid', issues: error.issues }, error.message);
            }
            throw error;
        }
    }

    async loadFromFile(filePath: string): Promise<ExpectationSet> {
        const logger = this.serviceLogger.child({ function: 'loadFromFile', filePath });
        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            logger.error({ event: 'expectation_file_read_failed', err: { message } }, `Cannot read expectation file: "${message}".`);
            throw new ConfigError(`Cannot read expectation file "${filePath}"`, [message]);
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            throw new ConfigError(`Expectation file "${filePath}" is not valid JSON`, [message]);
        }
        return this.parse(raw);
    }
}
