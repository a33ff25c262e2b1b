// src/services/audit/profiling.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { DatasetProfile, ProfilingOptions, TabularSource } from '../../types';
import { profileDataset, ProfileRunControl } from '../../utils/profiling/profileDataset';
import { getErrorMessageAndStack } from '../../utils/errorUtils';
import { isAuditError } from '../../utils/errors';

export interface ProfileCallOptions extends Partial<ProfilingOptions>, ProfileRunControl {}

@singleton()
export class ProfilingService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) private readonly loggingService: LoggingService,
    ) {
        this.serviceLogger = this.loggingService.getLogger({ service: 'ProfilingService' });
    }

    /**
     * Profiles `source` in a single streaming pass. Per-call options override the
     * configured defaults; `signal` aborts between batches with a `CANCELLED` error.
     */
    async profile(source: TabularSource, options: ProfileCallOptions = {}): Promise<DatasetProfile> {
        const logger = this.serviceLogger.child({ function: 'profile', dataset: source.name });
        const { signal, onBatch, ...overrides } = options;
        const effective: ProfilingOptions = { ...this.configService.profilingOptions, ...overrides };
        const startedAt = Date.now();

        logger.info({ event: 'profile_start' }, `Profiling dataset '${source.name}'.`);
        try {
            const profile = await profileDataset(source, effective, {
                signal,
                onBatch: rowsProcessed => {
                    logger.debug({ event: 'profile_batch', rowsProcessed }, `Processed ${rowsProcessed} rows.`);
                    onBatch?.(rowsProcessed);
                },
            });
            logger.info({
                event: 'profile_finish',
                rowCount: profile.rowCount,
                columnCount: profile.columns.length,
                malformedRowCount: profile.stats.malformedRowCount,
                durationMs: Date.now() - startedAt,
            }, `Profiled ${profile.rowCount} rows across ${profile.columns.length} columns.`);
            return profile;
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            if (isAuditError(error) && error.code === 'CANCELLED') {
                logger.warn({ event: 'profile_cancelled', details: error.details }, message);
            } else {
                logger.error({ event: 'profile_failed', err: { message, stack } }, `Profiling failed: "${message}".`);
            }
            throw error;
        }
    }
}
