// src/services/audit/driftDetection.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { DatasetProfile, DriftOptions, DriftReport } from '../../types';
import { diffProfiles } from '../../utils/drift/diffProfiles';

@singleton()
export class DriftDetectionService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) private readonly loggingService: LoggingService,
    ) {
        this.serviceLogger = this.loggingService.getLogger({ service: 'DriftDetectionService' });
    }

    diff(baseline: DatasetProfile, candidate: DatasetProfile, options: Partial<DriftOptions> = {}): DriftReport {
        const logger = this.serviceLogger.child({ function: 'diff', baseline: baseline.name, candidate: candidate.name });
        const report = diffProfiles(baseline, candidate, { ...this.configService.driftOptions, ...options });

        logger.info({
            event: 'drift_computed',
            added: report.addedColumns.length,
            removed: report.removedColumns.length,
            typeChanges: report.typeChanges.length,
            statDeltas: report.statDeltas.length,
            categoricalShifts: report.categoricalShifts.length,
            breaking: report.breaking,
        }, `Drift between '${baseline.name}' and '${candidate.name}' computed.`);
        return report;
    }
}
