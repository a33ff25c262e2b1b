// src/services/audit/explanation.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { Explanation, ExplanationOptions, ValidationResult } from '../../types';
import { explainResult } from '../../utils/explanation/explainResult';

@singleton()
export class ExplanationService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) private readonly loggingService: LoggingService,
    ) {
        this.serviceLogger = this.loggingService.getLogger({ service: 'ExplanationService' });
    }

    /** One explanation per Fail or Error result, in result order. */
    explain(results: readonly ValidationResult[], options: Partial<ExplanationOptions> = {}): Explanation[] {
        const effective: ExplanationOptions = { ...this.configService.explanationOptions, ...options };
        const explanations: Explanation[] = [];
        for (const result of results) {
            const explanation = explainResult(result, effective);
            if (explanation) explanations.push(explanation);
        }
        this.serviceLogger.debug({ event: 'explanations_built', count: explanations.length }, `Built ${explanations.length} explanations.`);
        return explanations;
    }
}
