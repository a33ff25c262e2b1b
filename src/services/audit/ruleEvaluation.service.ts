// src/services/audit/ruleEvaluation.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { ConfigService } from '../../config/config.service';
import { LoggingService } from '../logging.service';
import { TaskQueueService } from '../taskQueue.service';
import { DatasetProfile, EvaluationOptions, EvaluationReport, ExpectationSet, ValidationResult } from '../../types';
import { evaluateRule } from '../../utils/rules/evaluateRule';
import { evaluateGroups, countVerdicts } from '../../utils/rules/groups.utils';
import { validateExpectationSet } from '../../utils/rules/expectationSchema';
import { ConfigError } from '../../utils/errors';

@singleton()
export class RuleEvaluationService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) private readonly loggingService: LoggingService,
        @inject(TaskQueueService) private readonly taskQueue: TaskQueueService,
    ) {
        this.serviceLogger = this.loggingService.getLogger({ service: 'RuleEvaluationService' });
    }

    /**
     * Evaluates every rule against `profile`, one result per rule in declaration
     * order, then the groups over those results. Rules relative to a baseline
     * compare against `baseline` and are skipped without one. A structurally
     * invalid set is rejected with `ConfigError` before any rule runs.
     */
    async evaluate(
        profile: DatasetProfile,
        expectationSet: ExpectationSet,
        options: Partial<EvaluationOptions> = {},
        baseline?: DatasetProfile
    ): Promise<EvaluationReport> {
        const logger = this.serviceLogger.child({ function: 'evaluate', dataset: profile.name, expectationSet: expectationSet.name });
        this.assertValid(expectationSet);

        const effective: EvaluationOptions = { ...this.configService.evaluationOptions, ...options };
        const tasks = expectationSet.rules.map(rule => async (): Promise<ValidationResult> => evaluateRule(profile, rule, effective, baseline));
        const results = await this.taskQueue.runAll(tasks, effective.concurrency);
        const groups = evaluateGroups(results, expectationSet.groups);

        logger.info({
            event: 'rules_evaluated',
            rules: results.length,
            groups: groups.length,
            verdicts: countVerdicts(results),
        }, `Evaluated ${results.length} rules against '${profile.name}'.`);
        return { results, groups };
    }

    /** Throws `ConfigError` listing every structural issue of `expectationSet`. */
    assertValid(expectationSet: ExpectationSet): void {
        const issues = validateExpectationSet(expectationSet);
        if (issues.length > 0) {
            this.serviceLogger.error({ event: 'expectation_set_invalid', function: 'assertValid', issues }, 'Expectation set failed validation.');
            throw new ConfigError('Invalid expectation set', issues);
        }
    }
}
