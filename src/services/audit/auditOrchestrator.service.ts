// src/services/audit/auditOrchestrator.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { Logger } from 'pino';
import { LoggingService } from '../logging.service';
import { ProfileCallOptions, ProfilingService } from './profiling.service';
import { DriftDetectionService } from './driftDetection.service';
import { RuleEvaluationService } from './ruleEvaluation.service';
import { ExplanationService } from './explanation.service';
import {
    AuditReport,
    AuditSummary,
    DatasetProfile,
    DriftOptions,
    EXIT_CODES,
    EvaluationOptions,
    ExpectationSet,
    ExplanationOptions,
    GroupResult,
    TabularSource,
    ValidationResult,
} from '../../types';
import * as OutcomeUtils from '../../utils/rules/groups.utils';

export interface AuditRequest {
    source: TabularSource;
    expectations: ExpectationSet;
    /** Profile of a previous version of the dataset; enables drift detection and baseline-relative rules. */
    baseline?: DatasetProfile;
    profiling?: ProfileCallOptions;
    drift?: Partial<DriftOptions>;
    evaluation?: Partial<EvaluationOptions>;
    explanation?: Partial<ExplanationOptions>;
}

/**
 * Runs profile → drift → evaluate → explain and condenses the verdicts into an
 * outcome with its exit code. The expectation set is checked before any row is read.
 */
@singleton()
export class AuditOrchestratorService {
    private readonly serviceLogger: Logger;

    constructor(
        @inject(LoggingService) private readonly loggingService: LoggingService,
        @inject(ProfilingService) private readonly profilingService: ProfilingService,
        @inject(DriftDetectionService) private readonly driftDetectionService: DriftDetectionService,
        @inject(RuleEvaluationService) private readonly ruleEvaluationService: RuleEvaluationService,
        @inject(ExplanationService) private readonly explanationService: ExplanationService,
    ) {
        this.serviceLogger = this.loggingService.getLogger({ service: 'AuditOrchestratorService' });
    }

    async run(request: AuditRequest): Promise<AuditReport> {
        const logger = this.serviceLogger.child({ function: 'run', dataset: request.source.name });
        const startedAt = Date.now();

        this.ruleEvaluationService.assertValid(request.expectations);
        const profile = await this.profilingService.profile(request.source, request.profiling);
        const drift = request.baseline
            ? this.driftDetectionService.diff(request.baseline, profile, request.drift)
            : undefined;
        const { results, groups } = await this.ruleEvaluationService.evaluate(
            profile,
            request.expectations,
            request.evaluation,
            request.baseline
        );
        const explanations = this.explanationService.explain(results, request.explanation);
        const summary = this.summarize(results, groups);

        logger.info({
            event: 'audit_finish',
            outcome: summary.outcome,
            exitCode: summary.exitCode,
            verdicts: summary.verdictCounts,
            breakingDrift: drift?.breaking ?? false,
            durationMs: Date.now() - startedAt,
        }, `Audit of '${profile.name}' finished with outcome ${summary.outcome}.`);

        return {
            profile,
            ...(drift ? { drift } : {}),
            results,
            groups,
            explanations,
            summary,
        };
    }

    summarize(results: readonly ValidationResult[], groups: readonly GroupResult[]): AuditSummary {
        const outcome = OutcomeUtils.computeOutcome(results);
        return {
            outcome,
            exitCode: EXIT_CODES[outcome],
            verdictCounts: OutcomeUtils.countVerdicts(results),
            failuresBySeverity: OutcomeUtils.countFailuresBySeverity(results),
            failedGroups: groups.filter(group => group.verdict === 'Fail').map(group => group.name),
        };
    }
}
