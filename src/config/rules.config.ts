// src/config/rules.config.ts
import { EvaluationOptions, ExplanationOptions } from '../types';
import { AppConfig } from './types';

export class RuleConfiguration {
    public readonly evaluation: Readonly<EvaluationOptions>;
    public readonly explanation: Readonly<ExplanationOptions>;

    constructor(appConfig: AppConfig) {
        this.evaluation = Object.freeze({
            guardErrorMode: appConfig.RULE_GUARD_ERROR_MODE,
            concurrency: appConfig.RULE_EVALUATION_CONCURRENCY,
        });
        // Explanations share the drift epsilon for relative breach sizes.
        this.explanation = Object.freeze({
            toleranceBand: appConfig.EXPLANATION_TOLERANCE_BAND,
            epsilon: appConfig.DRIFT_EPSILON,
        });
    }
}
