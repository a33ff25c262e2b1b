// src/config/drift.config.ts
import { DriftOptions } from '../types';
import { AppConfig } from './types';

export class DriftConfiguration {
    public readonly options: Readonly<DriftOptions>;

    constructor(appConfig: AppConfig) {
        this.options = Object.freeze({
            thresholds: {
                mean: { warn: appConfig.DRIFT_MEAN_WARN, critical: appConfig.DRIFT_MEAN_CRITICAL },
                stdev: { warn: appConfig.DRIFT_STDEV_WARN, critical: appConfig.DRIFT_STDEV_CRITICAL },
                null_rate: { warn: appConfig.DRIFT_NULL_RATE_WARN, critical: appConfig.DRIFT_NULL_RATE_CRITICAL },
                categorical: { warn: appConfig.DRIFT_CATEGORICAL_WARN, critical: appConfig.DRIFT_CATEGORICAL_CRITICAL },
            },
            epsilon: appConfig.DRIFT_EPSILON,
            allowColumnDrop: appConfig.DRIFT_ALLOW_COLUMN_DROP,
            allowTypeChange: appConfig.DRIFT_ALLOW_TYPE_CHANGE,
        });
    }
}
