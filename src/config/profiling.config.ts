// src/config/profiling.config.ts
import { ProfilingOptions } from '../types';
import { AppConfig } from './types';

export class ProfilingConfiguration {
    public readonly options: Readonly<ProfilingOptions>;

    constructor(appConfig: AppConfig) {
        this.options = Object.freeze({
            minMatchRatio: appConfig.PROFILE_MIN_MATCH_RATIO,
            cardinalityCap: appConfig.PROFILE_CARDINALITY_CAP,
            topK: appConfig.PROFILE_TOP_K,
            frequencyCapacity: appConfig.PROFILE_FREQUENCY_CAPACITY,
            histogramBuckets: appConfig.PROFILE_HISTOGRAM_BUCKETS,
            quantileSampleSize: appConfig.PROFILE_QUANTILE_SAMPLE_SIZE,
            quantiles: appConfig.PROFILE_QUANTILES,
            typeSampleSize: appConfig.PROFILE_TYPE_SAMPLE_SIZE,
            batchSize: appConfig.PROFILE_BATCH_SIZE,
            nullTokens: appConfig.PROFILE_NULL_TOKENS,
            declaredTypes: appConfig.PROFILE_DECLARED_TYPES,
        });
    }
}
