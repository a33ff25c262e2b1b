// src/testing/fixtures.ts
import { DatasetProfile, DriftOptions, EvaluationOptions, ExplanationOptions, ProfilingOptions, Rule } from '../types';
import { MemoryTabularSource } from '../sources/memory.source';
import { profileDataset } from '../utils/profiling/profileDataset';

export const testProfilingOptions = (overrides: Partial<ProfilingOptions> = {}): ProfilingOptions => ({
    minMatchRatio: 0.95,
    cardinalityCap: 10000,
    topK: 10,
    frequencyCapacity: 1000,
    histogramBuckets: 10,
    quantileSampleSize: 10000,
    quantiles: [0.25, 0.5, 0.75],
    typeSampleSize: 0,
    batchSize: 1000,
    nullTokens: ['NA', 'null'],
    declaredTypes: {},
    ...overrides,
});

export const testDriftOptions = (overrides: Partial<DriftOptions> = {}): DriftOptions => ({
    thresholds: {
        mean: { warn: 0.1, critical: 0.25 },
        stdev: { warn: 0.1, critical: 0.25 },
        null_rate: { warn: 0.1, critical: 0.5 },
        categorical: { warn: 0.1, critical: 0.25 },
    },
    epsilon: 1e-9,
    allowColumnDrop: false,
    allowTypeChange: false,
    ...overrides,
});

export const testEvaluationOptions = (overrides: Partial<EvaluationOptions> = {}): EvaluationOptions => ({
    guardErrorMode: 'error',
    concurrency: 2,
    ...overrides,
});

export const testExplanationOptions = (overrides: Partial<ExplanationOptions> = {}): ExplanationOptions => ({
    toleranceBand: 0.05,
    epsilon: 1e-9,
    ...overrides,
});

export const profileRows = (
    name: string,
    header: readonly string[],
    rows: readonly unknown[],
    overrides: Partial<ProfilingOptions> = {}
): Promise<DatasetProfile> => profileDataset(new MemoryTabularSource(name, header, rows), testProfilingOptions(overrides));

export const rule = (fields: Omit<Rule, 'severity'> & Partial<Pick<Rule, 'severity'>>): Rule => ({ severity: 'error', ...fields });
