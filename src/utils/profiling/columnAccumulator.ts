// src/utils/profiling/columnAccumulator.ts
import {
    ColumnProfile,
    ColumnType,
    DeclarableColumnType,
    DistinctCount,
    NumericSummary,
    ProfilingOptions,
    ValueFrequency,
} from '../../types';
import { AdaptiveHistogram } from './adaptiveHistogram';
import { DistinctCounter } from './distinctCounter';
import { FrequencyCounter } from './frequencyCounter';
import { QuantileSample } from './quantileSample';
import { RunningStats } from './runningStats';
import { TypeMatchCounts, emptyTypeMatchCounts, inferColumnType, matchesForType, resolveDeclaredType } from './typeInference.utils';
import { classifyCell, parseBoolean, parseDate, parseNumber, valueKey } from './valueParsing.utils';

/**
 * Streaming state for one column. Aggregates for every candidate type are kept
 * side by side because the final type is only known after the last row.
 */
export class ColumnAccumulator {
    private rowCount = 0;
    private rawNullCount = 0;
    private emptyStringCount = 0;
    private malformedValueCount = 0;

    private readonly inferenceCounts: TypeMatchCounts = emptyTypeMatchCounts();
    private readonly matchCounts: TypeMatchCounts = emptyTypeMatchCounts();

    private readonly numericStats = new RunningStats();
    private readonly histogram: AdaptiveHistogram;
    private readonly quantileSample: QuantileSample;
    private readonly numericDistinct: DistinctCounter;

    private readonly textDistinct: DistinctCounter;
    private readonly frequencies: FrequencyCounter;
    private minLength: number | null = null;
    private maxLength: number | null = null;

    private trueCount = 0;
    private falseCount = 0;

    private earliest: number | null = null;
    private latest: number | null = null;
    private readonly dateDistinct: DistinctCounter;

    constructor(
        public readonly name: string,
        private readonly options: ProfilingOptions,
        private readonly declaredType?: DeclarableColumnType
    ) {
        this.histogram = new AdaptiveHistogram(options.histogramBuckets);
        this.quantileSample = new QuantileSample(options.quantileSampleSize);
        this.numericDistinct = new DistinctCounter(options.cardinalityCap);
        this.textDistinct = new DistinctCounter(options.cardinalityCap);
        this.dateDistinct = new DistinctCounter(options.cardinalityCap);
        this.frequencies = new FrequencyCounter(options.frequencyCapacity);
    }

    add(input: unknown, nullTokens: ReadonlySet<string>): void {
        this.rowCount += 1;
        const cell = classifyCell(input, nullTokens);
        if (cell.malformed) this.malformedValueCount += 1;
        if (cell.emptyString) this.emptyStringCount += 1;

        const key = valueKey(cell.value);
        if (key === null) {
            this.rawNullCount += 1;
            return;
        }

        const numeric = parseNumber(cell.value);
        const bool = parseBoolean(cell.value);
        const date = numeric === null ? parseDate(cell.value) : null;

        this.tally(this.matchCounts, numeric, bool, date);
        const sampleSize = this.options.typeSampleSize;
        if (sampleSize <= 0 || this.inferenceCounts.nonNull < sampleSize) {
            this.tally(this.inferenceCounts, numeric, bool, date);
        }

        this.textDistinct.add(key);
        this.frequencies.add(key);
        this.minLength = this.minLength === null ? key.length : Math.min(this.minLength, key.length);
        this.maxLength = this.maxLength === null ? key.length : Math.max(this.maxLength, key.length);

        if (numeric !== null) {
            this.numericStats.add(numeric);
            this.histogram.add(numeric);
            this.quantileSample.add(numeric);
            this.numericDistinct.add(String(numeric));
        }
        if (bool === true) this.trueCount += 1;
        if (bool === false) this.falseCount += 1;
        if (date !== null) {
            this.dateDistinct.add(String(date));
            this.earliest = this.earliest === null ? date : Math.min(this.earliest, date);
            this.latest = this.latest === null ? date : Math.max(this.latest, date);
        }
    }

    /** A cell of a malformed row: counted as a row, contributes a null. */
    addMissing(): void {
        this.rowCount += 1;
        this.rawNullCount += 1;
    }

    finalize(): ColumnProfile {
        const decision = this.declaredType
            ? resolveDeclaredType(this.declaredType, this.inferenceCounts, this.options.minMatchRatio)
            : inferColumnType(this.inferenceCounts, this.options.minMatchRatio);
        const type = decision.type;

        const nonNullCount = matchesForType(type, this.matchCounts);
        const nullCount = this.rowCount - nonNullCount;

        const profile: ColumnProfile = {
            name: this.name,
            inferredType: type,
            ...(this.declaredType ? { declaredType: this.declaredType } : {}),
            rowCount: this.rowCount,
            nullCount,
            nonNullCount,
            nullRate: this.rowCount === 0 ? 0 : nullCount / this.rowCount,
            distinctCount: this.distinctFor(type),
            emptyStringCount: this.emptyStringCount,
            malformedValueCount: this.malformedValueCount,
            typeConflict: decision.typeConflict,
        };

        switch (type) {
            case 'Numeric':
                profile.numeric = this.numericSummary();
                break;
            case 'Boolean':
                profile.topValues = this.booleanTopValues();
                break;
            case 'Categorical':
                profile.topValues = this.frequencies.top(this.options.topK);
                profile.text = { minLength: this.minLength, maxLength: this.maxLength };
                break;
            case 'DateTime':
                profile.temporal = {
                    earliest: this.earliest === null ? null : new Date(this.earliest).toISOString(),
                    latest: this.latest === null ? null : new Date(this.latest).toISOString(),
                };
                break;
            case 'Unknown':
                break;
        }
        return profile;
    }

    private tally(counts: TypeMatchCounts, numeric: number | null, bool: boolean | null, date: number | null): void {
        counts.nonNull += 1;
        if (numeric !== null) counts.numeric += 1;
        if (bool !== null) counts.boolean += 1;
        if (date !== null) counts.date += 1;
    }

    private distinctFor(type: ColumnType): DistinctCount {
        switch (type) {
            case 'Numeric':
                return this.numericDistinct.result();
            case 'Boolean':
                return { value: (this.trueCount > 0 ? 1 : 0) + (this.falseCount > 0 ? 1 : 0), approximate: false };
            case 'DateTime':
                return this.dateDistinct.result();
            case 'Unknown':
                return { value: 0, approximate: false };
            default:
                return this.textDistinct.result();
        }
    }

    private numericSummary(): NumericSummary {
        return {
            min: this.numericStats.min,
            max: this.numericStats.max,
            mean: this.numericStats.mean,
            stdev: this.numericStats.stdev,
            quantiles: this.quantileSample.quantiles(this.options.quantiles),
            quantilesExact: this.quantileSample.exact,
            histogram: this.histogram.buckets(),
        };
    }

    private booleanTopValues(): ValueFrequency[] {
        const entries: ValueFrequency[] = [
            { value: 'true', count: this.trueCount },
            { value: 'false', count: this.falseCount },
        ];
        return entries
            .filter(entry => entry.count > 0)
            .sort((a, b) => b.count - a.count)
            .slice(0, this.options.topK);
    }
}
