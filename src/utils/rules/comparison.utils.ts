// src/utils/rules/comparison.utils.ts
import { ColumnType, RuleOperator, RuleThreshold } from '../../types';
import { isRangeThreshold } from './formatting.utils';

/**
 * Applies `operator` to a defined observation. Mismatched kinds (a type name
 * against a number) never hold.
 */
export const compareObserved = (
    observed: number | ColumnType,
    operator: RuleOperator,
    threshold: RuleThreshold
): boolean => {
    if (operator === 'in_range') {
        return typeof observed === 'number'
            && isRangeThreshold(threshold)
            && observed >= threshold[0]
            && observed <= threshold[1];
    }
    if (isRangeThreshold(threshold)) {
        return false;
    }
    if (typeof observed === 'string' || typeof threshold === 'string') {
        if (operator === 'eq') return observed === threshold;
        if (operator === 'ne') return observed !== threshold;
        return false;
    }
    switch (operator) {
        case 'eq':
            return observed === threshold;
        case 'ne':
            return observed !== threshold;
        case 'lt':
            return observed < threshold;
        case 'le':
            return observed <= threshold;
        case 'gt':
            return observed > threshold;
        case 'ge':
            return observed >= threshold;
    }
};
