// src/utils/profiling/typeInference.utils.test.ts
import { inferColumnType, resolveDeclaredType } from './typeInference.utils';

describe('inferColumnType', () => {
    it('is Unknown without non-null values', () => {
        expect(inferColumnType({ nonNull: 0, numeric: 0, boolean: 0, date: 0 }, 0.95)).toEqual({ type: 'Unknown', typeConflict: false });
    });

    it('prefers Boolean, then Numeric, then DateTime', () => {
        expect(inferColumnType({ nonNull: 10, numeric: 10, boolean: 10, date: 0 }, 0.95).type).toBe('Boolean');
        expect(inferColumnType({ nonNull: 10, numeric: 10, boolean: 0, date: 10 }, 0.95).type).toBe('Numeric');
        expect(inferColumnType({ nonNull: 10, numeric: 0, boolean: 0, date: 10 }, 0.95).type).toBe('DateTime');
    });

    it('falls back to Categorical and flags numeric-looking values', () => {
        expect(inferColumnType({ nonNull: 10, numeric: 9, boolean: 0, date: 0 }, 0.95)).toEqual({ type: 'Categorical', typeConflict: true });
        expect(inferColumnType({ nonNull: 10, numeric: 0, boolean: 0, date: 0 }, 0.95)).toEqual({ type: 'Categorical', typeConflict: false });
    });
});

describe('resolveDeclaredType', () => {
    it('keeps the declared type and flags a poor match', () => {
        expect(resolveDeclaredType('Numeric', { nonNull: 4, numeric: 1, boolean: 0, date: 0 }, 0.95)).toEqual({ type: 'Numeric', typeConflict: true });
        expect(resolveDeclaredType('Categorical', { nonNull: 4, numeric: 4, boolean: 0, date: 0 }, 0.95)).toEqual({ type: 'Categorical', typeConflict: false });
    });
});
