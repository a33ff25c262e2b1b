// src/utils/profiling/deepFreeze.utils.ts

/** Recursively freezes plain objects and arrays in place. */
export function deepFreeze<T>(value: T): T;
export function deepFreeze(value: unknown): unknown {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
        Object.freeze(value);
    }
    return value;
}
