/**
 * Recursively freezes plain objects and arrays in place and returns the same value.
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
        return value;
    }
    for (const nested of Object.values(value)) {
        deepFreeze(nested);
    }
    Object.freeze(value);
    return value;
}
