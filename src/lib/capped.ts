/**
 * List truncated to a fixed maximum, with an explicit count of what the cap removed
 */
export interface Capped<T> {
    items: T[];
    total: number;
    dropped: number;
}

export function capItems<T>(items: readonly T[], max: number): Capped<T> {
    const kept = items.slice(0, Math.max(0, max));
    return {
        items: kept,
        total: items.length,
        dropped: items.length - kept.length,
    };
}
