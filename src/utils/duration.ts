const UNIT_MS: Record<string, number> = {
    ms: 1,
    s: 1_000,
    m: 60_000,
    h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h)/g;
const WHOLE = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h))+$/;

/** Longest delay a Node.js timer honours; anything above fires after 1ms */
export const MAX_DURATION_MS = 2_147_483_647;

/**
 * Parse a duration such as `500ms`, `5s` or `1m30s` into milliseconds.
 * Returns null for anything else, including zero and values above
 * MAX_DURATION_MS.
 */
export function parseDuration(input: string): number | null {
    const ms = totalMs(input);
    return ms !== null && ms > 0 && ms <= MAX_DURATION_MS ? ms : null;
}

/**
 * Why `input` is not a usable duration, or null when it is one
 */
export function durationError(input: string): string | null {
    const ms = totalMs(input);
    if (ms === null || ms <= 0) {
        return `"${input}" is not a duration (e.g. 500ms, 5s, 1m30s)`;
    }
    if (ms > MAX_DURATION_MS) {
        return `"${input}" is too long (at most ${MAX_DURATION_MS}ms)`;
    }
    return null;
}

function totalMs(input: string): number | null {
    const value = input.trim();
    if (!WHOLE.test(value)) return null;

    let total = 0;
    for (const match of value.matchAll(SEGMENT)) {
        total += Number(match[1]) * UNIT_MS[match[2]];
    }
    return Math.round(total);
}

/**
 * Render milliseconds back into the shortest readable duration.
 */
export function formatDuration(ms: number): string {
    if (ms < 1_000 || ms % 1_000 !== 0) return `${ms}ms`;
    if (ms < 60_000 || ms % 60_000 !== 0) return `${ms / 1_000}s`;
    return `${ms / 60_000}m`;
}
