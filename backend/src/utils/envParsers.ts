/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty
 * or not numeric.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    if (typeof value !== "string" || value.trim().length === 0) {
        return fallback;
    }
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseEnvFloat(value: string | undefined, fallback: number): number {
    if (typeof value !== "string" || value.trim().length === 0) {
        return fallback;
    }
    const parsed = Number.parseFloat(value);
    return Number.isNaN(parsed) ? fallback : parsed;
}

export function isEnvFlagEnabled(value: string | undefined): boolean {
    return value === "true";
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

/**
 * Parses `key:number` pairs separated by commas, e.g. `jazz:30,ambient:25`.
 * Malformed pairs are skipped.
 */
export function parseEnvIntMap(
    value: string | undefined
): Record<string, number> | undefined {
    const entries = parseEnvCsv(value);
    if (!entries) {
        return undefined;
    }

    const output: Record<string, number> = {};
    for (const entry of entries) {
        const separator = entry.lastIndexOf(":");
        if (separator <= 0) {
            continue;
        }
        const key = entry.slice(0, separator).trim();
        const parsed = Number.parseInt(entry.slice(separator + 1), 10);
        if (key && !Number.isNaN(parsed)) {
            output[key] = parsed;
        }
    }
    return output;
}
