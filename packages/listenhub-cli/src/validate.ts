import type { LogLevel } from "listenhub";

export type CliLogLevel = LogLevel | "silent";

const VALID_LOG_LEVELS: readonly CliLogLevel[] = ["debug", "warn", "error", "silent"];

/** Validate --logLevel. Throws on unknown values. */
export function validateLogLevel(value: string | undefined, fallback: CliLogLevel): CliLogLevel {
    if (value === undefined) return fallback;
    const level = VALID_LOG_LEVELS.find((l) => l === value);
    if (!level) {
        throw new Error(`Unknown --logLevel value "${value}". Valid values: ${VALID_LOG_LEVELS.join(", ")}.`);
    }
    return level;
}

/** Validate --receivers. cac hands numbers through as numbers, anything else as strings. */
export function validateReceiverCount(value: number | string | undefined, fallback: number): number {
    if (value === undefined) return fallback;
    const count = typeof value === "number" ? value : Number(value);
    if (!Number.isInteger(count) || count < 1) {
        throw new Error(`--receivers must be a positive integer, got "${value}"`);
    }
    return count;
}
