import { isNil, isString } from "es-toolkit";
import { DuplicatePolicy, FailurePolicy } from "../core/event-hub/enums";
import { EventHubError } from "../core/event-hub/errors";
import { Logger } from "../core/logger/logger";
import type { EventHubOptions, ResolvedHubOptions } from "./hub-options";

export const DEFAULT_HUB_NAME = "EventHub";

function parseEnum<T extends string>(values: Record<string, T>, input: string | undefined, fallback: T, key: string): T {
    if (isNil(input)) return fallback;
    const match = Object.values(values).find((value) => value === input);
    if (match === undefined) {
        const allowed = Object.values(values)
            .map((v) => `"${v}"`)
            .join(", ");
        throw EventHubError.invalidArgument("", `defineHubOptions: ${key} must be one of ${allowed}, got "${input}"`);
    }
    return match;
}

/**
 * Validate hub options and fill in defaults.
 *
 * Without a `logger` the hub logs into a {@link Logger} with no handlers, i.e. nowhere.
 */
export function defineHubOptions(input: EventHubOptions = {}): ResolvedHubOptions {
    if (!isNil(input.name) && (!isString(input.name) || input.name.trim().length === 0)) {
        throw EventHubError.invalidArgument("", "defineHubOptions: name must be a non-empty string");
    }

    return {
        name: input.name ?? DEFAULT_HUB_NAME,
        logger: input.logger ?? new Logger(),
        duplicatePolicy: parseEnum(DuplicatePolicy, input.duplicatePolicy, DuplicatePolicy.REPLACE, "duplicatePolicy"),
        failurePolicy: parseEnum(FailurePolicy, input.failurePolicy, FailurePolicy.FAIL_FAST, "failurePolicy"),
    };
}
