import { describe, expect, it, vi } from "vitest";
import { DuplicatePolicy, FailurePolicy } from "../core/event-hub/enums";
import { EventHubError } from "../core/event-hub/errors";
import { Logger } from "../core/logger/logger";
import type { LoggerContext } from "../core/types";
import { DEFAULT_HUB_NAME, defineHubOptions } from "./define-hub-options";
import type { EventHubOptions } from "./hub-options";

describe("defineHubOptions()", () => {
    it("fills in defaults", () => {
        const result = defineHubOptions();
        expect(result.name).toBe(DEFAULT_HUB_NAME);
        expect(result.duplicatePolicy).toBe(DuplicatePolicy.REPLACE);
        expect(result.failurePolicy).toBe(FailurePolicy.FAIL_FAST);
        expect(result.logger).toBeInstanceOf(Logger);
    });

    it("keeps provided values", () => {
        const logger: LoggerContext = { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const result = defineHubOptions({
            name: "sender",
            logger,
            duplicatePolicy: "reject",
            failurePolicy: FailurePolicy.COLLECT,
        });
        expect(result).toEqual({
            name: "sender",
            logger,
            duplicatePolicy: DuplicatePolicy.REJECT,
            failurePolicy: FailurePolicy.COLLECT,
        });
    });

    it("throws on an empty name", () => {
        expect(() => defineHubOptions({ name: "  " })).toThrow("defineHubOptions: name must be a non-empty string");
    });

    it("throws on an unknown duplicate policy", () => {
        const input: EventHubOptions = JSON.parse('{ "duplicatePolicy": "merge" }');
        expect(() => defineHubOptions(input)).toThrow(EventHubError);
        expect(() => defineHubOptions(input)).toThrow(
            'defineHubOptions: duplicatePolicy must be one of "replace", "reject", got "merge"',
        );
    });
});
