import { describe, expect, it } from "vitest";
import { EventHubErrorCode } from "./enums";
import { errorMessage, EventHubError, HandlerFailureError, isEventHubError } from "./errors";

describe("EventHubError", () => {
    it("eventNotFound carries code and event", () => {
        const error = EventHubError.eventNotFound("tick");
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe("EventHubError");
        expect(error.code).toBe(EventHubErrorCode.NOT_FOUND);
        expect(error.event).toBe("tick");
        expect(error.listener).toBeUndefined();
        expect(error.message).toBe('Event "tick" not found');
    });

    it("listenerNotFound describes object listeners by class name", () => {
        class Panel {}
        const panel = new Panel();
        const error = EventHubError.listenerNotFound("tick", panel);
        expect(error.message).toBe('Listener [Panel] is not registered for event "tick"');
        expect(error.listener).toBe(panel);
    });

    it("listenerNotFound describes symbol listeners without throwing", () => {
        const error = EventHubError.listenerNotFound("tick", Symbol("panel"));
        expect(error.message).toBe('Listener Symbol(panel) is not registered for event "tick"');
    });
});

describe("HandlerFailureError", () => {
    it("single failure names the listener and the cause", () => {
        const cause = new Error("boom");
        const error = new HandlerFailureError("tick", [{ listener: "a", error: cause }]);
        expect(error).toBeInstanceOf(EventHubError);
        expect(error.name).toBe("HandlerFailureError");
        expect(error.code).toBe(EventHubErrorCode.HANDLER_FAILURE);
        expect(error.message).toBe('Handler of listener a failed on event "tick": boom');
        expect(error.cause).toBe(cause);
        expect(error.listener).toBe("a");
    });

    it("several failures are summarized", () => {
        const error = new HandlerFailureError("tick", [
            { listener: "a", error: "x" },
            { listener: "b", error: "y" },
        ]);
        expect(error.message).toBe('2 handlers failed on event "tick"');
        expect(error.cause).toBe("x");
        expect(error.failures.map((f) => f.listener)).toEqual(["a", "b"]);
    });
});

describe("isEventHubError", () => {
    it("matches any hub error without a code", () => {
        expect(isEventHubError(EventHubError.eventNotFound("tick"))).toBe(true);
        expect(isEventHubError(new Error("plain"))).toBe(false);
        expect(isEventHubError("NOT_FOUND")).toBe(false);
    });

    it("filters by code", () => {
        const error = EventHubError.invalidArgument("tick", "bad");
        expect(isEventHubError(error, EventHubErrorCode.INVALID_ARGUMENT)).toBe(true);
        expect(isEventHubError(error, EventHubErrorCode.NOT_FOUND)).toBe(false);
    });
});

describe("errorMessage", () => {
    it("reads Error messages and stringifies the rest", () => {
        expect(errorMessage(new Error("boom"))).toBe("boom");
        expect(errorMessage(42)).toBe("42");
    });
});
