import { describeValue } from "../logger/console-handler";
import { EventHubErrorCode } from "./enums";

export type HandlerFailure<TListener = unknown> = {
    readonly listener: TListener;
    readonly error: unknown;
};

type EventHubErrorInit = {
    event: string;
    listener?: unknown;
    cause?: unknown;
};

export class EventHubError extends Error {
    override readonly name: string = "EventHubError";
    readonly code: EventHubErrorCode;
    readonly event: string;
    readonly listener: unknown;

    constructor(code: EventHubErrorCode, message: string, init: EventHubErrorInit) {
        super(message, init.cause === undefined ? undefined : { cause: init.cause });
        this.code = code;
        this.event = init.event;
        this.listener = init.listener;
    }

    static eventNotFound(event: string): EventHubError {
        return new EventHubError(EventHubErrorCode.NOT_FOUND, `Event "${event}" not found`, { event });
    }

    static listenerNotFound(event: string, listener: unknown): EventHubError {
        return new EventHubError(
            EventHubErrorCode.NOT_FOUND,
            `Listener ${describeValue(listener)} is not registered for event "${event}"`,
            { event, listener },
        );
    }

    static invalidArgument(event: string, message: string): EventHubError {
        return new EventHubError(EventHubErrorCode.INVALID_ARGUMENT, message, { event });
    }
}

/**
 * Thrown by a send when one or more handlers threw.
 *
 * `failures` holds every failing listener in delivery order; under the
 * fail-fast policy it has exactly one element. `cause` is the first error.
 */
export class HandlerFailureError<TListener = unknown> extends EventHubError {
    override readonly name: string = "HandlerFailureError";
    readonly failures: readonly HandlerFailure<TListener>[];

    constructor(event: string, failures: readonly HandlerFailure<TListener>[]) {
        const first = failures[0];
        const message =
            failures.length === 1
                ? `Handler of listener ${describeValue(first?.listener)} failed on event "${event}": ${errorMessage(first?.error)}`
                : `${failures.length} handlers failed on event "${event}"`;
        super(EventHubErrorCode.HANDLER_FAILURE, message, {
            event,
            listener: first?.listener,
            cause: first?.error,
        });
        this.failures = failures;
    }
}

export function isEventHubError(value: unknown, code?: EventHubErrorCode): value is EventHubError {
    return value instanceof EventHubError && (code === undefined || value.code === code);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
