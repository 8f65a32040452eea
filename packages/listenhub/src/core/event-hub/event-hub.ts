import { isNil, isPromise, isString } from "es-toolkit";
import { defineHubOptions } from "../../config/define-hub-options";
import type { EventHubOptions, ResolvedHubOptions } from "../../config/hub-options";
import { describeValue } from "../logger/console-handler";
import { ListenerAccessor } from "./accessor";
import { DuplicatePolicy, FailurePolicy } from "./enums";
import { errorMessage, EventHubError, type HandlerFailure, HandlerFailureError } from "./errors";
import type {
    EventEntry,
    EventMap,
    EventName,
    ListenerEntry,
    ListenerHandler,
    PayloadArgs,
    RegisterOptions,
} from "./types";

/**
 * Publish/subscribe registry owned by a single subject.
 *
 * Listeners register per event with a handler; each (event, listener) pair has
 * its own mute flag and every event has one more. A message reaches a listener
 * only when both flags are clear.
 *
 * Use it as a base class (`class Sender extends EventHub<SenderEvents>`) or
 * compose it into an existing class with {@link withEventHub}.
 */
export class EventHub<TEvents extends EventMap = EventMap, TListener = unknown> {
    private readonly registry = new Map<string, EventEntry<TListener>>();
    private readonly options: ResolvedHubOptions;

    constructor(options?: EventHubOptions) {
        this.options = defineHubOptions(options);
    }

    // ── Registration ─────────────────────────────────────────────────────

    /**
     * Register `listener` for `event`. Creates the event on first use.
     *
     * @returns `false` when an existing registration was kept (reject policy), `true` otherwise
     * @throws EventHubError `INVALID_ARGUMENT` on an empty event name, a nullish listener or a non-function handler
     */
    registerListener<K extends EventName<TEvents>>(
        event: K,
        listener: TListener,
        handler: ListenerHandler<TEvents[K]>,
        options: RegisterOptions = {},
    ): boolean {
        this.assertEventName(event);
        if (isNil(listener)) {
            throw EventHubError.invalidArgument(event, `registerListener: listener is required for event "${event}"`);
        }
        if (typeof handler !== "function") {
            throw EventHubError.invalidArgument(
                event,
                `registerListener: handler for ${describeValue(listener)} on event "${event}" is not a function`,
            );
        }

        let entry = this.registry.get(event);
        if (!entry) {
            entry = { name: event, muted: false, listeners: new Map() };
            this.registry.set(event, entry);
            this.log.debug(this.options.name, `event "${event}" created`);
        }

        const existing = entry.listeners.get(listener);
        if (existing) {
            const overwrite = options.overwrite ?? this.options.duplicatePolicy === DuplicatePolicy.REPLACE;
            if (!overwrite) {
                this.log.warn(
                    this.options.name,
                    `listener ${describeValue(listener)} already registered on "${event}". Rejecting new handler.`,
                );
                return false;
            }
            this.log.warn(
                this.options.name,
                `listener ${describeValue(listener)} already registered on "${event}". Replacing handler.`,
            );
            existing.handler = this.erase(handler);
            existing.muted = false;
            return true;
        }

        entry.listeners.set(listener, { listener, handler: this.erase(handler), muted: false });
        this.log.debug(this.options.name, `listener ${describeValue(listener)} registered on "${event}"`);
        return true;
    }

    /** Stop delivering `event` to `listener` without removing it. Idempotent. */
    muteListener(event: EventName<TEvents>, listener: TListener): void {
        this.requireListener(event, listener).muted = true;
    }

    unmuteListener(event: EventName<TEvents>, listener: TListener): void {
        this.requireListener(event, listener).muted = false;
    }

    /** Remove `listener` from `event`. The event stays, even when empty. */
    destroyListener(event: EventName<TEvents>, listener: TListener): void {
        this.requireListener(event, listener);
        this.requireEvent(event).listeners.delete(listener);
        this.log.debug(this.options.name, `listener ${describeValue(listener)} removed from "${event}"`);
    }

    /**
     * Mute the whole event. Listeners keep their own flags, and listeners
     * registered while the event is muted receive nothing either.
     */
    muteEvent(event: EventName<TEvents>): void {
        this.requireEvent(event).muted = true;
    }

    unmuteEvent(event: EventName<TEvents>): void {
        this.requireEvent(event).muted = false;
    }

    /** Remove the event and all of its listeners. */
    destroyEvent(event: EventName<TEvents>): void {
        this.requireEvent(event);
        this.registry.delete(event);
        this.log.debug(this.options.name, `event "${event}" destroyed`);
    }

    /**
     * Remove `listener` from every event it is registered on.
     *
     * @returns number of registrations removed
     */
    removeListener(listener: TListener): number {
        let removed = 0;
        for (const entry of this.registry.values()) {
            if (entry.listeners.delete(listener)) removed++;
        }
        if (removed > 0) {
            this.log.debug(this.options.name, `listener ${describeValue(listener)} removed from ${removed} event(s)`);
        }
        return removed;
    }

    /** Scoped view of the hub bound to one listener identity. */
    listenerFor(listener: TListener): ListenerAccessor<TEvents, TListener> {
        return new ListenerAccessor(this, listener);
    }

    // ── Delivery ─────────────────────────────────────────────────────────

    /**
     * Deliver `payload` to one listener of `event`.
     *
     * @returns `true` when the handler ran, `false` when the event or the listener is muted
     * @throws EventHubError `NOT_FOUND` when the event or the listener is unknown
     * @throws HandlerFailureError when the handler throws; a rejected async handler is only logged
     */
    sendWhisper<K extends EventName<TEvents>>(
        event: K,
        listener: TListener,
        ...[payload]: PayloadArgs<TEvents[K]>
    ): boolean {
        const entry = this.requireEvent(event);
        const target = this.requireListener(event, listener);
        this.log.debug(this.options.name, `whisper "${event}" → ${describeValue(listener)}`);

        if (entry.muted || target.muted) {
            const muted = entry.muted ? `event "${event}"` : `listener ${describeValue(listener)}`;
            this.log.warn(this.options.name, `${muted} is muted. Whisper on "${event}" was not delivered.`);
            return false;
        }

        try {
            this.settle(event, listener, target.handler(payload));
        } catch (error) {
            throw this.failure(event, [{ listener, error }]);
        }
        return true;
    }

    /**
     * Deliver `payload` to every unmuted listener of `event`, in registration order.
     *
     * The listener list is captured before the first handler runs, so handlers
     * that change the registry only affect later sends.
     *
     * @returns listeners whose handler was invoked
     * @throws EventHubError `NOT_FOUND` when the event is unknown
     * @throws HandlerFailureError when a handler throws (see `failurePolicy`)
     */
    sendMessages<K extends EventName<TEvents>>(event: K, ...[payload]: PayloadArgs<TEvents[K]>): TListener[] {
        const entry = this.requireEvent(event);
        this.log.debug(this.options.name, `broadcast "${event}"`, { listeners: entry.listeners.size });
        if (entry.muted) return [];

        const snapshot = [...entry.listeners.values()].filter((target) => !target.muted);
        const notified: TListener[] = [];
        const failures: HandlerFailure<TListener>[] = [];

        for (const target of snapshot) {
            notified.push(target.listener);
            try {
                this.settle(event, target.listener, target.handler(payload));
            } catch (error) {
                failures.push({ listener: target.listener, error });
                if (this.options.failurePolicy === FailurePolicy.FAIL_FAST) break;
            }
        }

        if (failures.length > 0) throw this.failure(event, failures);
        return notified;
    }

    // ── Introspection ────────────────────────────────────────────────────

    hasEvent(event: string): boolean {
        return this.registry.has(event);
    }

    hasListener(event: string, listener: TListener): boolean {
        return this.registry.get(event)?.listeners.has(listener) ?? false;
    }

    isEventMuted(event: EventName<TEvents>): boolean {
        return this.requireEvent(event).muted;
    }

    isListenerMuted(event: EventName<TEvents>, listener: TListener): boolean {
        return this.requireListener(event, listener).muted;
    }

    /** Event names in creation order. */
    eventNames(): string[] {
        return [...this.registry.keys()];
    }

    /** Listeners of `event` in registration order. */
    listenersOf(event: EventName<TEvents>): TListener[] {
        return [...this.requireEvent(event).listeners.keys()];
    }

    // ── Internals ────────────────────────────────────────────────────────

    private get log() {
        return this.options.logger;
    }

    private assertEventName(event: unknown): asserts event is string {
        if (!isString(event) || event.trim().length === 0) {
            throw EventHubError.invalidArgument(
                isString(event) ? event : "",
                "registerListener: event name must be a non-empty string",
            );
        }
    }

    private requireEvent(event: string): EventEntry<TListener> {
        const entry = this.registry.get(event);
        if (!entry) throw EventHubError.eventNotFound(event);
        return entry;
    }

    private requireListener(event: string, listener: TListener): ListenerEntry<TListener> {
        const target = this.requireEvent(event).listeners.get(listener);
        if (!target) throw EventHubError.listenerNotFound(event, listener);
        return target;
    }

    /** Registry entries hold handlers of every event, so the payload type is erased on the way in. */
    private erase<TPayload>(handler: ListenerHandler<TPayload>): ListenerHandler {
        return (payload) => handler(payload as TPayload);
    }

    /**
     * Sends never wait for handlers. A promise returned by an async handler is
     * watched so that its rejection is logged as a handler failure.
     */
    private settle(event: string, listener: TListener, result: unknown): void {
        if (!isPromise(result)) return;
        result.catch((error: unknown) => {
            this.failure(event, [{ listener, error }]);
        });
    }

    private failure(event: string, failures: HandlerFailure<TListener>[]): HandlerFailureError<TListener> {
        for (const { listener, error } of failures) {
            this.log.error(this.options.name, `handler of ${describeValue(listener)} failed on "${event}"`, {
                error: errorMessage(error),
            });
        }
        return new HandlerFailureError(event, failures);
    }
}
