import type { EventHubOptions } from "../../config/hub-options";
import type { ListenerAccessor } from "./accessor";
import { EventHub } from "./event-hub";
import type { EventMap, EventName, ListenerHandler, PayloadArgs, RegisterOptions } from "./types";

// biome-ignore lint/suspicious/noExplicitAny: mixin base constructors must accept any[]
export type Constructor<T = object> = new (...args: any[]) => T;

/** Public surface shared by {@link EventHub} subclasses and {@link withEventHub} hosts. */
export type EventHubApi<TEvents extends EventMap = EventMap, TListener = unknown> = Pick<
    EventHub<TEvents, TListener>,
    | "registerListener"
    | "muteListener"
    | "unmuteListener"
    | "destroyListener"
    | "muteEvent"
    | "unmuteEvent"
    | "destroyEvent"
    | "removeListener"
    | "listenerFor"
    | "sendWhisper"
    | "sendMessages"
    | "hasEvent"
    | "hasListener"
    | "isEventMuted"
    | "isListenerMuted"
    | "eventNames"
    | "listenersOf"
>;

/**
 * Give an existing class the {@link EventHub} surface without changing its base.
 *
 * @example
 * class Thermostat extends withEventHub<{ reading: number }>({ name: "thermostat" })(Device) {
 *     report(value: number) {
 *         this.sendMessages("reading", value);
 *     }
 * }
 */
export function withEventHub<TEvents extends EventMap = EventMap, TListener = unknown>(options?: EventHubOptions) {
    return <TBase extends Constructor>(Base: TBase) =>
        class extends Base implements EventHubApi<TEvents, TListener> {
            /** Each host instance owns its own registry. */
            private readonly eventHub: EventHub<TEvents, TListener> = new EventHub<TEvents, TListener>(options);

            registerListener<K extends EventName<TEvents>>(
                event: K,
                listener: TListener,
                handler: ListenerHandler<TEvents[K]>,
                registerOptions?: RegisterOptions,
            ): boolean {
                return this.eventHub.registerListener(event, listener, handler, registerOptions);
            }

            muteListener(event: EventName<TEvents>, listener: TListener): void {
                this.eventHub.muteListener(event, listener);
            }

            unmuteListener(event: EventName<TEvents>, listener: TListener): void {
                this.eventHub.unmuteListener(event, listener);
            }

            destroyListener(event: EventName<TEvents>, listener: TListener): void {
                this.eventHub.destroyListener(event, listener);
            }

            muteEvent(event: EventName<TEvents>): void {
                this.eventHub.muteEvent(event);
            }

            unmuteEvent(event: EventName<TEvents>): void {
                this.eventHub.unmuteEvent(event);
            }

            destroyEvent(event: EventName<TEvents>): void {
                this.eventHub.destroyEvent(event);
            }

            removeListener(listener: TListener): number {
                return this.eventHub.removeListener(listener);
            }

            listenerFor(listener: TListener): ListenerAccessor<TEvents, TListener> {
                return this.eventHub.listenerFor(listener);
            }

            sendWhisper<K extends EventName<TEvents>>(
                event: K,
                listener: TListener,
                ...args: PayloadArgs<TEvents[K]>
            ): boolean {
                return this.eventHub.sendWhisper(event, listener, ...args);
            }

            sendMessages<K extends EventName<TEvents>>(event: K, ...args: PayloadArgs<TEvents[K]>): TListener[] {
                return this.eventHub.sendMessages(event, ...args);
            }

            hasEvent(event: string): boolean {
                return this.eventHub.hasEvent(event);
            }

            hasListener(event: string, listener: TListener): boolean {
                return this.eventHub.hasListener(event, listener);
            }

            isEventMuted(event: EventName<TEvents>): boolean {
                return this.eventHub.isEventMuted(event);
            }

            isListenerMuted(event: EventName<TEvents>, listener: TListener): boolean {
                return this.eventHub.isListenerMuted(event, listener);
            }

            eventNames(): string[] {
                return this.eventHub.eventNames();
            }

            listenersOf(event: EventName<TEvents>): TListener[] {
                return this.eventHub.listenersOf(event);
            }
        };
}
