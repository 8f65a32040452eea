import type { EventHub } from "./event-hub";
import type { EventMap, EventName, ListenerHandler, PayloadArgs, RegisterOptions } from "./types";

/**
 * Hub access bound to one listener identity.
 *
 * - `on("tick", handler)` -> `hub.registerListener("tick", listener, handler)`
 * - `mute("tick")` / `unmute("tick")` / `off("tick")` -> per-listener controls
 * - `dispose()` -> removes the listener from every event
 */
export class ListenerAccessor<TEvents extends EventMap, TListener> {
    constructor(
        private readonly hub: EventHub<TEvents, TListener>,
        readonly listener: TListener,
    ) {}

    on<K extends EventName<TEvents>>(
        event: K,
        handler: ListenerHandler<TEvents[K]>,
        options?: RegisterOptions,
    ): boolean {
        return this.hub.registerListener(event, this.listener, handler, options);
    }

    mute(event: EventName<TEvents>): void {
        this.hub.muteListener(event, this.listener);
    }

    unmute(event: EventName<TEvents>): void {
        this.hub.unmuteListener(event, this.listener);
    }

    off(event: EventName<TEvents>): void {
        this.hub.destroyListener(event, this.listener);
    }

    whisper<K extends EventName<TEvents>>(event: K, ...args: PayloadArgs<TEvents[K]>): boolean {
        return this.hub.sendWhisper(event, this.listener, ...args);
    }

    /** Events this listener is registered on, in event creation order. */
    events(): string[] {
        return this.hub.eventNames().filter((event) => this.hub.hasListener(event, this.listener));
    }

    dispose(): number {
        return this.hub.removeListener(this.listener);
    }
}
