/** Event name → payload type. */
export type EventMap = Record<string, unknown>;

export type EventName<TEvents extends EventMap> = keyof TEvents & string;

export type ListenerHandler<TPayload = unknown> = (payload: TPayload) => void;

export type ListenerEntry<TListener, TPayload = unknown> = {
    readonly listener: TListener;
    handler: ListenerHandler<TPayload>;
    muted: boolean;
};

export type EventEntry<TListener> = {
    readonly name: string;
    muted: boolean;
    // Map preserves insertion order, which is the delivery order.
    readonly listeners: Map<TListener, ListenerEntry<TListener>>;
};

export type RegisterOptions = {
    /**
     * What to do when the listener is already registered for the event.
     * `true` replaces the entry, `false` rejects the registration.
     * Falls back to the hub's `duplicatePolicy`.
     */
    overwrite?: boolean;
};

/**
 * Payload argument tuple: optional when the event's payload type admits `undefined`.
 */
export type PayloadArgs<TPayload> = undefined extends TPayload ? [payload?: TPayload] : [payload: TPayload];
