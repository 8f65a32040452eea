import { EventHub, type EventHubOptions } from "listenhub";

/** Subject of the demo: a plain subclass of the hub. */
export class Sender extends EventHub<Record<string, unknown>, Receiver> {
    constructor(options?: EventHubOptions) {
        super({ name: "sender", ...options });
    }
}

/** Listener of the demo. Its own instance is the listener identity. */
export class Receiver {
    constructor(
        readonly name: string,
        private readonly print: (line: string) => void,
    ) {}

    registerAt(sender: Sender, event: string): boolean {
        return sender.registerListener(event, this, (payload) => this.onMessage(payload));
    }

    onMessage(payload: unknown): void {
        this.print(`${this.name} received ${formatPayload(payload)}`);
    }
}

export function formatPayload(payload: unknown): string {
    if (payload === undefined) return "(no payload)";
    return typeof payload === "string" ? payload : JSON.stringify(payload);
}

/** JSON when it parses, otherwise the raw text. */
export function parsePayload(raw: string | undefined): unknown {
    if (raw === undefined) return undefined;
    try {
        return JSON.parse(raw);
    } catch {
        return raw;
    }
}
