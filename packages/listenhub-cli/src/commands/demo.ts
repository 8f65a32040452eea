import { createConsoleHandler, Logger } from "listenhub";
import { parsePayload, Receiver, Sender } from "../demo/actors";
import { validateLogLevel, validateReceiverCount } from "../validate";

export interface DemoOptions {
    event: string;
    /** cac hands numeric arguments through as numbers. */
    payload?: string | number;
    receivers?: number | string;
    whisper?: string;
    mute?: string;
    logLevel?: string;
}

/**
 * Register receivers on a sender, broadcast one message and optionally whisper one.
 *
 * @returns every line printed, in order
 */
export function runDemo(options: DemoOptions, print: (line: string) => void = console.log): string[] {
    const lines: string[] = [];
    const out = (line: string) => {
        lines.push(line);
        print(line);
    };

    const logger = new Logger();
    logger.addHandler(createConsoleHandler({ minLevel: validateLogLevel(options.logLevel, "warn") }));

    const sender = new Sender({ logger });
    const count = validateReceiverCount(options.receivers, 1);
    const receivers = Array.from({ length: count }, (_, i) => new Receiver(`receiver${i + 1}`, out));
    for (const receiver of receivers) {
        receiver.registerAt(sender, options.event);
    }

    const byName = (name: string): Receiver => {
        const found = receivers.find((r) => r.name === name);
        if (!found) {
            throw new Error(`Unknown receiver "${name}". Known: ${receivers.map((r) => r.name).join(", ")}`);
        }
        return found;
    };

    if (options.mute !== undefined) {
        sender.muteListener(options.event, byName(options.mute));
    }

    const payload = parsePayload(options.payload === undefined ? undefined : String(options.payload));
    const notified = sender.sendMessages(options.event, payload);
    out(`broadcast "${options.event}" reached ${notified.length} of ${receivers.length} receiver(s)`);

    if (options.whisper !== undefined) {
        const target = byName(options.whisper);
        const delivered = sender.sendWhisper(options.event, target, payload);
        out(`whisper "${options.event}" to ${target.name}: ${delivered ? "delivered" : "muted"}`);
    }

    return lines;
}

export function demo(options: DemoOptions): void {
    try {
        runDemo(options);
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
    }
}
