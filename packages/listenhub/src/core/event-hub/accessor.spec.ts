/**
 * Contract: ListenerAccessor -- hub access bound to one listener.
 *
 * Sections:
 *   1. on / off
 *   2. mute / unmute / whisper
 *   3. events / dispose
 */
import { describe, expect, it, vi } from "vitest";
import { EventHub } from "./event-hub";

type Events = { tick: number; tock: string };

describe("ListenerAccessor", () => {
    describe("on / off", () => {
        it("on() registers the bound listener", () => {
            const hub = new EventHub<Events, string>();
            const handler = vi.fn();
            hub.listenerFor("panel").on("tick", handler);
            expect(hub.listenersOf("tick")).toEqual(["panel"]);
            hub.sendMessages("tick", 3);
            expect(handler).toHaveBeenCalledWith(3);
        });

        it("on() honours the per-call overwrite option", () => {
            const hub = new EventHub<Events, string>();
            const accessor = hub.listenerFor("panel");
            accessor.on("tick", vi.fn());
            expect(accessor.on("tick", vi.fn(), { overwrite: false })).toBe(false);
        });

        it("off() removes only this listener", () => {
            const hub = new EventHub<Events, string>();
            hub.registerListener("tick", "other", vi.fn());
            const accessor = hub.listenerFor("panel");
            accessor.on("tick", vi.fn());
            accessor.off("tick");
            expect(hub.listenersOf("tick")).toEqual(["other"]);
        });

        it("off() on an unknown event throws NOT_FOUND", () => {
            const hub = new EventHub<Events, string>();
            expect(() => hub.listenerFor("panel").off("tock")).toThrow('Event "tock" not found');
        });
    });

    describe("mute / unmute / whisper", () => {
        it("mute() and unmute() flip the bound listener's flag", () => {
            const hub = new EventHub<Events, string>();
            const handler = vi.fn();
            const accessor = hub.listenerFor("panel");
            accessor.on("tock", handler);

            accessor.mute("tock");
            expect(hub.isListenerMuted("tock", "panel")).toBe(true);
            expect(accessor.whisper("tock", "hidden")).toBe(false);

            accessor.unmute("tock");
            expect(accessor.whisper("tock", "shown")).toBe(true);
            expect(handler.mock.calls).toEqual([["shown"]]);
        });
    });

    describe("events / dispose", () => {
        it("events() lists the events the listener is on", () => {
            const hub = new EventHub<Events, string>();
            hub.registerListener("tock", "other", vi.fn());
            const accessor = hub.listenerFor("panel");
            accessor.on("tick", vi.fn());
            expect(accessor.events()).toEqual(["tick"]);
            accessor.on("tock", vi.fn());
            expect(accessor.events()).toEqual(["tock", "tick"]);
        });

        it("dispose() removes the listener everywhere", () => {
            const hub = new EventHub<Events, string>();
            const accessor = hub.listenerFor("panel");
            accessor.on("tick", vi.fn());
            accessor.on("tock", vi.fn());
            expect(accessor.dispose()).toBe(2);
            expect(accessor.events()).toEqual([]);
            expect(hub.eventNames()).toEqual(["tick", "tock"]);
        });

        it("exposes the bound listener", () => {
            const hub = new EventHub<Events, string>();
            expect(hub.listenerFor("panel").listener).toBe("panel");
        });
    });
});
