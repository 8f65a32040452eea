import { describe, expect, it, vi } from "vitest";
import { formatPayload, parsePayload, Receiver, Sender } from "./actors";

describe("Sender / Receiver", () => {
    it("a receiver registers itself as the listener identity", () => {
        const sender = new Sender();
        const print = vi.fn();
        const receiver = new Receiver("r1", print);
        expect(receiver.registerAt(sender, "event1")).toBe(true);
        expect(sender.listenersOf("event1")).toEqual([receiver]);
        sender.sendMessages("event1", { n: 1 });
        expect(print).toHaveBeenCalledWith('r1 received {"n":1}');
    });
});

describe("payload helpers", () => {
    it("parsePayload reads JSON and keeps other text", () => {
        expect(parsePayload('{"a":[1,2]}')).toEqual({ a: [1, 2] });
        expect(parsePayload("true")).toBe(true);
        expect(parsePayload("not json")).toBe("not json");
        expect(parsePayload(undefined)).toBeUndefined();
    });

    it("formatPayload prints strings bare and the rest as JSON", () => {
        expect(formatPayload("hi")).toBe("hi");
        expect(formatPayload([1])).toBe("[1]");
        expect(formatPayload(undefined)).toBe("(no payload)");
    });
});
