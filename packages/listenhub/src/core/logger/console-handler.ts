import type { ConsoleHandlerOptions, LogEntry, LogLevel } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

const LEVEL_RANK: Record<LogLevel | "silent", number> = { debug: 0, warn: 1, error: 2, silent: 3 };

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

export function colorizeValue(value: unknown): string {
    if (value === null) return `${magenta}null${reset}`;
    if (value === undefined) return `${dim}undefined${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    if (typeof value === "symbol" || typeof value === "function") return `${cyan}${describeValue(value)}${reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        const items = value.map(colorizeValue).join(`${dim},${reset} `);
        return `[${items}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v)}`);
        return `${dim}{${reset} ${pairs.join(`${dim},${reset} `)} ${dim}}${reset}`;
    }
    return String(value);
}

/** Short printable form of a listener identity or payload (never throws). */
export function describeValue(value: unknown): string {
    if (typeof value === "symbol") return value.toString();
    if (typeof value === "function") return value.name ? `[function ${value.name}]` : "[function]";
    if (typeof value === "object" && value !== null) {
        const proto: unknown = Object.getPrototypeOf(value);
        if (proto === null) return "[object]";
        const ctor = Object.getPrototypeOf(value).constructor;
        if (typeof ctor === "function" && ctor !== Object && ctor.name) return `[${ctor.name}]`;
    }
    try {
        return String(value);
    } catch {
        return "[object]";
    }
}

export function createConsoleHandler(options: ConsoleHandlerOptions = {}): (entry: LogEntry) => void {
    const minRank = LEVEL_RANK[options.minLevel ?? "debug"];
    const debugTag = options.tag ?? "listenhub";

    return (entry: LogEntry) => {
        if (LEVEL_RANK[entry.level] < minRank) return;

        const time = formatTime(entry.timestamp);
        const tag = entry.level === "debug" ? debugTag : entry.level;
        const detailsPart = entry.details ? ` ${colorizeValue(entry.details)}` : "";
        const line = `${time} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
