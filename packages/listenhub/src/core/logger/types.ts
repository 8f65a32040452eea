export type LogLevel = "debug" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

export type ConsoleHandlerOptions = {
    /** Entries below this level are dropped. `"silent"` drops everything. */
    minLevel?: LogLevel | "silent";
    /** Tag printed for debug entries. */
    tag?: string;
};
