// ── Config ──────────────────────────────────────────────────────────
export { DEFAULT_HUB_NAME, defineHubOptions } from "./config/define-hub-options";
export type {
    DuplicatePolicyInput,
    EventHubOptions,
    FailurePolicyInput,
    ResolvedHubOptions,
} from "./config/hub-options";
// ── Event hub ───────────────────────────────────────────────────────
export {
    DuplicatePolicy,
    EventHub,
    EventHubError,
    EventHubErrorCode,
    errorMessage,
    FailurePolicy,
    HandlerFailureError,
    isEventHubError,
    ListenerAccessor,
    withEventHub,
} from "./core/event-hub";
export type {
    Constructor,
    EventEntry,
    EventHubApi,
    EventMap,
    EventName,
    HandlerFailure,
    ListenerEntry,
    ListenerHandler,
    PayloadArgs,
    RegisterOptions,
} from "./core/event-hub";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler, describeValue } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { ConsoleHandlerOptions, LogEntry, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
