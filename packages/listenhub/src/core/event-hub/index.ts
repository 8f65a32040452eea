export { ListenerAccessor } from "./accessor";
export { DuplicatePolicy, EventHubErrorCode, FailurePolicy } from "./enums";
export { EventHubError, errorMessage, HandlerFailureError, isEventHubError } from "./errors";
export type { HandlerFailure } from "./errors";
export { EventHub } from "./event-hub";
export { withEventHub } from "./mixin";
export type { Constructor, EventHubApi } from "./mixin";
export type {
    EventEntry,
    EventMap,
    EventName,
    ListenerEntry,
    ListenerHandler,
    PayloadArgs,
    RegisterOptions,
} from "./types";
