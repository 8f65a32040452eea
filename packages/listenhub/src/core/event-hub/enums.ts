export enum EventHubErrorCode {
    NOT_FOUND = "NOT_FOUND",
    INVALID_ARGUMENT = "INVALID_ARGUMENT",
    HANDLER_FAILURE = "HANDLER_FAILURE",
}

export enum DuplicatePolicy {
    REPLACE = "replace",
    REJECT = "reject",
}

export enum FailurePolicy {
    FAIL_FAST = "fail-fast",
    COLLECT = "collect",
}
