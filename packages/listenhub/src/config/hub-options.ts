import type { DuplicatePolicy, FailurePolicy } from "../core/event-hub/enums";
import type { LoggerContext } from "../core/types";

export type DuplicatePolicyInput = DuplicatePolicy | `${DuplicatePolicy}`;
export type FailurePolicyInput = FailurePolicy | `${FailurePolicy}`;

export interface EventHubOptions {
    /** Used as the log code of every entry the hub writes. */
    name?: string;
    logger?: LoggerContext;
    /** Re-registering a (event, listener) pair replaces the entry or is rejected. */
    duplicatePolicy?: DuplicatePolicyInput;
    /** A throwing handler aborts the broadcast, or every handler runs and failures are thrown together. */
    failurePolicy?: FailurePolicyInput;
}

export interface ResolvedHubOptions {
    readonly name: string;
    readonly logger: LoggerContext;
    readonly duplicatePolicy: DuplicatePolicy;
    readonly failurePolicy: FailurePolicy;
}
