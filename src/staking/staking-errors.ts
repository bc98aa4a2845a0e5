export enum StakingErrorKind {
    InvalidAmount = 'InvalidAmount',
    PlanClosed = 'PlanClosed',
    AlreadyStaked = 'AlreadyStaked',
    InsufficientFunds = 'InsufficientFunds',
    NotParticipant = 'NotParticipant',
    NotMatured = 'NotMatured',
    AlreadyClaimed = 'AlreadyClaimed',
    Unauthorized = 'Unauthorized',
    Paused = 'Paused',
    NotPaused = 'NotPaused',
}

export type StakingSuccess<T> = { success: true; value: T };
export type StakingFailure = { success: false; error: StakingErrorKind; message: string };

/**
 * Outcome of a ledger operation. A failure carries the first precondition that did
 * not hold; no state was changed.
 */
export type StakingResult<T = void> = StakingSuccess<T> | StakingFailure;

export function ok(): StakingSuccess<void>;
export function ok<T>(value: T): StakingSuccess<T>;
export function ok<T>(value?: T): StakingSuccess<T | undefined> {
    return { success: true, value };
}

export function fail(error: StakingErrorKind, message: string): StakingFailure {
    return { success: false, error, message };
}
