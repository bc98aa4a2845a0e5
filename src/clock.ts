/**
 * Source of the current time in whole seconds since the Unix epoch.
 */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

export default systemClock;
