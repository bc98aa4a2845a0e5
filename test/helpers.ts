import assert from 'assert';

import { Clock } from '../src/clock.js';
import { InitializeOptions, LedgerContext, initializeModules } from '../src/initialize.js';
import { StakingErrorKind, StakingResult } from '../src/staking/staking-errors.js';

export const T0 = 1_700_000_000;
export const PLAN_DURATION = 2592000;
export const UNIT = 10n ** 18n;
export const STAKE_AMOUNT = 1000n * UNIT;

export class ManualClock implements Clock {
    private current: number;

    constructor(start: number = T0) {
        this.current = start;
    }

    now(): number {
        return this.current;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }

    set(timestamp: number): void {
        this.current = timestamp;
    }
}

export interface Fixture extends LedgerContext {
    clock: ManualClock;
    owner: string;
    alice: string;
    bob: string;
    custody: string;
}

/**
 * Owner holds the supply; alice and bob get 100 stakes' worth each and custody is
 * pre-funded with 10 stakes' worth for rewards.
 */
export async function deployFixture(options: Omit<InitializeOptions, 'clock'> = {}): Promise<Fixture> {
    const clock = new ManualClock();
    const owner = options.owner ?? 'owner';
    const custody = options.custodyAccount ?? 'staking-custody';
    const context = initializeModules({
        owner,
        custodyAccount: custody,
        planDuration: PLAN_DURATION,
        interestRatePercent: 32,
        initialSupply: STAKE_AMOUNT * 1000n,
        pauseBlocksClaim: false,
        ...options,
        clock,
    });

    await context.token.transfer(owner, 'alice', STAKE_AMOUNT * 100n);
    await context.token.transfer(owner, 'bob', STAKE_AMOUNT * 100n);
    await context.token.transfer(owner, custody, STAKE_AMOUNT * 10n);

    return { ...context, clock, owner, alice: 'alice', bob: 'bob', custody };
}

export function expectSuccess<T>(result: StakingResult<T>): T {
    if (!result.success) {
        throw new assert.AssertionError({ message: `expected success, got ${result.error}: ${result.message}` });
    }
    return result.value;
}

export function expectFailure<T>(result: StakingResult<T>, kind: StakingErrorKind): void {
    assert.strictEqual(result.success, false, `expected ${kind}, got success`);
    if (!result.success) assert.strictEqual(result.error, kind);
}
