import logger from '../logger.js';
import { StakingErrorKind, StakingResult, fail, ok } from '../staking/staking-errors.js';

/**
 * Owner and pause capability consulted by the staking ledger before
 * administrative operations and stakes.
 */
export interface AccessGate {
    readonly owner: string;
    isOwner(caller: string): boolean;
    isPaused(): boolean;
    setPaused(caller: string, paused: boolean): StakingResult;
}

export class OwnerPauseGate implements AccessGate {
    readonly owner: string;
    private paused: boolean;

    constructor(owner: string, paused = false) {
        if (!owner) throw new Error('OwnerPauseGate requires an owner account');
        this.owner = owner;
        this.paused = paused;
    }

    isOwner(caller: string): boolean {
        return caller === this.owner;
    }

    isPaused(): boolean {
        return this.paused;
    }

    setPaused(caller: string, paused: boolean): StakingResult {
        if (!this.isOwner(caller)) {
            logger.warn(`[access-gate] ${caller} is not the owner and cannot ${paused ? 'pause' : 'unpause'}.`);
            return fail(StakingErrorKind.Unauthorized, 'caller is not the owner');
        }
        if (paused && this.paused) {
            return fail(StakingErrorKind.Paused, 'already paused');
        }
        if (!paused && !this.paused) {
            return fail(StakingErrorKind.NotPaused, 'not paused');
        }
        this.paused = paused;
        logger.info(`[access-gate] ${paused ? 'Paused' : 'Unpaused'} by ${caller}.`);
        return ok();
    }
}

export default OwnerPauseGate;
