import cloneDeep from 'clone-deep';

import { AccessGate } from '../access/access-gate.js';
import { AssetLedger } from '../asset/asset-interfaces.js';
import { Clock, systemClock } from '../clock.js';
import logger from '../logger.js';
import { ProcessingQueue } from '../processingQueue.js';
import { percentOf } from '../utils/bigint.js';
import { logTransactionEvent } from '../utils/event-logger.js';
import { StakingErrorKind, StakingFailure, StakingResult, fail, ok } from './staking-errors.js';
import { ClaimReceipt, PlanParameters, StakeRecord, StakingLedgerOptions, StakingSummary } from './staking-interfaces.js';

/**
 * Reward owed on a principal at an integer percentage, truncated toward zero.
 */
export function computeReward(principal: bigint, interestRatePercent: number): bigint {
    return percentOf(principal, interestRatePercent);
}

/**
 * Single-plan fixed-term staking ledger.
 *
 * Each participant may stake once before the enrollment deadline; the principal is locked
 * until `startTime + planDuration` and then released together with a fixed-percentage
 * reward, exactly once. Mutating operations run one at a time through a processing queue.
 */
export class StakingLedger {
    readonly params: Readonly<PlanParameters>;
    private readonly asset: AssetLedger;
    private readonly gate: AccessGate;
    private readonly clock: Clock;
    private readonly pauseBlocksClaim: boolean;
    private readonly records = new Map<string, StakeRecord>();
    private stakerCount = 0;
    private readonly queue = new ProcessingQueue();

    constructor(options: StakingLedgerOptions) {
        if (!Number.isSafeInteger(options.planDuration) || options.planDuration <= 0) {
            throw new Error(`planDuration must be a positive integer number of seconds, got ${options.planDuration}`);
        }
        if (!Number.isSafeInteger(options.interestRatePercent) || options.interestRatePercent < 0) {
            throw new Error(`interestRatePercent must be a non-negative integer, got ${options.interestRatePercent}`);
        }
        this.asset = options.asset;
        this.gate = options.gate;
        this.clock = options.clock ?? systemClock;
        this.pauseBlocksClaim = options.pauseBlocksClaim ?? false;

        const createdAt = this.clock.now();
        this.params = Object.freeze({
            planDuration: options.planDuration,
            interestRatePercent: options.interestRatePercent,
            enrollmentDeadline: createdAt + options.planDuration,
        });
        logger.info(
            `[staking-ledger] Plan opened: ${this.params.interestRatePercent}% over ${this.params.planDuration}s, ` +
            `enrollment until ${this.params.enrollmentDeadline}, custody ${this.asset.account}`
        );
    }

    stake(participant: string, amount: bigint, transactionId?: string): Promise<StakingResult<StakeRecord>> {
        return this.queue.run(async (): Promise<StakingResult<StakeRecord>> => {
            if (this.gate.isPaused()) {
                return this.reject('stake', participant, StakingErrorKind.Paused, 'staking is paused');
            }
            if (amount <= 0n) {
                return this.reject('stake', participant, StakingErrorKind.InvalidAmount, `stake amount must be positive, got ${amount}`);
            }
            const now = this.clock.now();
            if (now >= this.params.enrollmentDeadline) {
                return this.reject('stake', participant, StakingErrorKind.PlanClosed, `enrollment closed at ${this.params.enrollmentDeadline}`);
            }
            if (this.records.has(participant)) {
                return this.reject('stake', participant, StakingErrorKind.AlreadyStaked, `${participant} already participated`);
            }

            const pulled = await this.asset.transferFrom(participant, this.asset.account, amount);
            if (!pulled) {
                return this.reject('stake', participant, StakingErrorKind.InsufficientFunds, `could not move ${amount} ${this.asset.symbol} from ${participant}`);
            }

            const record: StakeRecord = {
                startTime: now,
                maturityTime: now + this.params.planDuration,
                principal: amount,
                claimed: false,
            };
            this.records.set(participant, record);
            this.stakerCount += 1;

            logger.info(`[staking-ledger] ${participant} staked ${amount} ${this.asset.symbol}, matures at ${record.maturityTime}`);
            await logTransactionEvent('staking', 'stake', participant, {
                amount,
                startTime: record.startTime,
                maturityTime: record.maturityTime,
                totalStakers: this.stakerCount,
            }, transactionId);
            return ok({ ...record });
        });
    }

    claimReward(participant: string, transactionId?: string): Promise<StakingResult<ClaimReceipt>> {
        return this.queue.run(async (): Promise<StakingResult<ClaimReceipt>> => {
            const record = this.records.get(participant);
            if (!record) {
                return this.reject('claim', participant, StakingErrorKind.NotParticipant, `${participant} has not participated`);
            }
            const now = this.clock.now();
            if (now < record.maturityTime) {
                return this.reject('claim', participant, StakingErrorKind.NotMatured, `stake matures at ${record.maturityTime}, now ${now}`);
            }
            if (record.claimed) {
                return this.reject('claim', participant, StakingErrorKind.AlreadyClaimed, `${participant} already claimed`);
            }
            if (this.pauseBlocksClaim && this.gate.isPaused()) {
                return this.reject('claim', participant, StakingErrorKind.Paused, 'claims are paused');
            }

            const reward = computeReward(record.principal, this.params.interestRatePercent);
            const payout = record.principal + reward;
            const paid = await this.asset.transfer(participant, payout);
            if (!paid) {
                return this.reject('claim', participant, StakingErrorKind.InsufficientFunds, `custody cannot cover payout of ${payout} ${this.asset.symbol}`);
            }
            record.claimed = true;

            logger.info(`[staking-ledger] ${participant} claimed ${payout} ${this.asset.symbol} (principal ${record.principal}, reward ${reward})`);
            await logTransactionEvent('staking', 'claim', participant, { principal: record.principal, reward, payout }, transactionId);
            return ok({ principal: record.principal, reward, payout });
        });
    }

    pause(caller: string, transactionId?: string): Promise<StakingResult> {
        return this.setPaused(caller, true, transactionId);
    }

    unpause(caller: string, transactionId?: string): Promise<StakingResult> {
        return this.setPaused(caller, false, transactionId);
    }

    /**
     * Owner-only movement out of custody, independent of any stake record
     * (funding elsewhere or recovering surplus). Allowed while paused.
     */
    transferCustodialFunds(caller: string, to: string, amount: bigint, transactionId?: string): Promise<StakingResult> {
        return this.queue.run(async (): Promise<StakingResult> => {
            if (!this.gate.isOwner(caller)) {
                return this.reject('transfer', caller, StakingErrorKind.Unauthorized, 'caller is not the owner');
            }
            if (amount <= 0n) {
                return this.reject('transfer', caller, StakingErrorKind.InvalidAmount, `transfer amount must be positive, got ${amount}`);
            }
            const sent = await this.asset.transfer(to, amount);
            if (!sent) {
                return this.reject('transfer', caller, StakingErrorKind.InsufficientFunds, `custody cannot cover ${amount} ${this.asset.symbol}`);
            }
            logger.info(`[staking-ledger] ${caller} moved ${amount} ${this.asset.symbol} from custody to ${to}`);
            await logTransactionEvent('staking', 'transfer', caller, { to, amount }, transactionId);
            return ok();
        });
    }

    getTokenExpiry(participant: string): StakingResult<number> {
        const record = this.records.get(participant);
        if (!record) {
            return fail(StakingErrorKind.NotParticipant, `${participant} has not participated`);
        }
        return ok(record.maturityTime);
    }

    stakeInfoOf(participant: string): StakeRecord | null {
        const record = this.records.get(participant);
        return record ? { ...record } : null;
    }

    hasStaked(participant: string): boolean {
        return this.records.has(participant);
    }

    totalStakers(): number {
        return this.stakerCount;
    }

    planDuration(): number {
        return this.params.planDuration;
    }

    interestRatePercent(): number {
        return this.params.interestRatePercent;
    }

    enrollmentDeadline(): number {
        return this.params.enrollmentDeadline;
    }

    isPaused(): boolean {
        return this.gate.isPaused();
    }

    owner(): string {
        return this.gate.owner;
    }

    custodyAccount(): string {
        return this.asset.account;
    }

    custodyBalance(): Promise<bigint> {
        return this.asset.balanceOf(this.asset.account);
    }

    summary(): StakingSummary {
        return {
            ...this.params,
            totalStakers: this.stakerCount,
            paused: this.gate.isPaused(),
            owner: this.gate.owner,
            custodyAccount: this.asset.account,
            symbol: this.asset.symbol,
        };
    }

    /**
     * Copy of every stake record keyed by participant
     */
    snapshot(): Record<string, StakeRecord> {
        return cloneDeep(Object.fromEntries(this.records));
    }

    private setPaused(caller: string, paused: boolean, transactionId?: string): Promise<StakingResult> {
        const action = paused ? 'pause' : 'unpause';
        return this.queue.run(async (): Promise<StakingResult> => {
            const result = this.gate.setPaused(caller, paused);
            if (!result.success) {
                return this.reject(action, caller, result.error, result.message);
            }
            await logTransactionEvent('staking', action, caller, {}, transactionId);
            return result;
        });
    }

    private reject(operation: string, actor: string, error: StakingErrorKind, message: string): StakingFailure {
        logger.warn(`[staking-ledger] ${operation} by ${actor} rejected (${error}): ${message}`);
        return fail(error, message);
    }
}

export default StakingLedger;
