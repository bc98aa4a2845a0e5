import { AccessGate } from '../access/access-gate.js';
import { AssetLedger } from '../asset/asset-interfaces.js';
import { Clock } from '../clock.js';

export interface PlanParameters {
    planDuration: number; // seconds
    interestRatePercent: number;
    enrollmentDeadline: number; // creation time + planDuration
}

export interface StakeRecord {
    startTime: number;
    maturityTime: number;
    principal: bigint;
    claimed: boolean;
}

export interface ClaimReceipt {
    principal: bigint;
    reward: bigint;
    payout: bigint;
}

export interface StakingLedgerOptions {
    /** Asset handle acting as the ledger's custody account */
    asset: AssetLedger;
    gate: AccessGate;
    planDuration: number;
    interestRatePercent: number;
    clock?: Clock;
    /** Reject claimReward while paused. Off by default: pause only stops new stakes */
    pauseBlocksClaim?: boolean;
}

export interface StakingSummary {
    planDuration: number;
    interestRatePercent: number;
    enrollmentDeadline: number;
    totalStakers: number;
    paused: boolean;
    owner: string;
    custodyAccount: string;
    symbol: string;
}
