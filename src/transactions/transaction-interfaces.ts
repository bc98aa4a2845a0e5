import { LedgerContext } from '../initialize.js';
import { StakingErrorKind } from '../staking/staking-errors.js';
import { TransactionType } from './types.js';

export interface Transaction {
    type: TransactionType;
    sender: string;
    data?: unknown;
    id: string; // Unique transaction ID
}

export interface TransactionResult {
    success: boolean;
    error?: string;
    kind?: StakingErrorKind;
    result?: unknown;
    internal?: boolean; // failed on an unexpected exception rather than a rejection
}

export interface TransactionHandler {
    validate: (data: unknown, sender: string) => boolean;
    process: (data: unknown, sender: string, context: LedgerContext, id: string) => Promise<TransactionResult>;
}
