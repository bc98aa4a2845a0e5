import { LedgerContext } from '../initialize.js';
import { StakingResult } from '../staking/staking-errors.js';
import { TransactionHandler, TransactionResult } from './transaction-interfaces.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Payload-free transactions accept a missing or empty data object
 */
export function isEmptyPayload(value: unknown): boolean {
    return value === undefined || value === null || isRecord(value);
}

export function fromStakingResult<T>(result: StakingResult<T>): TransactionResult {
    if (result.success) {
        return { success: true, result: result.value };
    }
    return { success: false, error: result.message, kind: result.error };
}

/**
 * Pairs a payload validator with its processor. The processor only ever sees data
 * that passed the validator.
 */
export function defineHandler<T>(
    validateTx: (data: unknown, sender: string) => data is T,
    processTx: (data: T, sender: string, context: LedgerContext, id: string) => Promise<TransactionResult>
): TransactionHandler {
    return {
        validate: validateTx,
        process: async (data, sender, context, id) => {
            if (!validateTx(data, sender)) {
                return { success: false, error: 'transaction data failed validation' };
            }
            return processTx(data, sender, context, id);
        },
    };
}
