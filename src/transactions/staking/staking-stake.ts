import logger from '../../logger.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { LedgerContext } from '../../initialize.js';
import { fromStakingResult, isRecord } from '../transaction-helpers.js';
import { TransactionResult } from '../transaction-interfaces.js';
import { StakingStakeData } from './staking-interfaces.js';

export function validateTx(data: unknown, sender: string): data is StakingStakeData {
    if (!isRecord(data) || data.amount === undefined) {
        logger.warn(`[staking-stake] Invalid data from ${sender}: Missing required field (amount).`);
        return false;
    }
    // zero and negative amounts are the ledger's call (InvalidAmount)
    if (!validate.bigint(data.amount, true, true)) {
        logger.warn(`[staking-stake] amount must be an integer within the maximum value.`);
        return false;
    }
    return true;
}

export async function processTx(data: StakingStakeData, sender: string, context: LedgerContext, id: string): Promise<TransactionResult> {
    const result = await context.ledger.stake(sender, toBigInt(data.amount), id);
    return fromStakingResult(result);
}
