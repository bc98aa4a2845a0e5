import logger from '../../logger.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { LedgerContext } from '../../initialize.js';
import { fromStakingResult, isRecord } from '../transaction-helpers.js';
import { TransactionResult } from '../transaction-interfaces.js';
import { StakingTransferFundsData } from './staking-interfaces.js';

export function validateTx(data: unknown, sender: string): data is StakingTransferFundsData {
    if (!isRecord(data) || data.to === undefined || data.amount === undefined) {
        logger.warn(`[staking-transfer-funds] Invalid data from ${sender}: Missing required fields (to, amount).`);
        return false;
    }
    if (!validate.accountName(data.to)) {
        logger.warn(`[staking-transfer-funds] Invalid recipient account name.`);
        return false;
    }
    if (!validate.bigint(data.amount, true, true)) {
        logger.warn(`[staking-transfer-funds] amount must be an integer within the maximum value.`);
        return false;
    }
    return true;
}

export async function processTx(data: StakingTransferFundsData, sender: string, context: LedgerContext, id: string): Promise<TransactionResult> {
    const result = await context.ledger.transferCustodialFunds(sender, data.to, toBigInt(data.amount), id);
    return fromStakingResult(result);
}
