import logger from '../../logger.js';
import { LedgerContext } from '../../initialize.js';
import { StakingErrorKind } from '../../staking/staking-errors.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { isRecord } from '../transaction-helpers.js';
import { TransactionResult } from '../transaction-interfaces.js';
import { TokenTransferData } from './token-interfaces.js';

export function validateTx(data: unknown, sender: string): data is TokenTransferData {
    if (!isRecord(data) || data.to === undefined || data.amount === undefined) {
        logger.warn('[token-transfer] Invalid data: Missing required fields (to, amount).');
        return false;
    }
    if (!validate.accountName(data.to)) {
        logger.warn(`[token-transfer] Invalid recipient account name.`);
        return false;
    }
    if (data.to === sender) {
        logger.warn(`[token-transfer] Cannot transfer to self (${sender}).`);
        return false;
    }
    if (!validate.bigint(data.amount, false, false)) {
        logger.warn(`[token-transfer] Invalid amount. Must be a positive integer.`);
        return false;
    }
    return true;
}

export async function processTx(data: TokenTransferData, sender: string, context: LedgerContext): Promise<TransactionResult> {
    const amount = toBigInt(data.amount);
    const moved = await context.token.transfer(sender, data.to, amount);
    if (!moved) {
        return { success: false, error: `insufficient ${context.token.symbol} balance`, kind: StakingErrorKind.InsufficientFunds };
    }
    return { success: true, result: { from: sender, to: data.to, amount } };
}
