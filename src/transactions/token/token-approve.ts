import logger from '../../logger.js';
import { LedgerContext } from '../../initialize.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { isRecord } from '../transaction-helpers.js';
import { TransactionResult } from '../transaction-interfaces.js';
import { TokenApproveData } from './token-interfaces.js';

export function validateTx(data: unknown, sender: string): data is TokenApproveData {
    if (!isRecord(data) || data.spender === undefined || data.amount === undefined) {
        logger.warn('[token-approve] Invalid data: Missing required fields (spender, amount).');
        return false;
    }
    if (!validate.accountName(data.spender) || data.spender === sender) {
        logger.warn(`[token-approve] Invalid spender for ${sender}.`);
        return false;
    }
    // zero revokes the allowance
    if (!validate.bigint(data.amount, true, false)) {
        logger.warn('[token-approve] Invalid amount. Must be a non-negative integer.');
        return false;
    }
    return true;
}

export async function processTx(data: TokenApproveData, sender: string, context: LedgerContext): Promise<TransactionResult> {
    const amount = toBigInt(data.amount);
    const approved = await context.token.approve(sender, data.spender, amount);
    if (!approved) {
        return { success: false, error: 'approval rejected' };
    }
    return { success: true, result: { owner: sender, spender: data.spender, amount } };
}
