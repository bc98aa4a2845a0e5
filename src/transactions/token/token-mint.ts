import logger from '../../logger.js';
import { LedgerContext } from '../../initialize.js';
import { StakingErrorKind } from '../../staking/staking-errors.js';
import { toBigInt } from '../../utils/bigint.js';
import validate from '../../validation/index.js';
import { isRecord } from '../transaction-helpers.js';
import { TransactionResult } from '../transaction-interfaces.js';
import { TokenMintData } from './token-interfaces.js';

export function validateTx(data: unknown, sender: string): data is TokenMintData {
    if (!isRecord(data) || data.to === undefined || data.amount === undefined) {
        logger.warn(`[token-mint] Invalid data from ${sender}: Missing required fields (to, amount).`);
        return false;
    }
    if (!validate.accountName(data.to)) {
        logger.warn('[token-mint] Invalid recipient account name.');
        return false;
    }
    if (!validate.bigint(data.amount, false, false)) {
        logger.warn('[token-mint] Invalid amount. Must be a positive integer.');
        return false;
    }
    return true;
}

export async function processTx(data: TokenMintData, sender: string, context: LedgerContext): Promise<TransactionResult> {
    if (sender !== context.token.owner) {
        logger.warn(`[token-mint] ${sender} is not the issuer of ${context.token.symbol}.`);
        return { success: false, error: 'only the issuer can mint', kind: StakingErrorKind.Unauthorized };
    }
    const amount = toBigInt(data.amount);
    const minted = await context.token.mint(sender, data.to, amount);
    if (!minted) {
        return { success: false, error: 'mint rejected' };
    }
    return { success: true, result: { to: data.to, amount, totalSupply: context.token.totalSupply } };
}
