import logger from '../logger.js';
import { LedgerContext } from '../initialize.js';
import { StakingErrorKind } from '../staking/staking-errors.js';
import validate from '../validation/index.js';
import { defineHandler, isRecord } from './transaction-helpers.js';
import { Transaction, TransactionHandler, TransactionResult } from './transaction-interfaces.js';
import { TransactionType, transactions } from './types.js';
import * as stakingStake from './staking/staking-stake.js';
import * as stakingClaimReward from './staking/staking-claim-reward.js';
import * as stakingPause from './staking/staking-pause.js';
import * as stakingUnpause from './staking/staking-unpause.js';
import * as stakingTransferFunds from './staking/staking-transfer-funds.js';
import * as tokenTransfer from './token/token-transfer.js';
import * as tokenApprove from './token/token-approve.js';
import * as tokenMint from './token/token-mint.js';

export type { Transaction, TransactionResult } from './transaction-interfaces.js';

const transactionHandlers: { [key in TransactionType]: TransactionHandler } = {
    [TransactionType.STAKING_STAKE]: defineHandler(stakingStake.validateTx, stakingStake.processTx),
    [TransactionType.STAKING_CLAIM_REWARD]: defineHandler(stakingClaimReward.validateTx, stakingClaimReward.processTx),
    [TransactionType.STAKING_PAUSE]: defineHandler(stakingPause.validateTx, stakingPause.processTx),
    [TransactionType.STAKING_UNPAUSE]: defineHandler(stakingUnpause.validateTx, stakingUnpause.processTx),
    [TransactionType.STAKING_TRANSFER_FUNDS]: defineHandler(stakingTransferFunds.validateTx, stakingTransferFunds.processTx),
    [TransactionType.TOKEN_TRANSFER]: defineHandler(tokenTransfer.validateTx, tokenTransfer.processTx),
    [TransactionType.TOKEN_APPROVE]: defineHandler(tokenApprove.validateTx, tokenApprove.processTx),
    [TransactionType.TOKEN_MINT]: defineHandler(tokenMint.validateTx, tokenMint.processTx),
};

function isTransactionType(value: unknown): value is TransactionType {
    return typeof value === 'number' && transactions[value] !== undefined;
}

/**
 * Narrows an untrusted envelope (e.g. a JSON request body) to a Transaction.
 * `type` may be given as its numeric value or its name ("STAKING_STAKE").
 */
export function parseTransaction(body: unknown): Transaction | null {
    if (!isRecord(body)) return null;
    const rawType = body.type;
    let type: TransactionType | undefined;
    if (isTransactionType(rawType)) {
        type = rawType;
    } else if (typeof rawType === 'string') {
        const byName = Object.values(TransactionType).find(
            (value): value is TransactionType => typeof value === 'number' && TransactionType[value] === rawType
        );
        type = byName;
    }
    if (type === undefined || typeof body.sender !== 'string' || typeof body.id !== 'string' || !body.id) {
        return null;
    }
    return { type, sender: body.sender, id: body.id, data: body.data };
}

/**
 * Validate and apply a transaction
 *
 * @returns `{ success: true, result }` or the reason it was rejected; core rejections carry their `kind`
 */
export async function processTransaction(tx: Transaction, context: LedgerContext): Promise<TransactionResult> {
    try {
        if (!isTransactionType(tx.type) || !tx.sender || !tx.id) {
            logger.warn(`Invalid transaction: missing required fields`);
            return { success: false, error: 'invalid transaction: missing required fields' };
        }
        const typeName = transactions[tx.type];
        if (!validate.accountName(tx.sender)) {
            logger.warn(`Invalid sender account name for ${typeName}: ${tx.sender}`);
            return { success: false, error: 'invalid transaction: invalid sender' };
        }
        // custody funds leave only through claimReward and transferCustodialFunds
        if (tx.sender === context.ledger.custodyAccount()) {
            logger.warn(`Rejected ${typeName} (${tx.id}) sent as the custody account ${tx.sender}`);
            return { success: false, error: 'invalid transaction: custody account cannot send transactions', kind: StakingErrorKind.Unauthorized };
        }

        const handler = transactionHandlers[tx.type];
        if (!handler.validate(tx.data, tx.sender)) {
            logger.warn(`Transaction validation failed for ${typeName} (${tx.id})`);
            return { success: false, error: `invalid ${typeName} transaction data` };
        }

        const result = await handler.process(tx.data, tx.sender, context, tx.id);
        if (result.success) {
            logger.debug(`Transaction ${tx.id} applied: ${typeName} from ${tx.sender}`);
        } else {
            logger.debug(`Transaction ${tx.id} rejected: ${typeName} from ${tx.sender}: ${result.error}`);
        }
        return result;
    } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        logger.error(`Error processing transaction ${tx.id} (${tx.type}): ${errorMessage}`);
        return { success: false, error: `internal error during processing: ${errorMessage}`, internal: true };
    }
}

export { transactionHandlers };
