import logger from '../../logger.js';
import { LedgerContext } from '../../initialize.js';
import { fromStakingResult, isEmptyPayload } from '../transaction-helpers.js';
import { TransactionResult } from '../transaction-interfaces.js';
import { StakingEmptyData } from './staking-interfaces.js';

export function validateTx(data: unknown, sender: string): data is StakingEmptyData {
    if (!isEmptyPayload(data)) {
        logger.warn(`[staking-unpause] Unexpected payload from ${sender}.`);
        return false;
    }
    return true;
}

export async function processTx(_data: StakingEmptyData, sender: string, context: LedgerContext, id: string): Promise<TransactionResult> {
    return fromStakingResult(await context.ledger.unpause(sender, id));
}
