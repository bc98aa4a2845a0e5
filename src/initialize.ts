import { AccessGate, OwnerPauseGate } from './access/access-gate.js';
import { TokenLedger } from './asset/token-ledger.js';
import { Clock, systemClock } from './clock.js';
import config from './config.js';
import logger from './logger.js';
import settings from './settings.js';
import { StakingLedger } from './staking/staking-ledger.js';
import { toBigInt } from './utils/bigint.js';

export interface LedgerContext {
    token: TokenLedger;
    gate: AccessGate;
    ledger: StakingLedger;
}

export interface InitializeOptions {
    owner?: string;
    custodyAccount?: string;
    planDuration?: number;
    interestRatePercent?: number;
    initialSupply?: bigint;
    pauseBlocksClaim?: boolean;
    clock?: Clock;
}

/**
 * Builds the token, access gate and staking ledger from config and settings.
 * Options override individual values (tests pass a manual clock and small supplies).
 */
export function initializeModules(options: InitializeOptions = {}): LedgerContext {
    const owner = options.owner ?? settings.ownerAccount;
    const custodyAccount = options.custodyAccount ?? settings.custodyAccount;
    if (owner === custodyAccount) {
        throw new Error(`Owner and custody accounts must differ (both are "${owner}")`);
    }

    const token = new TokenLedger({
        symbol: config.tokenSymbol,
        name: config.tokenName,
        decimals: config.tokenDecimals,
        owner,
        initialSupply: options.initialSupply ?? toBigInt(config.tokenInitialSupply),
    });
    const gate = new OwnerPauseGate(owner);
    const ledger = new StakingLedger({
        asset: token.connect(custodyAccount),
        gate,
        planDuration: options.planDuration ?? config.planDuration,
        interestRatePercent: options.interestRatePercent ?? config.interestRatePercent,
        pauseBlocksClaim: options.pauseBlocksClaim ?? settings.pauseBlocksClaim,
        clock: options.clock ?? systemClock,
    });

    logger.info(`[initialize] ${token.symbol} issued to ${owner}, staking custody is ${custodyAccount}`);
    return { token, gate, ledger };
}

export default initializeModules;
