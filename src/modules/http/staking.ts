import express, { Request, Response, Router } from 'express';

import { LedgerContext } from '../../initialize.js';
import logger from '../../logger.js';
import { StakeRecord } from '../../staking/staking-interfaces.js';
import { formatTokenAmountForResponse, getPagination } from './utils.js';

function transformStake(record: StakeRecord, symbol: string) {
    const principal = formatTokenAmountForResponse(record.principal, symbol);
    return {
        startTime: record.startTime,
        maturityTime: record.maturityTime,
        principal: principal.amount,
        rawPrincipal: principal.rawAmount,
        claimed: record.claimed,
    };
}

export default function stakingRouter(context: LedgerContext): Router {
    const router: Router = express.Router();
    const { ledger } = context;
    const symbol = context.token.symbol;

    // GET /staking - plan parameters and aggregate state
    router.get('/', async (_req: Request, res: Response) => {
        try {
            const custody = formatTokenAmountForResponse(await ledger.custodyBalance(), symbol);
            res.json({
                ...ledger.summary(),
                custodyBalance: custody.amount,
                rawCustodyBalance: custody.rawAmount,
            });
        } catch (error) {
            logger.error('[http] Error fetching staking summary:', error);
            res.status(500).json({ message: 'Error fetching staking summary' });
        }
    });

    // GET /staking/stakers - paginated stake records ordered by start time
    router.get('/stakers', (req: Request, res: Response) => {
        const { limit, skip } = getPagination(req);
        const entries = Object.entries(ledger.snapshot()).sort(
            ([a, left], [b, right]) => left.startTime - right.startTime || a.localeCompare(b)
        );
        const data = entries
            .slice(skip, skip + limit)
            .map(([account, record]) => ({ account, ...transformStake(record, symbol) }));
        res.json({ data, total: entries.length, limit, skip });
    });

    // GET /staking/stakers/:account
    router.get('/stakers/:account', (req: Request, res: Response) => {
        const { account } = req.params;
        const record = ledger.stakeInfoOf(account);
        res.json({
            account,
            hasStaked: ledger.hasStaked(account),
            stake: record ? transformStake(record, symbol) : null,
        });
    });

    // GET /staking/stakers/:account/expiry
    router.get('/stakers/:account/expiry', (req: Request, res: Response) => {
        const { account } = req.params;
        const expiry = ledger.getTokenExpiry(account);
        if (!expiry.success) {
            res.status(404).json({ message: expiry.message, kind: expiry.error });
            return;
        }
        res.json({ account, maturityTime: expiry.value });
    });

    return router;
}
