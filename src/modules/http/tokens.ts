import express, { Request, Response, Router } from 'express';

import { LedgerContext } from '../../initialize.js';
import { formatTokenAmountForResponse } from './utils.js';

export default function tokensRouter(context: LedgerContext): Router {
    const router: Router = express.Router();
    const { token } = context;

    // GET /tokens - token metadata
    router.get('/', (_req: Request, res: Response) => {
        const supply = formatTokenAmountForResponse(token.totalSupply, token.symbol);
        res.json({
            ...token.metadata(),
            totalSupply: supply.amount,
            rawTotalSupply: supply.rawAmount,
        });
    });

    // GET /tokens/balances/:account
    router.get('/balances/:account', (req: Request, res: Response) => {
        const { account } = req.params;
        const balance = formatTokenAmountForResponse(token.balanceOf(account), token.symbol);
        res.json({ account, symbol: token.symbol, balance: balance.amount, rawBalance: balance.rawAmount });
    });

    // GET /tokens/allowances/:owner/:spender
    router.get('/allowances/:owner/:spender', (req: Request, res: Response) => {
        const { owner, spender } = req.params;
        const allowance = formatTokenAmountForResponse(token.allowance(owner, spender), token.symbol);
        res.json({ owner, spender, symbol: token.symbol, allowance: allowance.amount, rawAllowance: allowance.rawAmount });
    });

    return router;
}
