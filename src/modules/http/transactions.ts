import express, { Request, Response, Router } from 'express';

import { LedgerContext } from '../../initialize.js';
import logger from '../../logger.js';
import { parseTransaction, processTransaction } from '../../transactions/index.js';
import { statusForKind } from './utils.js';

export default function transactionsRouter(context: LedgerContext): Router {
    const router: Router = express.Router();

    // POST /transactions - { type, sender, id, data }
    router.post('/', async (req: Request, res: Response) => {
        const tx = parseTransaction(req.body);
        if (!tx) {
            res.status(400).json({ success: false, error: 'invalid transaction envelope: type, sender and id are required' });
            return;
        }
        try {
            const result = await processTransaction(tx, context);
            if (result.success) {
                res.json({ id: tx.id, ...result });
                return;
            }
            res.status(result.internal ? 500 : statusForKind(result.kind)).json({ id: tx.id, ...result });
        } catch (error) {
            logger.error(`[http] Error processing transaction ${tx.id}:`, error);
            res.status(500).json({ id: tx.id, success: false, error: 'internal error' });
        }
    });

    return router;
}
