import cors from 'cors';
import express, { Express, NextFunction, Request, Response } from 'express';
import { Server } from 'http';

import { LedgerContext } from '../../initialize.js';
import logger from '../../logger.js';
import settings from '../../settings.js';
import { bigintReplacer } from '../../utils/bigint.js';
import eventsRouter from './events.js';
import stakingRouter from './staking.js';
import tokensRouter from './tokens.js';
import transactionsRouter from './transactions.js';

/**
 * Express application exposing the ledger. Routes are mounted under their module name.
 */
export function createApp(context: LedgerContext): Express {
    const app = express();
    app.use(cors());
    app.use(express.json());
    app.set('json replacer', bigintReplacer);

    app.use('/staking', stakingRouter(context));
    app.use('/tokens', tokensRouter(context));
    app.use('/transactions', transactionsRouter(context));
    app.use('/events', eventsRouter());
    logger.trace('[http] API endpoints initialized');

    // malformed JSON bodies and anything a route let through
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof SyntaxError) {
            res.status(400).json({ message: 'Malformed JSON body' });
            return;
        }
        logger.error('[http] Unhandled request error:', err);
        res.status(500).json({ message: 'Internal server error' });
    });

    return app;
}

/**
 * HTTP server module. Binds to API_HOST, loopback unless configured otherwise:
 * posted transactions are applied as their stated sender.
 */
export function init(context: LedgerContext, port: number = settings.apiPort, host: string = settings.apiHost): Server {
    const app = createApp(context);
    logger.debug(`[http] Starting HTTP server on ${host}:${port}`);

    const server = app.listen(port, host, () => {
        const addr = server.address();
        if (addr && typeof addr !== 'string') {
            logger.info(`[http] HTTP server listening on ${addr.address}:${addr.port}`);
        } else {
            logger.info(`[http] HTTP server listening on port ${port}`);
        }
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'EADDRINUSE') {
            logger.error(`[http] HTTP port ${port} is already in use. Set API_PORT to use a different port.`);
        } else if (error.code === 'EACCES') {
            logger.error(`[http] Permission denied to use port ${port}. Try a port number > 1024.`);
        } else {
            logger.error('[http] HTTP server error:', error);
        }
    });

    return server;
}

export default {
    createApp,
    init
};
