import 'dotenv/config';
import { Server } from 'http';

import logger from './logger.js';
import http from './modules/http/index.js';
import { disconnectKafkaProducer, initializeKafkaProducer } from './modules/kafka.js';
import { mongo } from './mongo.js';
import { initializeModules } from './initialize.js';
import settings from './settings.js';

process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal('CRITICAL: Unhandled Rejection:', { reason: String(reason) });
    if (reason instanceof Error && reason.stack) {
        logger.fatal('Stack Trace:', reason.stack);
    }
});

process.on('uncaughtException', (error: Error) => {
    logger.fatal('CRITICAL: Uncaught Exception:', { errorName: error.name, errorMessage: error.message, stack: error.stack });
});

const allowNodeV = [20, 22];
const currentNodeV = parseInt(process.versions.node.split('.')[0]);
if (!allowNodeV.includes(currentNodeV)) {
    logger.fatal('Wrong NodeJS version. Allowed versions: v' + allowNodeV.join(', v'));
    process.exit(1);
} else {
    logger.info('Correctly using NodeJS v' + process.versions.node);
}

let server: Server | null = null;
let closing = false;

async function shutdown(signal: string): Promise<void> {
    if (closing) return;
    closing = true;
    logger.info(`Received ${signal}, shutting down...`);
    if (server) {
        const current = server;
        await new Promise<void>((resolve) => current.close(() => resolve()));
    }
    await disconnectKafkaProducer();
    await mongo.close();
    logger.info('Shutdown complete.');
    process.exit(0);
}

export async function main(): Promise<void> {
    logger.info('Starting staking node...');

    try {
        await mongo.init();
    } catch (error) {
        logger.fatal('Failed to connect to MongoDB:', error);
        process.exit(1);
    }
    if (settings.useNotification) {
        await initializeKafkaProducer();
    }

    const context = initializeModules();
    logger.info(
        `Plan: ${context.ledger.interestRatePercent()}% over ${context.ledger.planDuration()}s, ` +
        `enrollment closes at ${new Date(context.ledger.enrollmentDeadline() * 1000).toISOString()}`
    );

    server = http.init(context);

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                logger.error('Error during shutdown:', error);
                process.exit(1);
            });
        });
    }
}

main().catch((error: unknown) => {
    logger.fatal('Failed to start node:', error);
    process.exit(1);
});
