import 'dotenv/config';

// Runtime settings sourced from environment variables

// The API trusts the sender field of posted transactions; keep it on a private interface
export const apiHost: string = process.env.API_HOST || '127.0.0.1';
export const apiPort: number = process.env.API_PORT ? Number(process.env.API_PORT) : 3000;
export const logLevel: string = process.env.LOG_LEVEL || 'info';
export const ownerAccount: string = process.env.OWNER_ACCOUNT || 'owner';
export const custodyAccount: string = process.env.CUSTODY_ACCOUNT || 'staking-custody';
// When true, claimReward is rejected while the ledger is paused (stake always is)
export const pauseBlocksClaim: boolean = process.env.PAUSE_BLOCKS_CLAIM === 'true';

export const mongoUrl: string = process.env.MONGO_URL || '';
export const mongoDb: string = process.env.MONGO_DB || 'staking';

export const useNotification: boolean = process.env.USE_NOTIFICATION === 'true';
export const kafkaBrokers: string[] = (process.env.KAFKA_BROKERS || process.env.KAFKA_BROKER || 'localhost:29092')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
export const kafkaClientId: string = process.env.KAFKA_CLIENT_ID || 'staking-event-producer';

export default {
    apiHost,
    apiPort,
    logLevel,
    ownerAccount,
    custodyAccount,
    pauseBlocksClaim,
    mongoUrl,
    mongoDb,
    useNotification,
    kafkaBrokers,
    kafkaClientId,
};
