import { Db, MongoClient } from 'mongodb';

import logger from './logger.js';
import settings from './settings.js';

let client: MongoClient | null = null;

interface MongoModule {
    db: Db | null;
    init: (url?: string, dbName?: string) => Promise<boolean>;
    isConnected: () => boolean;
    getDb: () => Db;
    close: () => Promise<void>;
}

export const mongo: MongoModule = {
    db: null,

    /**
     * Connects when MONGO_URL is configured. Returns false when persistence is disabled.
     */
    init: async (url: string = settings.mongoUrl, dbName: string = settings.mongoDb): Promise<boolean> => {
        if (!url) {
            logger.info('[mongo] MONGO_URL not set, events are kept in memory only.');
            return false;
        }
        const newClient = new MongoClient(url);
        await newClient.connect();
        client = newClient;
        const db = newClient.db(dbName);
        await db.collection('events').createIndex({ category: 1, action: 1 });
        await db.collection('events').createIndex({ actor: 1 });
        mongo.db = db;
        logger.info(`[mongo] Connected to ${db.databaseName}`);
        return true;
    },

    isConnected: (): boolean => mongo.db !== null,

    getDb: (): Db => {
        if (!mongo.db) {
            throw new Error('MongoDB has not been initialized. Call init() first.');
        }
        return mongo.db;
    },

    close: async (): Promise<void> => {
        if (!client) return;
        try {
            await client.close();
            logger.info('[mongo] Connection closed.');
        } finally {
            client = null;
            mongo.db = null;
        }
    },
};

export default mongo;
