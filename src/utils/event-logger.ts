import config from '../config.js';
import logger from '../logger.js';
import { mongo } from '../mongo.js';
import { sendKafkaEvent } from '../modules/kafka.js';
import settings from '../settings.js';
import { bigintReplacer } from './bigint.js';
import { deterministicIdFrom } from './deterministic-id.js';

export const KAFKA_EVENTS_TOPIC = 'staking-events';

export type EventCategory = 'staking' | 'token';

/**
 * Represents the structure of an event document to be stored.
 */
export interface EventDocument {
    _id: string;
    category: EventCategory;
    action: string; // stake, claim, pause, transfer, approve, ...
    type: string; // category_action
    timestamp: string;
    actor: string;
    data: Record<string, unknown>;
    transactionId?: string;
}

const recentEvents: EventDocument[] = [];
let sequence = 0;

function normalizeEventData(data: Record<string, unknown>): Record<string, unknown> {
    // bigint is neither JSON nor reliably BSON serialisable; amounts travel as decimal strings
    const normalized: unknown = JSON.parse(JSON.stringify(data, bigintReplacer));
    return typeof normalized === 'object' && normalized !== null ? { ...normalized } : {};
}

/**
 * Records an event in the in-memory buffer, persists it to MongoDB when connected and
 * publishes it to Kafka when notifications are enabled. Persistence and publication
 * failures are logged; the event is still returned.
 */
export async function logTransactionEvent(
    category: EventCategory,
    action: string,
    actor: string,
    data: Record<string, unknown>,
    transactionId?: string
): Promise<EventDocument> {
    sequence += 1;
    const event: EventDocument = {
        _id: deterministicIdFrom([category, action, actor, transactionId || '', sequence]),
        category,
        action,
        type: `${category}_${action}`,
        timestamp: new Date().toISOString(),
        actor,
        data: normalizeEventData(data),
    };
    if (transactionId) event.transactionId = transactionId;

    recentEvents.push(event);
    if (recentEvents.length > config.recentEventsBufferSize) recentEvents.shift();
    logger.debug(`[event-logger] ${event.type} by ${actor} (${event._id})`);

    if (mongo.isConnected()) {
        try {
            await mongo.getDb().collection<EventDocument>('events').insertOne({ ...event });
        } catch (error) {
            logger.error(`[event-logger] Failed to persist event ${event._id}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    if (settings.useNotification) {
        await sendKafkaEvent(KAFKA_EVENTS_TOPIC, event, actor);
    }

    return event;
}

/**
 * Most recent events, oldest first
 */
export function getRecentEvents(limit = 50): EventDocument[] {
    if (limit <= 0) return [];
    return recentEvents.slice(-limit);
}

export function clearRecentEvents(): void {
    recentEvents.length = 0;
}
