import { Kafka, Producer, logLevel } from 'kafkajs';

import logger from '../logger.js';
import settings from '../settings.js';
import { bigintReplacer } from '../utils/bigint.js';

let producer: Producer | null = null;
let isConnected = false;
let initializing: Promise<void> | null = null;

async function connectProducer(): Promise<void> {
    const kafka = new Kafka({
        clientId: settings.kafkaClientId,
        brokers: settings.kafkaBrokers,
        logLevel: logLevel.WARN,
        retry: {
            initialRetryTime: 300,
            retries: 5,
        },
    });

    const newProducer = kafka.producer({ allowAutoTopicCreation: true });
    await newProducer.connect();
    producer = newProducer;
    isConnected = true;

    producer.on('producer.disconnect', () => {
        logger.warn('[kafka-producer] Kafka producer disconnected.');
        isConnected = false;
    });
    logger.info(`[kafka-producer] Connected to ${settings.kafkaBrokers.join(', ')}`);
}

/**
 * Connects the shared producer once; concurrent callers await the same attempt.
 * Connection failures are logged and leave the producer unset.
 */
export async function initializeKafkaProducer(): Promise<void> {
    if (isConnected) return;
    if (!initializing) {
        initializing = connectProducer()
            .catch((error: unknown) => {
                producer = null;
                isConnected = false;
                const errMsg = error instanceof Error ? `${error.message}${error.stack ? '\n' + error.stack : ''}` : String(error);
                logger.error(`[kafka-producer] Failed to initialize or connect Kafka producer: ${errMsg}`);
            })
            .finally(() => {
                initializing = null;
            });
    }
    await initializing;
}

/**
 * Sends a JSON message to a topic. Returns false when the producer is unavailable
 * or the broker rejects the message.
 */
export async function sendKafkaEvent(topic: string, message: object, key?: string): Promise<boolean> {
    if (!producer || !isConnected) {
        await initializeKafkaProducer();
    }
    if (!producer || !isConnected) {
        logger.error(`[kafka-producer] Producer unavailable, dropping event for topic '${topic}'.`);
        return false;
    }

    const stringMessage = JSON.stringify(message, bigintReplacer);
    try {
        await producer.send({
            topic,
            messages: [{ key, value: stringMessage }],
        });
        logger.debug(`[kafka-producer] Event sent to '${topic}'. Key: '${key || 'none'}'`);
        return true;
    } catch (error) {
        logger.error(`[kafka-producer] Failed to send event to '${topic}': ${error instanceof Error ? error.message : String(error)}`);
        return false;
    }
}

export async function disconnectKafkaProducer(): Promise<void> {
    if (!producer || !isConnected) {
        logger.debug('[kafka-producer] Kafka producer was not connected.');
        return;
    }
    try {
        await producer.disconnect();
        logger.info('[kafka-producer] Kafka producer disconnected successfully.');
    } catch (error) {
        logger.error(`[kafka-producer] Error disconnecting Kafka producer: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
        producer = null;
        isConnected = false;
    }
}
