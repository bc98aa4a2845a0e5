import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import settings from './settings.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const logsDir = process.env.LOG_DIR || path.join(__dirname, '..', 'logs');

if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
}

// fatal: start-up and process-level failures; trace: per-transfer token movements
export const stakingLevels = {
    levels: {
        fatal: 0,
        error: 1,
        warn: 2,
        info: 3,
        debug: 4,
        trace: 5,
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        warn: 'yellow',
        info: 'green',
        debug: 'white',
        trace: 'grey',
    },
};

export type StakingLogLevel = keyof typeof stakingLevels.levels;

function isStakingLogLevel(value: string): value is StakingLogLevel {
    return Object.prototype.hasOwnProperty.call(stakingLevels.levels, value);
}

/**
 * Level to run at for a LOG_LEVEL value; unknown values fall back to info
 */
export function resolveLogLevel(value: string): StakingLogLevel {
    const level = value.toLowerCase();
    return isStakingLogLevel(level) ? level : 'info';
}

const logLevel = resolveLogLevel(settings.logLevel);
if (logLevel !== settings.logLevel.toLowerCase()) {
    console.warn(`Invalid LOG_LEVEL "${settings.logLevel}", using "info". Valid levels are: ${Object.keys(stakingLevels.levels).join(', ')}`);
}

const logFile = path.join(logsDir, `staking-${settings.ownerAccount}.log`);

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

winston.addColors(stakingLevels.colors);

const logger = winston.createLogger({
    levels: stakingLevels.levels,
    level: logLevel,
    format: winston.format.errors({ stack: true }),
    transports: [
        new winston.transports.Console({ format: consoleFormat }),
        new winston.transports.File({
            filename: logFile,
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
    ],
});

export default logger;
