import type { LeveledLogMethod } from 'winston';

// Levels registered in logger.ts beyond winston's npm set
declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        trace: LeveledLogMethod;
    }
}
