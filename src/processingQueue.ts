import logger from './logger.js';

type QueueTask = (callback: (err?: unknown) => void) => void;

/**
 * FIFO queue running one task at a time. Each ledger owns one so that its
 * check-then-act operations never interleave, even across awaited transfers.
 */
export class ProcessingQueue {
    queue: QueueTask[];
    processing: boolean;

    constructor() {
        this.queue = [];
        this.processing = false;
    }

    push(f: QueueTask = (cb) => cb()): void {
        this.queue.push(f);
        if (!this.processing) {
            this.processing = true;
            this.execute();
        }
    }

    /**
     * Enqueue an async task and resolve with its result once it has run.
     * A rejected task rejects only its own promise; the queue moves on.
     */
    run<T>(task: () => Promise<T>): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            this.push((done) => {
                let pending: Promise<T>;
                try {
                    pending = task();
                } catch (err) {
                    reject(err);
                    done(err);
                    return;
                }
                pending.then(
                    (result) => {
                        resolve(result);
                        done();
                    },
                    (err: unknown) => {
                        reject(err);
                        done(err);
                    }
                );
            });
        });
    }

    get size(): number {
        return this.queue.length + (this.processing ? 1 : 0);
    }

    private execute(): void {
        const first = this.queue.shift();
        if (first) {
            first((err?: unknown) => {
                if (err) {
                    logger.error('Error in ProcessingQueue task:', err);
                }
                if (this.queue.length > 0) {
                    this.execute();
                } else {
                    this.processing = false;
                }
            });
        } else {
            this.processing = false;
        }
    }
}

export default ProcessingQueue;
