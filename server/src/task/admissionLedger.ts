import { EventEmitter } from 'node:events';
import { logger } from '../core/logger.js';

export interface LedgerSnapshot {
    running: number;
    capacity: number;
}

/**
 * In-memory count of running tasks. `tryAcquire` checks and increments in
 * one synchronous step, so a burst of submissions on the event loop can never
 * push the count past the capacity. Never persisted: a restart starts at zero.
 */
export class AdmissionLedger {
    readonly capacity: number;
    private running = 0;
    private readonly emitter = new EventEmitter();

    constructor(capacity: number) {
        this.capacity = Math.max(1, Math.trunc(capacity));
    }

    /** Emits 'changed' with a snapshot after every acquire and release. */
    on(event: 'changed', cb: (snapshot: LedgerSnapshot) => void) {
        this.emitter.on(event, cb);
    }

    off(event: 'changed', cb: (snapshot: LedgerSnapshot) => void) {
        this.emitter.off(event, cb);
    }

    tryAcquire(): boolean {
        if (this.running >= this.capacity) {
            return false;
        }
        this.running += 1;
        this.emitter.emit('changed', this.snapshot());
        return true;
    }

    release() {
        if (this.running === 0) {
            logger.warn('ledger: release called with no running tasks');
            return;
        }
        this.running -= 1;
        this.emitter.emit('changed', this.snapshot());
    }

    runningCount() {
        return this.running;
    }

    snapshot(): LedgerSnapshot {
        return { running: this.running, capacity: this.capacity };
    }
}
