/**
 * Worker Registry
 *
 * Lookup of specialist workers by id for the worker nodes.
 */

import type { WorkerId } from '../state';
import { createAgentLogger } from '../tracing';
import type { Worker } from './types';

const log = createAgentLogger('WorkerRegistry');

export class WorkerRegistry {
    private workers: Map<WorkerId, Worker> = new Map();

    constructor(workers: readonly Worker[] = []) {
        for (const worker of workers) {
            this.register(worker);
        }
    }

    /**
     * Register a worker, replacing any with the same id
     */
    register(worker: Worker): void {
        if (this.workers.has(worker.id)) {
            log.warn('Replacing existing worker', { id: worker.id });
        }
        this.workers.set(worker.id, worker);
        log.debug('Worker registered', { id: worker.id });
    }

    get(id: WorkerId): Worker | undefined {
        return this.workers.get(id);
    }
}
