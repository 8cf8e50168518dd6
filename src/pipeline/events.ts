/**
 * Event dispatch
 *
 * Events are queued in emission order and delivered on a later turn of the
 * event loop, so emitters never run listener code while holding the state
 * lock. A listener that throws or rejects is logged and skipped.
 */

import * as Logging from '../logging';
import { errorMessage } from '../errors';
import { PipelineEvent, PipelineListener } from './types';

export interface DispatcherInstance {
    emit(event: PipelineEvent): void;
    subscribe(listener: PipelineListener): () => void;
    flush(): Promise<void>;
    listenerCount(): number;
}

export const create = (): DispatcherInstance => {
    const logger = Logging.getLogger();
    const listeners = new Set<PipelineListener>();
    const queue: PipelineEvent[] = [];
    let scheduled = false;
    let waiters: Array<() => void> = [];

    const report = (event: PipelineEvent, error: unknown): void => {
        logger.error('Listener for %s event failed: %s', event.type, errorMessage(error));
    };

    const deliver = (event: PipelineEvent): void => {
        for (const listener of [...listeners]) {
            try {
                const result = listener(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => report(event, error));
                }
            } catch (error) {
                report(event, error);
            }
        }
    };

    const drain = (): void => {
        scheduled = false;
        while (queue.length > 0) {
            const event = queue.shift();
            if (event) {
                deliver(event);
            }
        }
        const resolved = waiters;
        waiters = [];
        resolved.forEach((resolve) => resolve());
    };

    const emit = (event: PipelineEvent): void => {
        logger.debug('Pipeline event: %s', event.type);
        queue.push(event);
        if (!scheduled) {
            scheduled = true;
            setImmediate(drain);
        }
    };

    const subscribe = (listener: PipelineListener): (() => void) => {
        listeners.add(listener);
        return () => {
            listeners.delete(listener);
        };
    };

    const flush = (): Promise<void> => {
        if (!scheduled && queue.length === 0) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            waiters.push(resolve);
        });
    };

    return {
        emit,
        subscribe,
        flush,
        listenerCount: () => listeners.size,
    };
};
