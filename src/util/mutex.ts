/**
 * Promise-chain locks.
 *
 * A Mutex runs its critical sections one at a time in call order. A KeyedMutex
 * keeps one such chain per key, so work on different keys proceeds in parallel
 * while work on the same key is serialized.
 */

export interface MutexInstance {
    runExclusive<T>(task: () => Promise<T> | T): Promise<T>;
    isLocked(): boolean;
}

export const create = (): MutexInstance => {
    let tail: Promise<void> = Promise.resolve();
    let pending = 0;

    const runExclusive = <T>(task: () => Promise<T> | T): Promise<T> => {
        pending++;
        const run = tail.then(() => task());
        tail = run.then(
            () => { pending--; },
            () => { pending--; },
        );
        return run;
    };

    return {
        runExclusive,
        isLocked: () => pending > 0,
    };
};

export interface KeyedMutexInstance {
    runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T>;
    activeKeys(): string[];
}

export const createKeyed = (): KeyedMutexInstance => {
    const chains = new Map<string, { mutex: MutexInstance; users: number }>();

    const runExclusive = async <T>(key: string, task: () => Promise<T> | T): Promise<T> => {
        let entry = chains.get(key);
        if (!entry) {
            entry = { mutex: create(), users: 0 };
            chains.set(key, entry);
        }
        entry.users++;
        try {
            return await entry.mutex.runExclusive(task);
        } finally {
            entry.users--;
            if (entry.users === 0) {
                chains.delete(key);
            }
        }
    };

    return {
        runExclusive,
        activeKeys: () => [...chains.keys()],
    };
};
