import { CancelledError } from './errors';

export function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CancelledError();
    }
}

/** Resolves after `ms`, or rejects with CancelledError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export interface AbortWatch {
    /** Resolves once the signal aborts. Never rejects. */
    promise: Promise<void>;
    /** Detaches the abort listener; the promise then never settles. */
    dispose(): void;
}

export function whenAborted(signal: AbortSignal): AbortWatch {
    if (signal.aborted) return { promise: Promise.resolve(), dispose: () => {} };
    let onAbort = () => {};
    const promise = new Promise<void>(resolve => {
        onAbort = () => resolve();
    });
    signal.addEventListener('abort', onAbort, { once: true });
    return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}
