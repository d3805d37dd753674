/**
 * Waits for `work`, but settles early with `onAbort()` if the signal fires.
 * The underlying work is not cancelled: other callers sharing the same
 * promise still receive its result.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal, onAbort: () => T): Promise<T> {
    if (signal.aborted) {
        return Promise.resolve(onAbort());
    }

    return new Promise<T>((resolve, reject) => {
        const abort = () => resolve(onAbort());
        signal.addEventListener('abort', abort, { once: true });

        work.then(
            value => {
                signal.removeEventListener('abort', abort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', abort);
                reject(error);
            }
        );
    });
}
