/**
 * Clock and timer handle passed to every component that waits.
 *
 * Tests substitute a virtual clock so pacing, polling and teardown delays
 * run without real time passing.
 */
export interface Scheduler {
    now(): number;
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function sleepMs(
    ms: number,
    signal?: AbortSignal,
): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, Math.max(0, ms));

        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export const systemScheduler: Scheduler = {
    now: () => Date.now(),
    sleep: sleepMs,
};

/**
 * Races `task` against a timer on `scheduler`. The timer is cancelled as
 * soon as the task settles.
 */
export async function withTimeout<T>(
    scheduler: Scheduler,
    timeoutMs: number,
    task: () => Promise<T>,
    onTimeout: () => Error,
): Promise<T> {
    const controller = new AbortController();
    const timeout = scheduler.sleep(timeoutMs, controller.signal).then(() => {
        if (controller.signal.aborted) {
            return undefined;
        }

        throw onTimeout();
    });

    try {
        const result = await Promise.race([
            task().then((value) => ({ value })),
            timeout,
        ]);

        if (result === undefined) {
            throw onTimeout();
        }

        return result.value;
    } finally {
        controller.abort();
    }
}
