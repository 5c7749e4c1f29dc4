/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects, so loops can
 * check the signal after waking up.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve()
            return
        }
        const onAbort = (): void => {
            clearTimeout(timer)
            resolve()
        }
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
}

/** Lets pending I/O callbacks and timers run before continuing. */
export function yieldToEventLoop(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve))
}

export function promisifyCallback<TResult>(
    fn: (cb: (err: unknown, result?: TResult) => void) => void
): Promise<TResult> {
    return new Promise<TResult>((resolve, reject) => {
        fn((err, result) => {
            if (err) {
                reject(err)
            } else {
                resolve(result as TResult)
            }
        })
    })
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
