interface MockPromise<T> {
    promise: Promise<T>
    resolve: (value: T) => void
    reject: (error: unknown) => void
}

export function createPromise<T = void>(): MockPromise<T> {
    let resolve: (value: T) => void = () => {}
    let reject: (error: unknown) => void = () => {}
    const promise = new Promise<T>((_resolve, _reject) => {
        resolve = _resolve
        reject = _reject
    })

    return { promise, resolve, reject }
}

/** Polls `condition` until it holds, failing the test after `timeoutMs`. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs
    while (!condition()) {
        if (Date.now() > deadline) {
            throw new Error(`Condition not met within ${timeoutMs}ms`)
        }
        await delay(2)
    }
}

export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
        setTimeout(resolve, ms)
    })
}
