/** The consuming side of a channel, as handed to application code. */
export interface ReceiveChannel<T extends object> extends AsyncIterable<T> {
    /** Resolves with the next item, or `null` once the channel is closed and drained. */
    get(): Promise<T | null>
    size(): number
    isClosed(): boolean
}

interface PendingSend<T> {
    item: T
    resolve: (sent: boolean) => void
}

/**
 * Bounded FIFO between async tasks. `put` waits while the channel is full, `get` waits while
 * it is empty. Closing wakes everyone: pending and later sends resolve `false`, receivers
 * drain what is left and then get `null`.
 */
export class Channel<T extends object> implements ReceiveChannel<T> {
    private readonly items: T[] = []
    private readonly receivers: ((item: T | null) => void)[] = []
    private readonly senders: PendingSend<T>[] = []
    private closed = false

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new Error(`Channel capacity must be a positive integer, got ${capacity}`)
        }
    }

    /**
     * Resolves `true` once the item is in the channel (or handed to a receiver), `false` if
     * the channel closed or `signal` aborted first. An item that was not sent stays owned by
     * the caller.
     */
    put(item: T, signal?: AbortSignal): Promise<boolean> {
        if (this.closed || signal?.aborted) {
            return Promise.resolve(false)
        }

        const receiver = this.receivers.shift()
        if (receiver) {
            receiver(item)
            return Promise.resolve(true)
        }

        if (this.items.length < this.capacity) {
            this.items.push(item)
            return Promise.resolve(true)
        }

        return new Promise<boolean>((resolve) => {
            const pending: PendingSend<T> = {
                item,
                resolve: (sent) => {
                    signal?.removeEventListener('abort', onAbort)
                    resolve(sent)
                },
            }
            const onAbort = (): void => {
                const index = this.senders.indexOf(pending)
                if (index >= 0) {
                    this.senders.splice(index, 1)
                    pending.resolve(false)
                }
            }
            signal?.addEventListener('abort', onAbort, { once: true })
            this.senders.push(pending)
        })
    }

    get(): Promise<T | null> {
        const item = this.items.shift()
        if (item !== undefined) {
            // Space was freed, let the oldest blocked sender in
            const sender = this.senders.shift()
            if (sender) {
                this.items.push(sender.item)
                sender.resolve(true)
            }
            return Promise.resolve(item)
        }

        if (this.closed) {
            return Promise.resolve(null)
        }

        return new Promise<T | null>((resolve) => this.receivers.push(resolve))
    }

    size(): number {
        return this.items.length
    }

    isClosed(): boolean {
        return this.closed
    }

    close(): void {
        if (this.closed) {
            return
        }
        this.closed = true
        this.receivers.splice(0).forEach((receive) => receive(null))
        this.senders.splice(0).forEach((sender) => sender.resolve(false))
    }

    async *[Symbol.asyncIterator](): AsyncIterator<T> {
        let item = await this.get()
        while (item !== null) {
            yield item
            item = await this.get()
        }
    }
}
