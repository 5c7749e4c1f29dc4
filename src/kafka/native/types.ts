/**
 * The primitives the bridge needs from a native Kafka client library. The production
 * implementation lives in `./rdkafka`; tests provide an in-process stub.
 */

export type NativeEventKind = 'fetch' | 'log' | 'error' | 'stats' | 'rebalance' | 'offset_commit'

export interface NativeRecord {
    readonly topic: string
    readonly partition: number
    readonly offset: number
    readonly key?: Buffer | null
    readonly value?: Buffer | null
}

/**
 * One entry taken off a native queue. Records drawn from a fetch event are only valid
 * until the event is destroyed.
 */
export interface NativeEvent {
    readonly kind: NativeEventKind
    /** The next record of a fetch event; undefined when exhausted or for other kinds. */
    nextRecord(): NativeRecord | undefined
    destroy(): void
}

export interface NativeQueue {
    /** Non-blocking dequeue. */
    poll(): NativeEvent | undefined
    destroy(): void
}

export interface NativeClient {
    /** Registers a comma-separated broker list, returning how many brokers were valid. */
    addBrokers(brokers: string): number
    connect(): Promise<void>
    /** Housekeeping queue: logs, errors, statistics, rebalances. Never carries records. */
    mainQueue(): NativeQueue
    /** Record queue: fetch events only, in delivery order. */
    consumerQueue(): NativeQueue
    subscribe(topics: readonly string[]): void
    /**
     * Serves the housekeeping queue, blocking for up to `timeoutMs`. Must run off the
     * event loop thread. Idle waits end early once `signal` aborts.
     */
    poll(timeoutMs: number, signal?: AbortSignal): Promise<void>
    /** Marks `offset` as processed for the topic partition; committed later by the library. */
    storeOffset(topic: string, partition: number, offset: number): void
    /** Leaves the group, commits stored offsets and disconnects. */
    close(): Promise<void>
    destroy(): void
}

export interface NativeConfig {
    set(name: string, value: string): void
    createClient(): NativeClient
}

export interface NativeLibrary {
    createConfig(): NativeConfig
}
