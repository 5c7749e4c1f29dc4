import { logger } from '../utils/logger'
import { errorMessage } from '../utils/utils'
import { ConsumerConfig, parseConsumerConfig } from './config'
import {
    CloseError,
    ConsumerBridgeError,
    ConsumerClosedError,
    NativeInitError,
    NoBrokersError,
    OffsetStoreError,
    SubscribeError,
} from './errors'
import { MessageHandle } from './message'
import { consumerOffsetsStored } from './metrics'
import { NativeClient, NativeEvent, NativeLibrary, NativeQueue } from './native/types'

/**
 * Owns the native client, its two queues and the subscription list of one consumer.
 * Only the housekeeping loop may call `drive` and only the record loop `pollRecord`.
 */
export class NativeConsumerHandle {
    private subscription: string[] | undefined
    private destroyed = false

    private constructor(
        public readonly config: Readonly<ConsumerConfig>,
        private readonly client: NativeClient,
        private readonly eventQueue: NativeQueue,
        private readonly recordQueue: NativeQueue
    ) {}

    static async create(input: unknown, library: NativeLibrary): Promise<NativeConsumerHandle> {
        // Throws ConfigError before anything native exists
        const config = parseConsumerConfig(input)

        let client: NativeClient
        try {
            const nativeConfig = library.createConfig()
            for (const [name, value] of Object.entries(config.options ?? {})) {
                nativeConfig.set(name, value)
            }
            client = nativeConfig.createClient()
        } catch (error) {
            throw new NativeInitError(errorMessage(error))
        }

        try {
            if (client.addBrokers(config.brokers) === 0) {
                throw new NoBrokersError(config.brokers)
            }
            await client.connect()
            return new NativeConsumerHandle(config, client, client.mainQueue(), client.consumerQueue())
        } catch (error) {
            client.destroy()
            throw error instanceof ConsumerBridgeError ? error : new NativeInitError(errorMessage(error))
        }
    }

    /**
     * Adds `topics` to the subscription and applies the whole list. Calls accumulate: after
     * `subscribe(['t1'])` and `subscribe(['t2'])` the consumer is subscribed to both. A failed
     * call keeps the attempted topics in the list.
     */
    subscribe(topics: readonly string[]): void {
        this.assertNotDestroyed('subscribe')
        const subscription = (this.subscription ??= [])
        for (const topic of topics) {
            if (!subscription.includes(topic)) {
                subscription.push(topic)
            }
        }

        try {
            this.client.subscribe(subscription)
        } catch (error) {
            throw new SubscribeError(errorMessage(error), [...subscription])
        }
        logger.info('📝', 'consumer_subscribed', { topics: subscription })
    }

    getSubscription(): readonly string[] {
        return [...(this.subscription ?? [])]
    }

    drive(timeoutMs: number, signal?: AbortSignal): Promise<void> {
        this.assertNotDestroyed('poll')
        return this.client.poll(timeoutMs, signal)
    }

    pollRecord(): NativeEvent | undefined {
        this.assertNotDestroyed('poll records')
        return this.recordQueue.poll()
    }

    storeOffset(message: MessageHandle): void {
        this.assertNotDestroyed('store offset')
        // The accessors throw InvalidHandleError for a released handle
        const topic = message.topic()
        const partition = message.partition()
        const offset = message.offset()

        try {
            this.client.storeOffset(topic, partition, offset)
        } catch (error) {
            throw new OffsetStoreError(errorMessage(error))
        }
        consumerOffsetsStored.labels({ topic }).inc()
        logger.debug('📝', 'Stored offset', { topic, partition, offset })
    }

    isDestroyed(): boolean {
        return this.destroyed
    }

    /**
     * Tears the native side down in order: record queue, client close (leave group, commit),
     * event queue, subscription list, client. A failed client close does not stop the
     * teardown; its CloseError is thrown at the end.
     */
    async close(): Promise<void> {
        if (this.destroyed) {
            return
        }
        this.destroyed = true

        this.recordQueue.destroy()

        let closeError: CloseError | undefined
        try {
            await this.client.close()
        } catch (error) {
            closeError = new CloseError(errorMessage(error))
            logger.error('📝', 'consumer_close_error', { error: closeError.message })
        }

        this.eventQueue.destroy()
        this.subscription = undefined
        this.client.destroy()

        if (closeError) {
            throw closeError
        }
    }

    private assertNotDestroyed(operation: string): void {
        if (this.destroyed) {
            throw new ConsumerClosedError(operation)
        }
    }
}
