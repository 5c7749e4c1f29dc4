import { defaultConfig } from '../config/config'
import { logger } from '../utils/logger'
import { Channel, ReceiveChannel } from './channel'
import { ConsumerConfig } from './config'
import { ConsumerClosedError } from './errors'
import { MessageHandle } from './message'
import { NativeConsumerHandle } from './native-consumer'
import { NativeLibrary } from './native/types'
import { BackgroundLoop, housekeepingIteration, recordDrainIteration } from './polling'

const loadRdKafkaLibrary = async (): Promise<NativeLibrary> => {
    const { RdKafkaLibrary } = await import('./native/rdkafka')
    return new RdKafkaLibrary()
}

export type ConsumerOptions = {
    /** Native client library, the node-rdkafka adapter when omitted. */
    library?: NativeLibrary
    outputCapacity?: number
    pollTimeoutMs?: number
    throttleMs?: number
}

/**
 * Streams records of a Kafka consumer group into a bounded channel.
 *
 * ```ts
 * const consumer = await Consumer.create({ brokers: 'localhost:9092', options: { 'group.id': 'orders' } })
 * consumer.subscribe(['orders'])
 * for await (const message of consumer.output()) {
 *     await handle(message.value())
 *     consumer.storeOffset(message)
 *     message.release()
 * }
 * ```
 *
 * Delivery is at-least-once: offsets are only stored through `storeOffset` and committed by
 * the native client on its own schedule. Always `close()` the consumer, and stop calling
 * `subscribe`/`storeOffset` once it has been initiated.
 */
export class Consumer {
    private closed = false

    private constructor(
        public readonly config: Readonly<ConsumerConfig>,
        private readonly native: NativeConsumerHandle,
        private readonly outputChannel: Channel<MessageHandle>,
        private readonly housekeepingLoop: BackgroundLoop,
        private readonly recordLoop: BackgroundLoop
    ) {}

    static async create(config: ConsumerConfig, options: ConsumerOptions = {}): Promise<Consumer> {
        const outputChannel = new Channel<MessageHandle>(
            options.outputCapacity ?? defaultConfig.CONSUMER_OUTPUT_CHANNEL_CAPACITY
        )

        // Loaded lazily so that the native addon is only required when it is used
        const library = options.library ?? (await loadRdKafkaLibrary())
        const native = await NativeConsumerHandle.create(config, library)

        const housekeepingLoop = new BackgroundLoop(
            'housekeeping',
            housekeepingIteration(native, options.pollTimeoutMs ?? defaultConfig.CONSUMER_POLL_TIMEOUT_MS)
        )
        const recordLoop = new BackgroundLoop(
            'records',
            recordDrainIteration(native, outputChannel, options.throttleMs ?? defaultConfig.CONSUMER_THROTTLE_MS)
        )

        logger.info('📝', 'consumer_created', { brokers: native.config.brokers })
        return new Consumer(native.config, native, outputChannel, housekeepingLoop, recordLoop)
    }

    subscribe(topics: readonly string[]): void {
        if (this.closed) {
            throw new ConsumerClosedError('subscribe')
        }
        this.native.subscribe(topics)
    }

    getSubscription(): readonly string[] {
        return this.native.getSubscription()
    }

    output(): ReceiveChannel<MessageHandle> {
        return this.outputChannel
    }

    storeOffset(message: MessageHandle): void {
        if (this.closed) {
            throw new ConsumerClosedError('store offset')
        }
        this.native.storeOffset(message)
    }

    isClosed(): boolean {
        return this.closed
    }

    /**
     * Stops both loops, closes the output channel and releases the native consumer. Resolves
     * right away on every call after the first.
     */
    async close(): Promise<void> {
        if (this.closed) {
            return
        }
        this.closed = true
        logger.info('🔁', 'consumer_closing')

        this.recordLoop.cancel()
        this.housekeepingLoop.cancel()
        this.outputChannel.close()

        // Native resources must outlive any in-flight poll
        await Promise.all([this.recordLoop.promise, this.housekeepingLoop.promise])
        await this.native.close()
        logger.info('🔁', 'consumer_closed')
    }

    public toString(): string {
        return `Kafka Consumer (${this.config.brokers})`
    }
}
