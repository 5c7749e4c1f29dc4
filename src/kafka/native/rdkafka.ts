import { ConsumerGlobalConfig, Message, KafkaConsumer as RdKafkaConsumer } from 'node-rdkafka'
import { hostname } from 'os'

import { defaultConfig } from '../../config/config'
import { logger } from '../../utils/logger'
import { promisifyCallback, sleep } from '../../utils/utils'
import { NativeClient, NativeConfig, NativeEvent, NativeEventKind, NativeLibrary, NativeQueue, NativeRecord } from './types'

// [proto://]host[:port], host being a name, an IPv4 address or a bracketed IPv6 address
const BROKER_PATTERN = /^(?:[a-z]+:\/\/)?(\[[0-9a-f:.]+\]|[^\s:/[\]]+)(?::(\d{1,5}))?$/i

export function parseBrokerList(brokers: string): string[] {
    return brokers
        .split(/[,\s]+/)
        .filter((broker) => {
            const match = BROKER_PATTERN.exec(broker)
            if (!match) {
                return false
            }
            const port = match[2]
            return port === undefined || (Number(port) > 0 && Number(port) <= 65535)
        })
        .map((broker) => broker.replace(/^[a-z]+:\/\//i, ''))
}

function toRecord(message: Message): NativeRecord {
    return {
        topic: message.topic,
        partition: message.partition,
        offset: message.offset,
        key: typeof message.key === 'string' ? Buffer.from(message.key) : message.key,
        value: message.value,
    }
}

/** Each fetched message travels in its own event, so releasing a record releases its event. */
export class FetchEvent implements NativeEvent {
    readonly kind = 'fetch'
    private message: Message | undefined
    private drained = false

    constructor(message: Message) {
        this.message = message
    }

    nextRecord(): NativeRecord | undefined {
        if (!this.message || this.drained) {
            return undefined
        }
        this.drained = true
        return toRecord(this.message)
    }

    destroy(): void {
        this.message = undefined
    }
}

export class HousekeepingEvent implements NativeEvent {
    constructor(
        readonly kind: Exclude<NativeEventKind, 'fetch'>,
        readonly detail: Record<string, unknown>
    ) {}

    nextRecord(): undefined {
        return undefined
    }

    destroy(): void {}
}

export class InMemoryQueue<E extends NativeEvent> implements NativeQueue {
    private events: E[] = []
    private destroyed = false

    push(event: E): void {
        if (this.destroyed) {
            event.destroy()
            return
        }
        this.events.push(event)
    }

    poll(): E | undefined {
        return this.events.shift()
    }

    get length(): number {
        return this.events.length
    }

    destroy(): void {
        this.destroyed = true
        this.events.splice(0).forEach((event) => event.destroy())
    }
}

export class RdKafkaClient implements NativeClient {
    private brokers: string[] = []
    private rdKafkaConsumer: RdKafkaConsumer | undefined
    private subscribed = false
    private readonly housekeepingQueue = new InMemoryQueue<HousekeepingEvent>()
    private readonly recordQueue = new InMemoryQueue<FetchEvent>()

    constructor(
        private readonly options: Readonly<Record<string, string>>,
        private readonly fetchBatchSize: number
    ) {}

    addBrokers(brokers: string): number {
        const valid = parseBrokerList(brokers)
        this.brokers.push(...valid)
        return valid.length
    }

    public getConfig(): ConsumerGlobalConfig {
        const config: ConsumerGlobalConfig = {
            'client.id': hostname(),
            log_level: 4, // WARN as the default
            'enable.auto.commit': true,
            rebalance_cb: true,
            offset_commit_cb: true,
        }
        // Options are native tunables and go through verbatim
        Object.assign(config, this.options)
        // NOTE: Offsets are only ever stored explicitly through storeOffset
        config['enable.auto.offset.store'] = false
        config['metadata.broker.list'] = this.brokers.join(',')
        return config
    }

    async connect(): Promise<void> {
        const consumer = new RdKafkaConsumer(this.getConfig(), {
            'auto.offset.reset': 'earliest',
        })
        this.rdKafkaConsumer = consumer

        const housekeeping = (kind: Exclude<NativeEventKind, 'fetch'>, detail: Record<string, unknown>): void =>
            this.housekeepingQueue.push(new HousekeepingEvent(kind, detail))

        consumer.on('event.log', (log: { severity: number; fac: string; message: string }) => {
            housekeeping('log', { log })
        })
        consumer.on('event.error', (error) => {
            housekeeping('error', { message: error.message, code: error.code, errno: error.errno })
        })
        consumer.on('event.stats', (stats: { message: string }) => {
            housekeeping('stats', { stats: stats.message })
        })
        consumer.on('rebalance', (err, assignments) => {
            housekeeping('rebalance', {
                code: err.code,
                assignments: assignments.map(({ topic, partition }) => ({ topic, partition })),
            })
        })
        consumer.on('offset.commit', (error, topicPartitionOffsets) => {
            housekeeping('offset_commit', { error: error?.message, topicPartitionOffsets })
        })

        await promisifyCallback((cb) => consumer.connect({}, cb))
        logger.info('📝', 'librdkafka consumer connected', { brokers: this.brokers })
    }

    mainQueue(): InMemoryQueue<HousekeepingEvent> {
        return this.housekeepingQueue
    }

    consumerQueue(): InMemoryQueue<FetchEvent> {
        return this.recordQueue
    }

    subscribe(topics: readonly string[]): void {
        const consumer = this.requireConsumer()
        if (topics.length === 0) {
            consumer.unsubscribe()
            this.subscribed = false
            return
        }
        consumer.subscribe([...topics])
        this.subscribed = true
    }

    async poll(timeoutMs: number, signal?: AbortSignal): Promise<void> {
        const consumer = this.requireConsumer()
        if (!this.subscribed) {
            await sleep(timeoutMs, signal)
        } else if (this.recordQueue.length >= this.fetchBatchSize) {
            // A full batch still waits for the record loop, fetch nothing until it drains
            await sleep(timeoutMs, signal)
        } else {
            // consume() runs on the libuv thread pool and fires the queued callbacks
            // (logs, stats, rebalances) as it goes
            consumer.setDefaultConsumeTimeout(timeoutMs)
            const messages = await promisifyCallback<Message[]>((cb) => consumer.consume(this.fetchBatchSize, cb))
            messages.forEach((message) => this.recordQueue.push(new FetchEvent(message)))
        }
        this.serveHousekeepingQueue()
    }

    storeOffset(topic: string, partition: number, offset: number): void {
        this.requireConsumer().offsetsStore([{ topic, partition, offset }])
    }

    async close(): Promise<void> {
        const consumer = this.rdKafkaConsumer
        if (!consumer?.isConnected()) {
            return
        }
        logger.info('📝', 'Disconnecting consumer...')
        await promisifyCallback((cb) => consumer.disconnect(cb))
        logger.info('📝', 'Disconnected consumer!')
    }

    destroy(): void {
        this.recordQueue.destroy()
        this.housekeepingQueue.destroy()
        this.rdKafkaConsumer?.removeAllListeners()
        this.rdKafkaConsumer = undefined
    }

    private serveHousekeepingQueue(): void {
        let event = this.housekeepingQueue.poll()
        while (event) {
            switch (event.kind) {
                case 'error':
                    logger.error('📝', 'librdkafka error', event.detail)
                    break
                case 'log':
                    logger.debug('📝', 'librdkafka log', event.detail)
                    break
                case 'stats':
                    logger.debug('📊', 'Kafka consumer statistics', event.detail)
                    break
                case 'rebalance':
                    logger.info('🔁', 'kafka_consumer_rebalancing', event.detail)
                    break
                case 'offset_commit':
                    logger.debug('📝', 'librdkafka_offset_commit', event.detail)
                    break
            }
            event.destroy()
            event = this.housekeepingQueue.poll()
        }
    }

    private requireConsumer(): RdKafkaConsumer {
        if (!this.rdKafkaConsumer) {
            throw new Error('librdkafka consumer is not connected')
        }
        return this.rdKafkaConsumer
    }
}

export class RdKafkaConfig implements NativeConfig {
    private readonly options: Record<string, string> = {}

    constructor(private readonly fetchBatchSize: number) {}

    set(name: string, value: string): void {
        if (!name.trim()) {
            throw new Error('Configuration property name must not be empty')
        }
        this.options[name] = value
    }

    createClient(): RdKafkaClient {
        return new RdKafkaClient({ ...this.options }, this.fetchBatchSize)
    }
}

export class RdKafkaLibrary implements NativeLibrary {
    constructor(private readonly fetchBatchSize: number = defaultConfig.CONSUMER_FETCH_BATCH_SIZE) {}

    createConfig(): RdKafkaConfig {
        return new RdKafkaConfig(this.fetchBatchSize)
    }
}
