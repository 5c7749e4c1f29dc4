import { StubEvent, StubLibrary, createTestRecord, fetchEvent } from '../../tests/helpers/native-stub'
import {
    CloseError,
    ConfigError,
    ConsumerClosedError,
    InvalidHandleError,
    NativeInitError,
    NoBrokersError,
    OffsetStoreError,
    SubscribeError,
} from './errors'
import { MessageHandle } from './message'
import { NativeConsumerHandle } from './native-consumer'

const createMessage = (topic: string, partition: number, offset: number): MessageHandle => {
    const message = MessageHandle.fromEvent(new StubEvent('fetch', [createTestRecord({ topic, partition, offset })]))
    if (!message) {
        throw new Error('Expected a message')
    }
    return message
}

describe('NativeConsumerHandle', () => {
    let library: StubLibrary

    beforeEach(() => {
        library = new StubLibrary()
    })

    describe('create', () => {
        it('applies options, registers brokers and connects', async () => {
            const native = await NativeConsumerHandle.create(
                { brokers: 'kafka-1:9092,kafka-2:9092', options: { 'group.id': 'orders' } },
                library
            )

            expect(library.configsCreated).toBe(1)
            expect(library.client.options.get('group.id')).toBe('orders')
            expect(library.client.brokers).toEqual(['kafka-1:9092', 'kafka-2:9092'])
            expect(library.client.connected).toBe(true)
            expect(library.calls).toEqual(['connect'])
            expect(native.config).toEqual({ brokers: 'kafka-1:9092,kafka-2:9092', options: { 'group.id': 'orders' } })
            expect(native.isDestroyed()).toBe(false)
            expect(native.getSubscription()).toEqual([])
        })

        const invalidConfigs: { name: string; input: unknown; message: string }[] = [
            { name: 'a null config', input: null, message: 'Invalid consumer config: consumer config must be an object' },
            {
                name: 'missing brokers',
                input: { options: {} },
                message: 'Invalid consumer config: brokers must be a string of comma-separated broker addresses',
            },
            { name: 'empty brokers', input: { brokers: '' }, message: 'Invalid consumer config: brokers must not be empty' },
            {
                name: 'a non-string option value',
                input: { brokers: 'kafka:9092', options: { 'fetch.wait.max.ms': 50 } },
                message: 'Invalid consumer config: options.fetch.wait.max.ms must be a string',
            },
        ]

        it.each(invalidConfigs)('fails with ConfigError for $name before touching the library', async ({ input, message }) => {
            const creating = NativeConsumerHandle.create(input, library)

            await expect(creating).rejects.toThrow(ConfigError)
            await expect(creating).rejects.toThrow(message)
            expect(library.configsCreated).toBe(0)
            expect(library.clients).toHaveLength(0)
        })

        it('wraps a rejected option as NativeInitError', async () => {
            library.unknownOptions = ['bogus.option']

            const creating = NativeConsumerHandle.create(
                { brokers: 'kafka:9092', options: { 'bogus.option': 'yes' } },
                library
            )

            await expect(creating).rejects.toThrow(NativeInitError)
            await expect(creating).rejects.toThrow(
                'Failed to create native consumer: No such configuration property: "bogus.option"'
            )
            expect(library.clients).toHaveLength(0)
        })

        it('wraps a failed client construction as NativeInitError', async () => {
            library.createClientError = new Error('out of memory')

            await expect(NativeConsumerHandle.create({ brokers: 'kafka:9092' }, library)).rejects.toThrow(
                'Failed to create native consumer: out of memory'
            )
        })

        it('fails with NoBrokersError and destroys the client when no broker is valid', async () => {
            const creating = NativeConsumerHandle.create({ brokers: ' , ' }, library)

            await expect(creating).rejects.toThrow(NoBrokersError)
            await expect(creating).rejects.toThrow("No valid brokers specified in ' , '")
            expect(library.client.destroyed).toBe(true)
            expect(library.calls).toEqual(['destroy'])
        })

        it('destroys the client when connecting fails', async () => {
            library.connectError = new Error('Local: Broker transport failure')

            const creating = NativeConsumerHandle.create({ brokers: 'kafka:9092' }, library)

            await expect(creating).rejects.toThrow(NativeInitError)
            await expect(creating).rejects.toThrow('Failed to create native consumer: Local: Broker transport failure')
            expect(library.calls).toEqual(['connect', 'destroy'])
        })
    })

    describe('subscribe', () => {
        let native: NativeConsumerHandle

        beforeEach(async () => {
            native = await NativeConsumerHandle.create({ brokers: 'kafka:9092' }, library)
        })

        it('accumulates topics across calls', () => {
            native.subscribe(['t1'])
            native.subscribe(['t2'])

            expect(native.getSubscription()).toEqual(['t1', 't2'])
            expect(library.client.subscriptions).toEqual([['t1'], ['t1', 't2']])
        })

        it('does not repeat topics', () => {
            native.subscribe(['t1', 't2'])
            native.subscribe(['t2', 't3'])

            expect(native.getSubscription()).toEqual(['t1', 't2', 't3'])
        })

        it('re-applies the current list for an empty call', () => {
            native.subscribe(['t1'])
            native.subscribe([])

            expect(library.client.subscriptions).toEqual([['t1'], ['t1']])
        })

        it('keeps attempted topics when the native subscribe fails', () => {
            library.client.subscribeError = new Error('Broker: Unknown topic or partition')

            let error: unknown
            try {
                native.subscribe(['missing'])
            } catch (e) {
                error = e
            }

            expect(error).toBeInstanceOf(SubscribeError)
            expect(error).toMatchObject({
                message: 'Failed to subscribe to [missing]: Broker: Unknown topic or partition',
                detail: 'Broker: Unknown topic or partition',
                topics: ['missing'],
            })
            expect(native.getSubscription()).toEqual(['missing'])
        })

        it('returns a copy of the subscription', () => {
            native.subscribe(['t1'])
            const subscription = native.getSubscription()
            native.subscribe(['t2'])

            expect(subscription).toEqual(['t1'])
        })
    })

    describe('storeOffset', () => {
        let native: NativeConsumerHandle

        beforeEach(async () => {
            native = await NativeConsumerHandle.create({ brokers: 'kafka:9092' }, library)
        })

        it('stores the offset of the message for its topic partition', () => {
            native.storeOffset(createMessage('orders', 3, 99))

            expect(library.client.storedOffsets.get('orders:3')).toBe(99)
        })

        it('wraps a native failure as OffsetStoreError', () => {
            library.client.storeOffsetError = new Error('Local: Erroneous state')

            expect(() => native.storeOffset(createMessage('orders', 3, 99))).toThrow(OffsetStoreError)
            expect(() => native.storeOffset(createMessage('orders', 3, 99))).toThrow(
                'Failed to store offset: Local: Erroneous state'
            )
        })

        it('refuses a released message', () => {
            const message = createMessage('orders', 3, 99)
            message.release()

            expect(() => native.storeOffset(message)).toThrow(InvalidHandleError)
            expect(library.client.storedOffsets.size).toBe(0)
        })
    })

    describe('pollRecord', () => {
        it('takes events off the record queue in order', async () => {
            const native = await NativeConsumerHandle.create({ brokers: 'kafka:9092' }, library)
            const first = fetchEvent({ offset: 1 })
            const second = fetchEvent({ offset: 2 })
            library.client.records.push(first, undefined, second)

            expect(native.pollRecord()).toBe(first)
            expect(native.pollRecord()).toBeUndefined()
            expect(native.pollRecord()).toBe(second)
        })
    })

    describe('close', () => {
        let native: NativeConsumerHandle

        beforeEach(async () => {
            native = await NativeConsumerHandle.create({ brokers: 'kafka:9092' }, library)
            native.subscribe(['orders'])
        })

        it('tears down in order', async () => {
            await native.close()

            expect(library.calls).toEqual(['connect', 'records.destroy', 'close', 'main.destroy', 'destroy'])
            expect(native.isDestroyed()).toBe(true)
            expect(native.getSubscription()).toEqual([])
        })

        it('is idempotent', async () => {
            await native.close()
            await native.close()

            expect(library.calls).toEqual(['connect', 'records.destroy', 'close', 'main.destroy', 'destroy'])
        })

        it('finishes the teardown before reporting a failed close', async () => {
            library.client.closeError = new Error('Broker: Unknown member')

            const closing = native.close()

            await expect(closing).rejects.toThrow(CloseError)
            await expect(closing).rejects.toThrow('Failed to close native consumer: Broker: Unknown member')
            expect(library.calls).toEqual(['connect', 'records.destroy', 'close', 'main.destroy', 'destroy'])
            expect(native.isDestroyed()).toBe(true)
        })

        it('refuses operations afterwards', async () => {
            await native.close()

            expect(() => native.subscribe(['t2'])).toThrow(ConsumerClosedError)
            expect(() => native.subscribe(['t2'])).toThrow('Cannot subscribe: consumer is closed')
            expect(() => native.pollRecord()).toThrow('Cannot poll records: consumer is closed')
            expect(() => native.drive(10)).toThrow('Cannot poll: consumer is closed')
            expect(() => native.storeOffset(createMessage('orders', 0, 1))).toThrow(
                'Cannot store offset: consumer is closed'
            )
        })
    })
})
