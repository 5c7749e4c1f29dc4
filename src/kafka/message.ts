import { InvalidHandleError } from './errors'
import { NativeEvent, NativeRecord } from './native/types'

// Backstop for handles dropped without release(). Collection timing is up to the runtime,
// callers still release every handle explicitly.
const unreleasedEvents = new FinalizationRegistry<NativeEvent>((event) => event.destroy())

const payloadOrUndefined = (payload: Buffer | null | undefined): Buffer | undefined =>
    payload && payload.length > 0 ? payload : undefined

/**
 * One consumed record together with the native event it was drawn from. The record's
 * memory belongs to the event, so the event lives exactly as long as the handle:
 * `release()` destroys it, and accessors throw `InvalidHandleError` afterwards.
 *
 * `toString()` renders
 * `Kafka Consumer Message: topic=<topic> partition=<partition> offset=<offset> key=<key> value=<value>`
 * with key and value decoded as UTF-8 and `NULL` in place of an absent one.
 */
export class MessageHandle {
    private owned: { event: NativeEvent; record: NativeRecord } | undefined

    constructor(event: NativeEvent, record: NativeRecord) {
        this.owned = { event, record }
        unreleasedEvents.register(this, event, this)
    }

    /**
     * Takes ownership of a fetch event, wrapping its first record. Returns undefined when the
     * event carries no record, in which case the event is left to the caller.
     */
    static fromEvent(event: NativeEvent): MessageHandle | undefined {
        const record = event.nextRecord()
        return record ? new MessageHandle(event, record) : undefined
    }

    topic(): string {
        return this.record('read topic').topic
    }

    partition(): number {
        return this.record('read partition').partition
    }

    offset(): number {
        return this.record('read offset').offset
    }

    key(): Buffer | undefined {
        return payloadOrUndefined(this.record('read key').key)
    }

    value(): Buffer | undefined {
        return payloadOrUndefined(this.record('read value').value)
    }

    isReleased(): boolean {
        return this.owned === undefined
    }

    release(): void {
        if (!this.owned) {
            return
        }
        const { event } = this.owned
        this.owned = undefined
        unreleasedEvents.unregister(this)
        event.destroy()
    }

    toString(): string {
        if (!this.owned) {
            return 'Kafka Consumer Message: <released>'
        }
        const { topic, partition, offset } = this.owned.record
        const key = this.key()?.toString('utf8') ?? 'NULL'
        const value = this.value()?.toString('utf8') ?? 'NULL'
        return `Kafka Consumer Message: topic=${topic} partition=${partition} offset=${offset} key=${key} value=${value}`
    }

    private record(operation: string): NativeRecord {
        if (!this.owned) {
            throw new InvalidHandleError(operation)
        }
        return this.owned.record
    }
}
