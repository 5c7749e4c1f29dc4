import { logger } from '../utils/logger'
import { errorMessage, sleep, yieldToEventLoop } from '../utils/utils'
import { Channel } from './channel'
import { PollDriveError, UnexpectedEventError } from './errors'
import { MessageHandle } from './message'
import { consumerOutputChannelSize, consumerPollDriveErrors, consumerRecordsForwarded, consumerUnexpectedEvents } from './metrics'
import { NativeConsumerHandle } from './native-consumer'

export type LoopIteration = (signal: AbortSignal) => Promise<void>

/**
 * Runs `iteration` back to back until cancelled. Cancellation is checked between
 * iterations, so an iteration in flight (e.g. a blocking poll on the worker pool) is
 * allowed to finish, but no new one starts.
 */
export class BackgroundLoop {
    public readonly promise: Promise<void>
    private running = true
    private readonly abortController = new AbortController()

    constructor(
        public readonly name: string,
        iteration: LoopIteration
    ) {
        this.promise = this.run(iteration)
    }

    private async run(iteration: LoopIteration): Promise<void> {
        const { signal } = this.abortController
        logger.debug('🔄', `${this}: Starting...`)
        while (!signal.aborted) {
            try {
                await iteration(signal)
            } catch (error) {
                logger.error('⚠️', `${this}: Unexpected error!`, { error: errorMessage(error) })
                await yieldToEventLoop()
            }
        }
        this.running = false
        logger.debug('🔴', `${this}: Stopped by request.`)
    }

    public toString(): string {
        return `Background Loop (${this.name})`
    }

    public isRunning(): boolean {
        return this.running
    }

    public cancel(): void {
        this.abortController.abort()
    }

    public async stop(): Promise<void> {
        this.cancel()
        await this.promise
    }
}

/**
 * Loop A: keeps the native client serviced (errors, statistics, rebalances). The drive
 * call blocks off the event loop for up to `pollTimeoutMs` and is re-issued right away.
 */
export function housekeepingIteration(native: NativeConsumerHandle, pollTimeoutMs: number): LoopIteration {
    return async (signal) => {
        try {
            await native.drive(pollTimeoutMs, signal)
        } catch (error) {
            const pollError = new PollDriveError(errorMessage(error))
            consumerPollDriveErrors.inc()
            logger.error('🔁', 'consumer_poll_drive_error', { error: pollError.message })
            // A drive that fails before reaching the worker pool rejects without ever
            // leaving the event loop
            await yieldToEventLoop()
        }
    }
}

/**
 * Loop B: moves fetched records from the native record queue into `output`. A full
 * channel holds the loop at `put`, which is the backpressure on the native side.
 */
export function recordDrainIteration(
    native: NativeConsumerHandle,
    output: Channel<MessageHandle>,
    throttleMs: number
): LoopIteration {
    const throttle = (error: UnexpectedEventError, signal: AbortSignal): Promise<void> => {
        consumerUnexpectedEvents.labels({ kind: error.kind }).inc()
        logger.error('🔁', 'consumer_unexpected_event', { error: error.message })
        return sleep(throttleMs, signal)
    }

    return async (signal) => {
        const event = native.pollRecord()
        if (!event) {
            await sleep(throttleMs, signal)
            return
        }

        if (event.kind !== 'fetch') {
            event.destroy()
            await throttle(new UnexpectedEventError(event.kind), signal)
            return
        }

        const message = MessageHandle.fromEvent(event)
        if (!message) {
            event.destroy()
            await throttle(new UnexpectedEventError('empty fetch'), signal)
            return
        }

        if (logger.isLevelEnabled('debug')) {
            logger.debug('📝', message.toString())
        }
        const sent = await output.put(message, signal)
        if (!sent) {
            // Closed or cancelled while waiting for space, nobody else will see this message
            message.release()
            return
        }
        consumerRecordsForwarded.inc()
        consumerOutputChannelSize.set(output.size())
        await yieldToEventLoop()
    }
}
