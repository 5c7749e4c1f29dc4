export class ConsumerBridgeError extends Error {
    name = 'ConsumerBridgeError'
}

/** Bad or missing consumer configuration. Raised before any native resource exists. */
export class ConfigError extends ConsumerBridgeError {
    name = 'ConfigError'
}

export class NativeInitError extends ConsumerBridgeError {
    name = 'NativeInitError'

    constructor(public readonly detail: string) {
        super(`Failed to create native consumer: ${detail}`)
    }
}

export class NoBrokersError extends ConsumerBridgeError {
    name = 'NoBrokersError'

    constructor(public readonly brokers: string) {
        super(`No valid brokers specified in '${brokers}'`)
    }
}

export class SubscribeError extends ConsumerBridgeError {
    name = 'SubscribeError'

    constructor(
        public readonly detail: string,
        public readonly topics: readonly string[]
    ) {
        super(`Failed to subscribe to [${topics.join(', ')}]: ${detail}`)
    }
}

export class OffsetStoreError extends ConsumerBridgeError {
    name = 'OffsetStoreError'

    constructor(public readonly detail: string) {
        super(`Failed to store offset: ${detail}`)
    }
}

/** A message handle was used after it was released. */
export class InvalidHandleError extends ConsumerBridgeError {
    name = 'InvalidHandleError'

    constructor(operation: string) {
        super(`Cannot ${operation}: message handle has been released`)
    }
}

export class CloseError extends ConsumerBridgeError {
    name = 'CloseError'

    constructor(public readonly detail: string) {
        super(`Failed to close native consumer: ${detail}`)
    }
}

export class UnexpectedEventError extends ConsumerBridgeError {
    name = 'UnexpectedEventError'

    constructor(public readonly kind: string) {
        super(`Got unexpected event type of '${kind}'`)
    }
}

export class PollDriveError extends ConsumerBridgeError {
    name = 'PollDriveError'

    constructor(public readonly detail: string) {
        super(`Unexpected error on consumer poll: ${detail}`)
    }
}

export class ConsumerClosedError extends ConsumerBridgeError {
    name = 'ConsumerClosedError'

    constructor(operation: string) {
        super(`Cannot ${operation}: consumer is closed`)
    }
}
