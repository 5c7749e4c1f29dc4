export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type RuntimeEnv = 'dev' | 'test' | 'prod'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface BridgeConfig {
    LOG_LEVEL: LogLevel
    KAFKA_HOSTS: string // comma-delimited Kafka hosts
    CONSUMER_OUTPUT_CHANNEL_CAPACITY: number // max unconsumed messages before the record loop blocks
    CONSUMER_POLL_TIMEOUT_MS: number // timeout of each blocking housekeeping poll
    CONSUMER_THROTTLE_MS: number // record loop pause when the record queue is empty
    CONSUMER_FETCH_BATCH_SIZE: number // max messages fetched per poll by the node-rdkafka adapter
}
