import { BridgeConfig, LOG_LEVELS, LogLevel, RuntimeEnv } from '../types'

/** Reads NODE_ENV: `test*` and `dev*` select those modes, anything else is production. */
export function determineRuntimeEnv(env: Record<string, string | undefined> = process.env): RuntimeEnv {
    const nodeEnv = env.NODE_ENV?.toLowerCase() ?? ''
    if (nodeEnv.startsWith('test')) {
        return 'test'
    }
    if (nodeEnv.startsWith('dev')) {
        return 'dev'
    }
    return 'prod'
}

export function getDefaultConfig(): BridgeConfig {
    return {
        LOG_LEVEL: determineRuntimeEnv() === 'test' ? 'warn' : 'info',
        KAFKA_HOSTS: 'kafka:9092', // Overridden with KAFKA_HOSTS
        CONSUMER_OUTPUT_CHANNEL_CAPACITY: 10_000,
        CONSUMER_POLL_TIMEOUT_MS: 1000,
        CONSUMER_THROTTLE_MS: 10,
        CONSUMER_FETCH_BATCH_SIZE: 500,
    }
}

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value)

const NUMERIC_CONFIG_KEYS = [
    'CONSUMER_OUTPUT_CHANNEL_CAPACITY',
    'CONSUMER_POLL_TIMEOUT_MS',
    'CONSUMER_THROTTLE_MS',
    'CONSUMER_FETCH_BATCH_SIZE',
] as const satisfies readonly (keyof BridgeConfig)[]

export function overrideWithEnv(
    config: BridgeConfig,
    env: Record<string, string | undefined> = process.env
): BridgeConfig {
    const newConfig: BridgeConfig = { ...config }

    const logLevel = env.LOG_LEVEL
    if (typeof logLevel !== 'undefined') {
        const level = logLevel.toLowerCase()
        if (!isLogLevel(level)) {
            throw Error(`Invalid LOG_LEVEL ${logLevel}. Valid: ${LOG_LEVELS.join(', ')}`)
        }
        newConfig.LOG_LEVEL = level
    }

    if (typeof env.KAFKA_HOSTS !== 'undefined') {
        newConfig.KAFKA_HOSTS = env.KAFKA_HOSTS
    }

    for (const key of NUMERIC_CONFIG_KEYS) {
        const value = env[key]
        if (typeof value === 'undefined') {
            continue
        }
        const parsed = value.includes('.') ? parseFloat(value) : parseInt(value)
        if (isNaN(parsed)) {
            throw Error(`Invalid ${key} ${value}, expected a number`)
        }
        newConfig[key] = parsed
    }

    if (newConfig.CONSUMER_OUTPUT_CHANNEL_CAPACITY < 1) {
        throw Error('CONSUMER_OUTPUT_CHANNEL_CAPACITY must be at least 1')
    }

    return newConfig
}

export const defaultConfig = overrideWithEnv(getDefaultConfig())
