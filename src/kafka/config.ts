import { z } from 'zod'

import { defaultConfig } from '../config/config'
import { ConfigError } from './errors'

export const ConsumerConfigSchema = z.object(
    {
        brokers: z
            .string({
                required_error: 'must be a string of comma-separated broker addresses',
                invalid_type_error: 'must be a string of comma-separated broker addresses',
            })
            .min(1, 'must not be empty'),
        options: z
            .record(z.string(), z.string({ invalid_type_error: 'must be a string' }), {
                invalid_type_error: 'must map option names to string values',
            })
            .optional(),
    },
    {
        required_error: 'consumer config is required',
        invalid_type_error: 'consumer config must be an object',
    }
)

export type ConsumerConfig = z.infer<typeof ConsumerConfigSchema>

/** Validates untrusted input into a frozen ConsumerConfig, throwing ConfigError on the first problem set. */
export function parseConsumerConfig(input: unknown): Readonly<ConsumerConfig> {
    const result = ConsumerConfigSchema.safeParse(input)
    if (!result.success) {
        const problems = result.error.issues.map((issue) =>
            issue.path.length ? `${issue.path.join('.')} ${issue.message}` : issue.message
        )
        throw new ConfigError(`Invalid consumer config: ${problems.join('; ')}`)
    }
    const { brokers, options } = result.data
    return Object.freeze(options ? { brokers, options: Object.freeze({ ...options }) } : { brokers })
}

export const getKafkaConfigFromEnv = (env: Record<string, string | undefined> = process.env): Record<string, string> => {
    // NOTE: Every KAFKA_CONSUMER_* variable becomes a native option, e.g.
    // KAFKA_CONSUMER_SESSION_TIMEOUT_MS=6000 -> session.timeout.ms=6000
    const PREFIX = 'KAFKA_CONSUMER_'
    return Object.entries(env)
        .filter(([key]) => key.startsWith(PREFIX))
        .reduce<Record<string, string>>(
            (acc, [key, value]) => {
                if (!value) {
                    return acc
                }
                const rdkafkaKey = key.replace(PREFIX, '').replace(/_/g, '.').toLowerCase()
                acc[rdkafkaKey] = value
                return acc
            },
            {}
        )
}

export const getConsumerConfigFromEnv = (env: Record<string, string | undefined> = process.env): ConsumerConfig => ({
    brokers: env.KAFKA_HOSTS || defaultConfig.KAFKA_HOSTS,
    options: getKafkaConfigFromEnv(env),
})
