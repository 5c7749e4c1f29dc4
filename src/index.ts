export { defaultConfig } from './config/config'
export { Channel, ReceiveChannel } from './kafka/channel'
export { ConsumerConfig, ConsumerConfigSchema, getConsumerConfigFromEnv, parseConsumerConfig } from './kafka/config'
export { Consumer, ConsumerOptions } from './kafka/consumer'
export * from './kafka/errors'
export { MessageHandle } from './kafka/message'
export { RdKafkaLibrary } from './kafka/native/rdkafka'
export * from './kafka/native/types'
export { shutdownLogger } from './utils/logger'
