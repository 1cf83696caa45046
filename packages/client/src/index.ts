// Client layer exports (includes producer and consumer)
export * from '@/client/index.js'

// Stream store handles and the in-process backend
export * from '@/streams/index.js'

// Utils
export { tpKey, parseKey, SYNTHETIC_PARTITION, SYNTHETIC_OFFSET } from '@/utils/topic-partition.js'
export type { TopicPartition, PartitionInfo } from '@/utils/topic-partition.js'

// Logger
export { createLogger, noopLogger, type Logger, type LogLevel } from '@/logger.js'
