/**
 * Consumer module
 */

export { Consumer } from './consumer.js'
export { ConsumerRecords } from './records.js'
export { drainReaders } from './poll-engine.js'
export type { DrainOptions, DrainContext } from './poll-engine.js'
export { ReaderRegistry, readerGroupName } from './reader-registry.js'
export { DEFAULT_CONSUMER_CONFIG, DEFAULT_POLL_TIMEOUT_MS } from './types.js'
export type {
	ConsumerConfig,
	ConsumerRecord,
	ConsumerInterceptor,
	OffsetAndMetadata,
	OffsetMap,
	OffsetCommitCallback,
	PollOptions,
	ResolvedConsumerConfig,
} from './types.js'
