/**
 * Partitioned-log style client over a stream store
 *
 * Provides:
 * - Consumers that subscribe to streams and poll them as topics
 * - Producers that send records to streams with completion callbacks
 * - Interceptors on both paths
 */

// Main client
export { AdapterClient } from './adapter-client.js'

// Configuration
export {
	DEFAULT_SCOPE,
	DEFAULT_CLIENT_ID,
	resolveServerEndpoints,
	resolveClientConfig,
	resolveConsumerConfig,
	resolveProducerConfig,
} from './config.js'
export type { ClientConfig, ResolvedClientConfig } from './types.js'

// Codecs
export { codec, string, json, buffer, isCodec, codecByName } from '@/codec.js'
export type { Codec, CodecName } from '@/codec.js'

// Interceptors
export { InterceptorChain, interceptorName } from '@/interceptors.js'
export type { Interceptor } from '@/interceptors.js'

// Producer
export { Producer } from '@/producer/index.js'
export type {
	ProducerConfig,
	ProducerRecord,
	RecordMetadata,
	SendCallback,
	ProducerInterceptor,
} from '@/producer/index.js'

// Consumer
export { Consumer, ConsumerRecords, DEFAULT_CONSUMER_CONFIG, DEFAULT_POLL_TIMEOUT_MS } from '@/consumer/index.js'
export type {
	ConsumerConfig,
	ConsumerRecord,
	ConsumerInterceptor,
	OffsetAndMetadata,
	OffsetMap,
	OffsetCommitCallback,
	PollOptions,
} from '@/consumer/index.js'

// Errors
export {
	AdapterError,
	IllegalArgumentError,
	IllegalStateError,
	UnsupportedOperationError,
	ReinitializationRequiredError,
	SendError,
	ConfigError,
	CodecError,
	isAdapterError,
	isRetriable,
} from './errors.js'
