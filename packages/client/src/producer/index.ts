/**
 * Producer module
 */

export { Producer, placeholderMetadata } from './producer.js'
export { WriterRegistry } from './writer-registry.js'
export type { WriterHandle } from './writer-registry.js'
export type {
	ProducerConfig,
	ProducerRecord,
	RecordMetadata,
	SendCallback,
	ProducerInterceptor,
	ResolvedProducerConfig,
} from './types.js'
