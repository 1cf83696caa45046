/**
 * Partitioned-log style producer over stream writers
 *
 * send() never waits for the stream store: it runs the record through the
 * interceptors, resolves the stream's writer and issues the write. The
 * outcome of that write is then reported twice, independently: to the
 * promise returned by send() and to the optional callback.
 *
 * By default a failed write resolves the promise with `null` and only the
 * callback receives the error (as SendError). Set `propagateWriteErrors` to
 * reject the promise as well.
 */

import { IllegalStateError, SendError, UnsupportedOperationError, toError } from '@/client/errors.js'
import type { Codec } from '@/codec.js'
import { InterceptorChain } from '@/interceptors.js'
import { noopLogger, trace, type Logger } from '@/logger.js'
import type { StreamClient } from '@/streams/types.js'
import { syntheticPartitionInfo, type PartitionInfo } from '@/utils/topic-partition.js'
import type {
	ProducerInterceptor,
	ProducerRecord,
	RecordMetadata,
	ResolvedProducerConfig,
	SendCallback,
	SendCompletion,
} from './types.js'
import { WriterRegistry } from './writer-registry.js'

/**
 * In-flight send, owned by the pipeline until both observers have run
 */
interface PendingRecord<V> {
	record: ProducerRecord<V>
	callback?: SendCallback
	completion: Promise<SendCompletion>
}

/**
 * Placeholder metadata; the stream store reports no position on write
 */
export function placeholderMetadata(topic: string): RecordMetadata {
	return {
		topic,
		partition: -1,
		offset: -1n,
		timestamp: new Date(),
		serializedKeySize: 0,
		serializedValueSize: 0,
	}
}

export class Producer<V> {
	private readonly config: ResolvedProducerConfig<V>
	private readonly logger: Logger
	private readonly writers: WriterRegistry<V>
	private readonly interceptors: InterceptorChain<ProducerInterceptor<V>>
	private readonly onClose?: () => void
	private closed = false

	/**
	 * @param onClose - Called once the producer has closed
	 */
	constructor(
		streams: StreamClient,
		config: ResolvedProducerConfig<V>,
		valueCodec: Codec<V>,
		logger?: Logger,
		onClose?: () => void
	) {
		this.config = config
		this.onClose = onClose
		this.logger = (logger ?? noopLogger).child({ component: 'producer', clientId: config.clientId })
		this.writers = new WriterRegistry(streams, { scope: config.scope, codec: valueCodec }, this.logger)
		this.interceptors = new InterceptorChain(config.interceptors, this.logger)
	}

	get isClosed(): boolean {
		return this.closed
	}

	/**
	 * Write a record to the stream named by its topic
	 *
	 * @param record - Record to send; interceptors may rewrite it
	 * @param callback - Invoked once with the metadata or a SendError
	 * @returns Metadata on success. On a write failure: null, or a rejection
	 *   with SendError when `propagateWriteErrors` is set
	 * @throws IllegalStateError if the producer is closed
	 *
	 * @example
	 * ```typescript
	 * const metadata = await producer.send({ topic: 'orders', value: 'order-1' }, (meta, error) => {
	 *   if (error) console.error(error.cause)
	 * })
	 * ```
	 */
	async send(record: ProducerRecord<V>, callback?: SendCallback): Promise<RecordMetadata | null> {
		this.ensureOpen()
		trace(this.logger, 'send', { topic: record.topic, hasCallback: callback !== undefined })

		const intercepted = this.interceptors.transform(record, 'onSend', (interceptor, current) =>
			interceptor.onSend(current)
		)
		const pending = this.dispatch(intercepted, callback)

		void pending.completion.then(completion => this.acknowledge(pending, completion))

		const completion = await pending.completion
		if (completion.ok) {
			return completion.metadata
		}
		if (this.config.propagateWriteErrors) {
			throw completion.error
		}
		return null
	}

	private dispatch(record: ProducerRecord<V>, callback?: SendCallback): PendingRecord<V> {
		const stream = record.topic
		let write: Promise<void>
		try {
			write = this.writers.resolve(stream).write(record.value)
		} catch (error) {
			write = Promise.reject(error)
		}

		const completion = write.then(
			(): SendCompletion => {
				trace(this.logger, 'event written', { stream })
				return { ok: true, metadata: placeholderMetadata(stream) }
			},
			(error: unknown): SendCompletion => {
				this.logger.error('writing event failed', { stream, error: toError(error).message })
				return { ok: false, error: new SendError(stream, error) }
			}
		)
		return { record, callback, completion }
	}

	/**
	 * Second observer of a completion: interceptors, then the user callback
	 */
	private acknowledge(pending: PendingRecord<V>, completion: SendCompletion): void {
		const metadata = completion.ok ? completion.metadata : null
		const error = completion.ok ? null : completion.error

		this.interceptors.notify('onAcknowledgement', interceptor => interceptor.onAcknowledgement?.(metadata, error))

		if (!pending.callback) {
			return
		}
		try {
			pending.callback(metadata, error)
		} catch (callbackError) {
			this.logger.warn('send callback failed', {
				topic: pending.record.topic,
				error: toError(callbackError).message,
			})
		}
	}

	/**
	 * Flush every writer created so far, one after the other.
	 * A writer that fails to flush does not stop the others.
	 */
	async flush(): Promise<void> {
		this.ensureOpen()
		trace(this.logger, 'flushing writers', { writers: this.writers.size })
		await this.writers.flushAll()
	}

	/**
	 * One synthetic partition per stream
	 */
	partitionsFor(topic: string): PartitionInfo[] {
		return [syntheticPartitionInfo(topic)]
	}

	metrics(): Map<string, number> {
		return new Map()
	}

	// ==================== Unsupported ====================

	initTransactions(): never {
		throw new UnsupportedOperationError('Transactions', 'are not supported')
	}

	beginTransaction(): never {
		throw new UnsupportedOperationError('Transactions', 'are not supported')
	}

	commitTransaction(): never {
		throw new UnsupportedOperationError('Transactions', 'are not supported')
	}

	abortTransaction(): never {
		throw new UnsupportedOperationError('Transactions', 'are not supported')
	}

	sendOffsetsToTransaction(_offsets: ReadonlyMap<string, bigint>, _groupId: string): never {
		throw new UnsupportedOperationError('Sending offsets to a transaction')
	}

	// ==================== Lifecycle ====================

	/**
	 * Close every writer and interceptor. Safe to call more than once.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return
		}
		this.closed = true
		this.logger.debug('closing producer', { writers: this.writers.size })
		try {
			await this.writers.closeAll()
			await this.interceptors.close()
		} finally {
			this.onClose?.()
		}
		this.logger.info('producer closed')
	}

	private ensureOpen(): void {
		if (this.closed) {
			throw new IllegalStateError('This producer is closed')
		}
	}
}
