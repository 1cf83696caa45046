/**
 * AdapterClient - main entry point
 */

import { Consumer } from '@/consumer/consumer.js'
import type { ConsumerConfig } from '@/consumer/types.js'
import { Producer } from '@/producer/producer.js'
import type { ProducerConfig } from '@/producer/types.js'
import { string, type Codec } from '@/codec.js'
import { createLogger, noopLogger, type Logger } from '@/logger.js'
import type { StreamClient } from '@/streams/types.js'
import { resolveClientConfig, resolveConsumerConfig, resolveProducerConfig } from './config.js'
import { IllegalStateError, toError } from './errors.js'
import type { ClientConfig, ResolvedClientConfig } from './types.js'

interface Closeable {
	close(): Promise<void>
}

/**
 * AdapterClient creates partitioned-log style consumers and producers backed
 * by one stream store connection
 *
 * @example
 * ```typescript
 * const client = new AdapterClient({
 *   controllerUri: 'tcp://localhost:9090',
 *   scope: 'billing',
 *   streamClient: createInMemoryStreamClient(),
 * })
 *
 * const consumer = client.consumer({ groupId: 'invoices' })
 * await consumer.subscribe(['orders'])
 * const records = await consumer.poll(1000)
 * ```
 */
export class AdapterClient {
	readonly streams: StreamClient
	private readonly config: ResolvedClientConfig
	private readonly logger: Logger
	private readonly consumers = new Set<Closeable>()
	private readonly producers = new Set<Closeable>()
	private closed = false

	/**
	 * @throws ConfigError when no endpoint can be resolved or a value is invalid
	 */
	constructor(config: ClientConfig) {
		this.config = resolveClientConfig(config)

		if (config.logger) {
			this.logger = config.logger.child({ component: 'adapter-client', clientId: this.config.clientId })
		} else if (config.logLevel && config.logLevel !== 'silent') {
			this.logger = createLogger(config.logLevel, { component: 'adapter-client', clientId: this.config.clientId })
		} else {
			this.logger = noopLogger
		}

		this.logger.info('initializing', { endpoints: this.config.endpoints, scope: this.config.scope })

		this.streams = config.streamClient({
			endpoints: this.config.endpoints,
			scope: this.config.scope,
			logger: this.logger,
		})
	}

	get scope(): string {
		return this.config.scope
	}

	get endpoints(): string {
		return this.config.endpoints
	}

	/**
	 * Consumers created by this client that are still open
	 */
	get consumerCount(): number {
		return this.consumers.size
	}

	/**
	 * Producers created by this client that are still open
	 */
	get producerCount(): number {
		return this.producers.size
	}

	/**
	 * Create a consumer of string values
	 */
	consumer(config?: ConsumerConfig<string>): Consumer<string> {
		return this.consumerOf(string(), config)
	}

	/**
	 * Create a consumer whose values are decoded with `valueCodec`
	 *
	 * @example
	 * ```typescript
	 * const consumer = client.consumerOf(json<Order>(), { groupId: 'shipping' })
	 * ```
	 */
	consumerOf<V>(valueCodec: Codec<V>, config: ConsumerConfig<V> = {}): Consumer<V> {
		this.ensureOpen()
		const consumer: Consumer<V> = new Consumer(
			this.streams,
			resolveConsumerConfig(this.config, config),
			valueCodec,
			config.logger ?? this.logger,
			() => this.consumers.delete(consumer)
		)
		this.consumers.add(consumer)
		return consumer
	}

	/**
	 * Create a producer of string values
	 */
	producer(config?: ProducerConfig<string>): Producer<string> {
		return this.producerOf(string(), config)
	}

	/**
	 * Create a producer whose values are encoded with `valueCodec`
	 *
	 * @example
	 * ```typescript
	 * const producer = client.producerOf(json<Order>(), { propagateWriteErrors: true })
	 * await producer.send({ topic: 'orders', value: order })
	 * ```
	 */
	producerOf<V>(valueCodec: Codec<V>, config: ProducerConfig<V> = {}): Producer<V> {
		this.ensureOpen()
		const producer: Producer<V> = new Producer(
			this.streams,
			resolveProducerConfig(this.config, config),
			valueCodec,
			config.logger ?? this.logger,
			() => this.producers.delete(producer)
		)
		this.producers.add(producer)
		return producer
	}

	/**
	 * Close every consumer and producer created by this client, then the
	 * stream store connection. Safe to call more than once.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return
		}
		this.closed = true

		for (const consumer of [...this.consumers]) {
			await this.closeQuietly('consumer', () => consumer.close())
		}
		for (const producer of [...this.producers]) {
			await this.closeQuietly('producer', () => producer.close())
		}
		this.consumers.clear()
		this.producers.clear()

		if (this.streams.close) {
			await this.streams.close()
		}
		this.logger.info('closed')
	}

	private async closeQuietly(kind: string, close: () => Promise<void>): Promise<void> {
		try {
			await close()
		} catch (error) {
			this.logger.warn(`unable to close ${kind}`, { error: toError(error).message })
		}
	}

	private ensureOpen(): void {
		if (this.closed) {
			throw new IllegalStateError('This client is closed')
		}
	}
}
