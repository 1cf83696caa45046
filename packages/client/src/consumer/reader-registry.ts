/**
 * Readers of the current subscription, one per stream
 *
 * The registry is replaced wholesale on every subscription change. Readers
 * are never carried over, even for a stream that stays subscribed: a reader
 * group name depends on the stream's position in the subscription list, so
 * it can change whenever the list does.
 */

import { toError } from '@/client/errors.js'
import type { Codec } from '@/codec.js'
import type { Logger } from '@/logger.js'
import type { StreamClient, StreamReader } from '@/streams/types.js'

export interface ReaderRegistryConfig<V> {
	scope: string
	groupId: string
	readerId: string
	codec: Codec<V>
}

/**
 * Reader group of the stream at 0-based `index` in a subscription of
 * `topicCount` streams
 */
export function readerGroupName(groupId: string, index: number, topicCount: number): string {
	return topicCount > 1 ? `${groupId}-${index + 1}` : groupId
}

export class ReaderRegistry<V> {
	private readers: ReadonlyMap<string, StreamReader<V>> = new Map()

	constructor(
		private readonly streams: StreamClient,
		private readonly config: ReaderRegistryConfig<V>,
		private readonly logger: Logger
	) {}

	get size(): number {
		return this.readers.size
	}

	topics(): Set<string> {
		return new Set(this.readers.keys())
	}

	/**
	 * Current readers in subscription order. The returned map is not affected
	 * by later replace() calls.
	 */
	snapshot(): ReadonlyMap<string, StreamReader<V>> {
		return this.readers
	}

	/**
	 * Build readers for `topics`, install them, then close the previous ones.
	 * A repeated topic keeps the position of its first occurrence.
	 */
	async replace(topics: readonly string[]): Promise<void> {
		const next = new Map<string, StreamReader<V>>()
		try {
			topics.forEach((topic, index) => {
				if (next.has(topic)) {
					return
				}
				const readerGroup = readerGroupName(this.config.groupId, index, topics.length)
				next.set(
					topic,
					this.streams.createReader({
						scope: this.config.scope,
						stream: topic,
						readerGroup,
						readerId: this.config.readerId,
						codec: this.config.codec,
					})
				)
				this.logger.debug('reader created', { stream: topic, readerGroup })
			})
		} catch (error) {
			// the current subscription stays in place
			await this.closeReaders(next)
			throw error
		}

		const previous = this.readers
		this.readers = next
		await this.closeReaders(previous)
	}

	/**
	 * Empty the registry and close every reader
	 */
	async closeAll(): Promise<void> {
		const previous = this.readers
		this.readers = new Map()
		await this.closeReaders(previous)
	}

	private async closeReaders(readers: ReadonlyMap<string, StreamReader<V>>): Promise<void> {
		for (const [stream, reader] of readers) {
			try {
				await reader.close()
			} catch (error) {
				this.logger.warn('unable to close reader', { stream, error: toError(error).message })
			}
		}
	}
}
