/**
 * Writers of a producer, one per stream, created on first send and kept
 * until the producer closes
 */

import { toError } from '@/client/errors.js'
import type { Codec } from '@/codec.js'
import type { Logger } from '@/logger.js'
import type { StreamClient, StreamWriter } from '@/streams/types.js'

export interface WriterHandle<V> {
	readonly writer: StreamWriter<V>
	/** Settles once the writer's init() did */
	readonly ready: Promise<void>
	write(event: V): Promise<void>
}

export interface WriterRegistryConfig<V> {
	scope: string
	codec: Codec<V>
}

export class WriterRegistry<V> {
	private readonly handles = new Map<string, WriterHandle<V>>()

	constructor(
		private readonly streams: StreamClient,
		private readonly config: WriterRegistryConfig<V>,
		private readonly logger: Logger
	) {}

	get size(): number {
		return this.handles.size
	}

	/**
	 * Cached handle for `stream`, created (and initialized) on first use.
	 * A handle whose init fails is dropped, so a later call creates a new writer.
	 */
	resolve(stream: string): WriterHandle<V> {
		const existing = this.handles.get(stream)
		if (existing) {
			return existing
		}

		const writer = this.streams.createWriter({ scope: this.config.scope, stream, codec: this.config.codec })
		const ready = writer.init()
		const handle: WriterHandle<V> = {
			writer,
			ready,
			write: event => ready.then(() => writer.writeEvent(event)),
		}
		// a failed init surfaces through the pending writes; the next resolve() starts over
		void ready.catch(error => {
			this.logger.error('writer initialization failed', { stream, error: toError(error).message })
			if (this.handles.get(stream) === handle) {
				this.handles.delete(stream)
			}
		})
		this.handles.set(stream, handle)
		this.logger.debug('writer created', { stream })
		return handle
	}

	/**
	 * Flush every writer in turn. A failing flush is logged and the
	 * remaining writers are still flushed.
	 */
	async flushAll(): Promise<void> {
		for (const [stream, handle] of this.handles) {
			try {
				await handle.ready
				await handle.writer.flush()
			} catch (error) {
				this.logger.warn('unable to flush writer', { stream, error: toError(error).message })
			}
		}
	}

	async closeAll(): Promise<void> {
		const handles = Array.from(this.handles)
		this.handles.clear()
		for (const [stream, handle] of handles) {
			try {
				await handle.writer.close()
			} catch (error) {
				this.logger.warn('unable to close writer', { stream, error: toError(error).message })
			}
		}
	}
}
