/**
 * In-process stream store
 *
 * Keeps encoded events per scope/stream in memory, with one read position
 * per reader group. Suitable for development, tests and single-process use.
 *
 * @example
 * ```typescript
 * const store = new InMemoryStreamStore()
 * const client = new AdapterClient({
 *   controllerUri: 'memory://local',
 *   streamClient: createInMemoryStreamClient(store),
 * })
 * ```
 */

import { EventEmitter } from 'node:events'
import { IllegalStateError, ReinitializationRequiredError } from '@/client/errors.js'
import type { Codec } from '@/codec.js'
import { noopLogger, trace, type Logger } from '@/logger.js'
import { sleep } from '@/utils/sleep.js'
import type {
	EventRead,
	ReaderOptions,
	StreamClient,
	StreamClientFactory,
	StreamReader,
	StreamWriter,
	WriterOptions,
} from './types.js'

function streamKey(scope: string, stream: string): string {
	return `${scope}/${stream}`
}

function groupKey(scope: string, readerGroup: string): string {
	return `${scope}/${readerGroup}`
}

/**
 * Events and reader-group positions shared by every client built on it
 */
export class InMemoryStreamStore {
	private readonly streams = new Map<string, Buffer[]>()
	private readonly positions = new Map<string, number>()
	private readonly generations = new Map<string, number>()
	private readonly appends = new EventEmitter()

	constructor() {
		// one listener per waiting read
		this.appends.setMaxListeners(0)
	}

	/**
	 * Create the stream if it does not exist yet
	 *
	 * @returns true when the stream was created
	 */
	createStream(scope: string, stream: string): boolean {
		const key = streamKey(scope, stream)
		if (this.streams.has(key)) {
			return false
		}
		this.streams.set(key, [])
		return true
	}

	append(scope: string, stream: string, payload: Buffer): void {
		const key = streamKey(scope, stream)
		let events = this.streams.get(key)
		if (!events) {
			events = []
			this.streams.set(key, events)
		}
		events.push(payload)
		this.appends.emit(key)
	}

	/**
	 * Encoded events of a stream, in append order
	 */
	events(scope: string, stream: string): readonly Buffer[] {
		return this.streams.get(streamKey(scope, stream)) ?? []
	}

	/**
	 * Take the next event for a reader group and advance its position
	 */
	takeNext(scope: string, readerGroup: string, stream: string): Buffer | null {
		const events = this.streams.get(streamKey(scope, stream))
		const positionKey = `${groupKey(scope, readerGroup)}/${stream}`
		const position = this.positions.get(positionKey) ?? 0
		if (!events || position >= events.length) {
			return null
		}
		this.positions.set(positionKey, position + 1)
		return events[position] ?? null
	}

	/**
	 * Number of events a reader group has not read yet
	 */
	pending(scope: string, readerGroup: string, stream: string): number {
		const total = this.events(scope, stream).length
		const position = this.positions.get(`${groupKey(scope, readerGroup)}/${stream}`) ?? 0
		return Math.max(0, total - position)
	}

	generation(scope: string, readerGroup: string): number {
		return this.generations.get(groupKey(scope, readerGroup)) ?? 0
	}

	/**
	 * Make every existing reader of the group fail its next read with
	 * ReinitializationRequiredError. Readers created afterwards are unaffected.
	 */
	invalidateReaderGroup(scope: string, readerGroup: string): void {
		const key = groupKey(scope, readerGroup)
		this.generations.set(key, this.generation(scope, readerGroup) + 1)
	}

	/**
	 * Register a one-off append listener for a stream
	 *
	 * @returns a function removing the listener
	 */
	onNextAppend(scope: string, stream: string, listener: () => void): () => void {
		const key = streamKey(scope, stream)
		this.appends.once(key, listener)
		return () => {
			this.appends.removeListener(key, listener)
		}
	}
}

class InMemoryStreamReader<V> implements StreamReader<V> {
	readonly stream: string
	readonly readerGroup: string
	readonly readerId: string
	private readonly scope: string
	private readonly codec: Codec<V>
	private readonly generation: number
	private readonly waits = new Set<AbortController>()
	private closed = false

	constructor(
		private readonly store: InMemoryStreamStore,
		options: ReaderOptions<V>,
		private readonly logger: Logger
	) {
		this.scope = options.scope
		this.stream = options.stream
		this.readerGroup = options.readerGroup
		this.readerId = options.readerId
		this.codec = options.codec
		this.generation = store.generation(options.scope, options.readerGroup)
		store.createStream(options.scope, options.stream)
	}

	async readNextEvent(timeoutMs: number): Promise<EventRead<V>> {
		this.ensureReadable()

		const available = this.store.takeNext(this.scope, this.readerGroup, this.stream)
		if (available !== null) {
			return { event: this.codec.decode(available) }
		}

		const wake = new AbortController()
		const stopListening = this.store.onNextAppend(this.scope, this.stream, () => wake.abort())
		this.waits.add(wake)
		try {
			await sleep(timeoutMs, { signal: wake.signal, resolveOnAbort: true })
		} finally {
			stopListening()
			this.waits.delete(wake)
		}

		if (this.closed) {
			return { event: null }
		}
		this.ensureReadable()

		// another reader of the group may have taken the appended event
		const appended = this.store.takeNext(this.scope, this.readerGroup, this.stream)
		if (appended === null) {
			trace(this.logger, 'no event within read timeout', { stream: this.stream, timeoutMs })
			return { event: null }
		}
		return { event: this.codec.decode(appended) }
	}

	async close(): Promise<void> {
		if (this.closed) {
			return
		}
		this.closed = true
		for (const wake of this.waits) {
			wake.abort()
		}
		this.logger.debug('reader closed', { stream: this.stream, readerGroup: this.readerGroup })
	}

	private ensureReadable(): void {
		if (this.closed) {
			throw new IllegalStateError(`Reader for stream ${this.stream} is closed`)
		}
		if (this.store.generation(this.scope, this.readerGroup) !== this.generation) {
			throw new ReinitializationRequiredError(this.stream, this.readerGroup)
		}
	}
}

class InMemoryStreamWriter<V> implements StreamWriter<V> {
	readonly stream: string
	private readonly scope: string
	private readonly codec: Codec<V>
	private closed = false

	constructor(
		private readonly store: InMemoryStreamStore,
		options: WriterOptions<V>,
		private readonly logger: Logger
	) {
		this.scope = options.scope
		this.stream = options.stream
		this.codec = options.codec
	}

	async init(): Promise<void> {
		if (this.store.createStream(this.scope, this.stream)) {
			this.logger.debug('stream created', { scope: this.scope, stream: this.stream })
		}
	}

	async writeEvent(event: V): Promise<void> {
		if (this.closed) {
			throw new IllegalStateError(`Writer for stream ${this.stream} is closed`)
		}
		this.store.append(this.scope, this.stream, this.codec.encode(event))
	}

	async flush(): Promise<void> {
		// appends are synchronous, nothing is buffered
	}

	async close(): Promise<void> {
		this.closed = true
	}
}

/**
 * StreamClient backed by an InMemoryStreamStore
 */
export class InMemoryStreamClient implements StreamClient {
	private readonly logger: Logger

	constructor(
		readonly store: InMemoryStreamStore = new InMemoryStreamStore(),
		logger: Logger = noopLogger
	) {
		this.logger = logger.child({ component: 'stream-store' })
	}

	createReader<V>(options: ReaderOptions<V>): StreamReader<V> {
		return new InMemoryStreamReader(this.store, options, this.logger)
	}

	createWriter<V>(options: WriterOptions<V>): StreamWriter<V> {
		return new InMemoryStreamWriter(this.store, options, this.logger)
	}
}

/**
 * Factory for AdapterClient's `streamClient` option. Clients created from the
 * same store see each other's events.
 */
export function createInMemoryStreamClient(store: InMemoryStreamStore = new InMemoryStreamStore()): StreamClientFactory {
	return ({ endpoints, logger }) => new InMemoryStreamClient(store, logger.child({ endpoints }))
}
