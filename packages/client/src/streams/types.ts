/**
 * Stream-storage client contracts
 *
 * The adapter drives a backing store made of unbounded streams grouped in a
 * scope and read through reader groups. These interfaces are all it needs
 * from that store; `memory.ts` implements them in process.
 */

import type { Codec } from '@/codec.js'
import type { Logger } from '@/logger.js'

/**
 * Result of one bounded read. `event` is null when nothing arrived within
 * the read timeout.
 */
export interface EventRead<V> {
	event: V | null
}

/**
 * Blocking, timeout-bounded reader of one stream, owned by one consumer
 */
export interface StreamReader<V> {
	readonly stream: string
	readonly readerGroup: string
	readonly readerId: string

	/**
	 * Wait up to `timeoutMs` for the next event of the stream.
	 *
	 * @throws ReinitializationRequiredError when the reader must be recreated
	 */
	readNextEvent(timeoutMs: number): Promise<EventRead<V>>

	close(): Promise<void>
}

/**
 * Asynchronous writer of one stream, owned by one producer
 */
export interface StreamWriter<V> {
	readonly stream: string

	/** Prepare the stream for writing. Called once, before the first write. */
	init(): Promise<void>

	/** Settles once the store has accepted the event */
	writeEvent(event: V): Promise<void>

	flush(): Promise<void>

	close(): Promise<void>
}

export interface ReaderOptions<V> {
	scope: string
	stream: string
	/** Reader group shared by all readers that split the stream between them */
	readerGroup: string
	readerId: string
	codec: Codec<V>
}

export interface WriterOptions<V> {
	scope: string
	stream: string
	codec: Codec<V>
}

/**
 * Connection to the backing store
 */
export interface StreamClient {
	createReader<V>(options: ReaderOptions<V>): StreamReader<V>
	createWriter<V>(options: WriterOptions<V>): StreamWriter<V>
	close?(): Promise<void>
}

/**
 * Settings a StreamClient is built from
 */
export interface StreamClientOptions {
	/** Server endpoint(s), comma-separated */
	endpoints: string
	scope: string
	logger: Logger
}

/**
 * Builds the StreamClient for an AdapterClient
 */
export type StreamClientFactory = (options: StreamClientOptions) => StreamClient
