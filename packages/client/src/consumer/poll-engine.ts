/**
 * Time-budgeted draining of several stream readers
 *
 * One poll runs passes over the readers, in subscription order, until its
 * deadline. In a pass each reader is read until it runs dry, hits the
 * per-pass cap, or the poll hits its total cap or deadline. A busy stream
 * that still has events when its pass cap is reached is revisited on the
 * next pass, after every other stream had its turn.
 *
 * The deadline is checked before every read, so a poll can overrun it by at
 * most one read timeout.
 */

import type { Logger } from '@/logger.js'
import { trace } from '@/logger.js'
import type { StreamReader } from '@/streams/types.js'
import { SYNTHETIC_PARTITION } from '@/utils/topic-partition.js'
import { yieldToEventLoop } from '@/utils/sleep.js'
import { ConsumerRecordsBuilder, toConsumerRecord, type ConsumerRecords } from './records.js'
import type { ConsumerRecord } from './types.js'

export interface DrainOptions {
	/** Overall budget of the poll, > 0 */
	timeoutMs: number
	/** Timeout of each single read */
	readTimeoutMs: number
	maxRecordsPerStreamPerPass: number
	maxRecords: number
}

export interface DrainContext {
	/** Throws when the consumer was closed; checked between reads */
	ensureOpen(): void
	logger: Logger
	/** Clock, in ms (default: Date.now) */
	now?: () => number
}

/**
 * Drain `readers` within the budget of `options`
 *
 * Passes repeat until the deadline, or until `maxRecords` events are
 * collected, whichever comes first.
 *
 * Errors raised by a reader, including ReinitializationRequiredError, end the
 * poll and propagate as they are.
 */
export async function drainReaders<V>(
	readers: ReadonlyMap<string, StreamReader<V>>,
	options: DrainOptions,
	context: DrainContext
): Promise<ConsumerRecords<V>> {
	const now = context.now ?? Date.now
	const { logger } = context
	const startedAt = now()
	const deadline = startedAt + options.timeoutMs
	const batch = new ConsumerRecordsBuilder<V>()
	let passes = 0

	while (now() < deadline && batch.count < options.maxRecords) {
		passes++
		for (const [stream, reader] of readers) {
			context.ensureOpen()

			if (now() >= deadline) {
				trace(logger, 'read time already expired', { stream })
				continue
			}

			const drained: ConsumerRecord<V>[] = []
			while (
				drained.length < options.maxRecordsPerStreamPerPass &&
				batch.count + drained.length < options.maxRecords &&
				now() < deadline
			) {
				const read = await reader.readNextEvent(options.readTimeoutMs)
				context.ensureOpen()
				if (read.event === null) {
					break
				}
				drained.push(toConsumerRecord(stream, read.event))
			}

			if (drained.length > 0) {
				trace(logger, 'records read', { stream, count: drained.length })
				batch.append({ topic: stream, partition: SYNTHETIC_PARTITION }, drained)
			}
		}
		await yieldToEventLoop()
	}

	logger.debug('poll finished', {
		records: batch.count,
		passes,
		elapsedMs: now() - startedAt,
		timeoutMs: options.timeoutMs,
	})
	return batch.build()
}
