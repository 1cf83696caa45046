/**
 * Polled batches
 */

import {
	SYNTHETIC_OFFSET,
	SYNTHETIC_PARTITION,
	tpKey,
	type TopicPartition,
} from '@/utils/topic-partition.js'
import type { ConsumerRecord } from './types.js'

interface PartitionRecords<V> {
	topicPartition: TopicPartition
	records: ConsumerRecord<V>[]
}

/**
 * Wrap a read event in the record shape callers expect
 */
export function toConsumerRecord<V>(stream: string, value: V): ConsumerRecord<V> {
	return {
		topic: stream,
		partition: SYNTHETIC_PARTITION,
		offset: SYNTHETIC_OFFSET,
		timestamp: null,
		timestampType: 'NoTimestampType',
		key: null,
		value,
		headers: {},
	}
}

/**
 * The records returned by one poll, grouped by topic-partition.
 * Within a partition, records keep the order they were read in.
 */
export class ConsumerRecords<V> implements Iterable<ConsumerRecord<V>> {
	private readonly byPartition: ReadonlyMap<string, PartitionRecords<V>>

	private constructor(byPartition: ReadonlyMap<string, PartitionRecords<V>>) {
		this.byPartition = byPartition
	}

	static empty<V>(): ConsumerRecords<V> {
		return new ConsumerRecords<V>(new Map())
	}

	/**
	 * Group records by topic-partition, keeping their relative order.
	 * Interceptors use this to return a rewritten batch.
	 */
	static from<V>(records: Iterable<ConsumerRecord<V>>): ConsumerRecords<V> {
		const builder = new ConsumerRecordsBuilder<V>()
		for (const record of records) {
			builder.append({ topic: record.topic, partition: record.partition }, [record])
		}
		return builder.build()
	}

	/** Total number of records */
	get count(): number {
		let total = 0
		for (const entry of this.byPartition.values()) {
			total += entry.records.length
		}
		return total
	}

	isEmpty(): boolean {
		return this.count === 0
	}

	partitions(): TopicPartition[] {
		return Array.from(this.byPartition.values(), entry => ({ ...entry.topicPartition }))
	}

	/**
	 * Records of one topic-partition
	 */
	records(topicPartition: TopicPartition): readonly ConsumerRecord<V>[] {
		return this.byPartition.get(tpKey(topicPartition.topic, topicPartition.partition))?.records ?? []
	}

	/**
	 * Records of every partition of a topic
	 */
	recordsForTopic(topic: string): ConsumerRecord<V>[] {
		const result: ConsumerRecord<V>[] = []
		for (const entry of this.byPartition.values()) {
			if (entry.topicPartition.topic === topic) {
				result.push(...entry.records)
			}
		}
		return result
	}

	filter(predicate: (record: ConsumerRecord<V>) => boolean): ConsumerRecords<V> {
		return ConsumerRecords.from(Array.from(this).filter(predicate))
	}

	*[Symbol.iterator](): Iterator<ConsumerRecord<V>> {
		for (const entry of this.byPartition.values()) {
			yield* entry.records
		}
	}

	/** @internal */
	static fromBuilder<V>(byPartition: ReadonlyMap<string, PartitionRecords<V>>): ConsumerRecords<V> {
		return new ConsumerRecords(byPartition)
	}
}

/**
 * Mutable working state of one poll
 */
export class ConsumerRecordsBuilder<V> {
	private readonly byPartition = new Map<string, PartitionRecords<V>>()
	private total = 0

	get count(): number {
		return this.total
	}

	/**
	 * Append records to a topic-partition, creating its entry on first use
	 */
	append(topicPartition: TopicPartition, records: readonly ConsumerRecord<V>[]): void {
		if (records.length === 0) {
			return
		}
		const key = tpKey(topicPartition.topic, topicPartition.partition)
		const entry = this.byPartition.get(key)
		if (entry) {
			entry.records.push(...records)
		} else {
			this.byPartition.set(key, { topicPartition: { ...topicPartition }, records: [...records] })
		}
		this.total += records.length
	}

	build(): ConsumerRecords<V> {
		return ConsumerRecords.fromBuilder(new Map(this.byPartition))
	}
}
