/**
 * Topic-partition identifiers
 *
 * The stream store has no partitions. Every stream is surfaced as a single
 * partition, and positions inside it are placeholders.
 */

/**
 * Topic-partition identifier
 */
export interface TopicPartition {
	topic: string
	partition: number
}

/**
 * Partition description returned by partitionsFor() and listTopics()
 */
export interface PartitionInfo {
	topic: string
	partition: number
	leader: null
	replicas: readonly string[]
	inSyncReplicas: readonly string[]
}

/** Partition number surfaced for every consumed record */
export const SYNTHETIC_PARTITION = 0

/** Offset surfaced for every consumed record */
export const SYNTHETIC_OFFSET = 0n

/**
 * Create a unique string key for a topic-partition pair
 */
export function tpKey(topic: string, partition: number): string {
	return `${topic}:${partition}`
}

/**
 * Parse a topic-partition key back into its components.
 * Topic names may contain ':', so the partition is taken after the last one.
 */
export function parseKey(key: string): TopicPartition {
	const separator = key.lastIndexOf(':')
	if (separator < 0) {
		throw new Error(`Malformed topic-partition key "${key}"`)
	}
	return { topic: key.slice(0, separator), partition: parseInt(key.slice(separator + 1), 10) }
}

/**
 * The single partition every stream is presented as
 */
export function syntheticPartitionInfo(topic: string): PartitionInfo {
	return { topic, partition: SYNTHETIC_PARTITION, leader: null, replicas: [], inSyncReplicas: [] }
}
