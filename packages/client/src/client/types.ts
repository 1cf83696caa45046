/**
 * Client-level types
 */

import type { Logger, LogLevel } from '@/logger.js'
import type { StreamClientFactory } from '@/streams/types.js'

/**
 * Adapter client configuration
 */
export interface ClientConfig {
	/** Stream store controller URI; wins over `brokers` */
	controllerUri?: string

	/** Partitioned-log style bootstrap addresses, used as endpoints when no controller URI is set */
	brokers?: string[]

	/** Endpoints used when neither `controllerUri` nor `brokers` is set */
	defaultEndpoint?: string

	/** Stream store scope of every stream (default: 'migrated-from-kafka') */
	scope?: string

	/** Client identifier used in logs and as producer id (default: 'logshim') */
	clientId?: string

	/** Logger instance (optional, defaults to no-op) */
	logger?: Logger

	/** Log level when using default logger (default: 'info') */
	logLevel?: LogLevel

	/** Builds the stream store client, e.g. createInMemoryStreamClient() */
	streamClient: StreamClientFactory
}

/**
 * Client configuration with endpoints and defaults resolved
 */
export interface ResolvedClientConfig {
	endpoints: string
	scope: string
	clientId: string
}
