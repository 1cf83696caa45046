/**
 * Configuration resolution
 *
 * Every config object is resolved once, when the client, consumer or
 * producer is created. Later calls never look at the caller's object again.
 */

import { randomUUID } from 'node:crypto'
import type { ConsumerConfig, ResolvedConsumerConfig } from '@/consumer/types.js'
import { DEFAULT_CONSUMER_CONFIG } from '@/consumer/types.js'
import type { ProducerConfig, ResolvedProducerConfig } from '@/producer/types.js'
import { ConfigError } from './errors.js'
import type { ClientConfig, ResolvedClientConfig } from './types.js'

/**
 * Scope of every stream when none is configured
 */
export const DEFAULT_SCOPE = 'migrated-from-kafka'

export const DEFAULT_CLIENT_ID = 'logshim'

/**
 * Endpoints of the stream store: the controller URI, else the bootstrap
 * brokers joined with ',', else `defaultEndpoint`
 *
 * @throws ConfigError when none of them is set
 */
export function resolveServerEndpoints(config: Pick<ClientConfig, 'controllerUri' | 'brokers' | 'defaultEndpoint'>): string {
	const controllerUri = config.controllerUri?.trim()
	if (controllerUri) {
		return controllerUri
	}

	const brokers = (config.brokers ?? []).map(broker => broker.trim()).filter(broker => broker !== '')
	if (brokers.length > 0) {
		return brokers.join(',')
	}

	const fallback = config.defaultEndpoint?.trim()
	if (fallback) {
		return fallback
	}

	throw new ConfigError('controllerUri', 'no controller URI, brokers or default endpoint configured')
}

export function resolveClientConfig(config: ClientConfig): ResolvedClientConfig {
	return {
		endpoints: resolveServerEndpoints(config),
		scope: nonBlank('scope', config.scope, DEFAULT_SCOPE),
		clientId: nonBlank('clientId', config.clientId, DEFAULT_CLIENT_ID),
	}
}

export function resolveConsumerConfig<V>(client: ResolvedClientConfig, config: ConsumerConfig<V> = {}): ResolvedConsumerConfig<V> {
	return {
		scope: client.scope,
		groupId: nonBlank('groupId', config.groupId, randomUUID()),
		clientId: nonBlank('clientId', config.clientId, DEFAULT_CONSUMER_CONFIG.clientId),
		readTimeoutMs: positive('readTimeoutMs', config.readTimeoutMs ?? DEFAULT_CONSUMER_CONFIG.readTimeoutMs),
		maxPollRecords: positiveInteger('maxPollRecords', config.maxPollRecords ?? DEFAULT_CONSUMER_CONFIG.maxPollRecords),
		maxRecordsPerStreamPerPass: positiveInteger(
			'maxRecordsPerStreamPerPass',
			config.maxRecordsPerStreamPerPass ?? DEFAULT_CONSUMER_CONFIG.maxRecordsPerStreamPerPass
		),
		interceptors: [...(config.interceptors ?? [])],
	}
}

export function resolveProducerConfig<V>(client: ResolvedClientConfig, config: ProducerConfig<V> = {}): ResolvedProducerConfig<V> {
	return {
		scope: client.scope,
		clientId: client.clientId,
		interceptors: [...(config.interceptors ?? [])],
		propagateWriteErrors: config.propagateWriteErrors ?? false,
	}
}

function nonBlank(field: string, value: string | undefined, fallback: string): string {
	if (value === undefined) {
		return fallback
	}
	if (value.trim() === '') {
		throw new ConfigError(field, 'must not be blank')
	}
	return value
}

function positive(field: string, value: number): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigError(field, `must be a positive number, got ${value}`)
	}
	return value
}

function positiveInteger(field: string, value: number): number {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(field, `must be a positive integer, got ${value}`)
	}
	return value
}
