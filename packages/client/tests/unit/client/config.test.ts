import { describe, expect, it } from 'vitest'

import {
	DEFAULT_SCOPE,
	resolveClientConfig,
	resolveConsumerConfig,
	resolveProducerConfig,
	resolveServerEndpoints,
} from '@/client/config.js'
import { ConfigError } from '@/client/errors.js'
import { createInMemoryStreamClient } from '@/streams/memory.js'

const streamClient = createInMemoryStreamClient()

describe('resolveServerEndpoints', () => {
	it('prefers the controller URI', () => {
		expect(
			resolveServerEndpoints({ controllerUri: 'tcp://controller:9090', brokers: ['a:9092'], defaultEndpoint: 'x' })
		).toBe('tcp://controller:9090')
	})

	it('falls back to the brokers joined with commas', () => {
		expect(resolveServerEndpoints({ brokers: ['a:9092', ' b:9092 ', ''] })).toBe('a:9092,b:9092')
	})

	it('falls back to the default endpoint', () => {
		expect(resolveServerEndpoints({ controllerUri: '  ', brokers: [], defaultEndpoint: 'tcp://local:9090' })).toBe(
			'tcp://local:9090'
		)
	})

	it('fails without any endpoint', () => {
		expect(() => resolveServerEndpoints({})).toThrow(ConfigError)
		expect(() => resolveServerEndpoints({ brokers: [' '] })).toThrow(
			'Invalid configuration for controllerUri: no controller URI, brokers or default endpoint configured'
		)
	})
})

describe('resolveClientConfig', () => {
	it('applies defaults', () => {
		expect(resolveClientConfig({ controllerUri: 'memory://test', streamClient })).toEqual({
			endpoints: 'memory://test',
			scope: 'migrated-from-kafka',
			clientId: 'logshim',
		})
		expect(DEFAULT_SCOPE).toBe('migrated-from-kafka')
	})

	it('rejects a blank scope', () => {
		expect(() => resolveClientConfig({ controllerUri: 'memory://test', scope: ' ', streamClient })).toThrow(
			'Invalid configuration for scope: must not be blank'
		)
	})
})

describe('resolveConsumerConfig', () => {
	const client = { endpoints: 'memory://test', scope: 'billing', clientId: 'test-client' }

	it('applies defaults', () => {
		const resolved = resolveConsumerConfig<string>(client)
		expect(resolved).toEqual({
			scope: 'billing',
			groupId: expect.stringMatching(/^[0-9a-f-]{36}$/),
			clientId: 'default-reader',
			readTimeoutMs: 500,
			maxPollRecords: 500,
			maxRecordsPerStreamPerPass: 10,
			interceptors: [],
		})
	})

	it('gives every consumer its own random group', () => {
		expect(resolveConsumerConfig(client).groupId).not.toBe(resolveConsumerConfig(client).groupId)
	})

	it('keeps explicit values', () => {
		const resolved = resolveConsumerConfig<string>(client, {
			groupId: 'invoices',
			clientId: 'reader-7',
			readTimeoutMs: 50,
			maxPollRecords: 20,
			maxRecordsPerStreamPerPass: 5,
		})
		expect(resolved).toMatchObject({
			groupId: 'invoices',
			clientId: 'reader-7',
			readTimeoutMs: 50,
			maxPollRecords: 20,
			maxRecordsPerStreamPerPass: 5,
		})
	})

	it('rejects non-positive values', () => {
		expect(() => resolveConsumerConfig(client, { readTimeoutMs: 0 })).toThrow(
			'Invalid configuration for readTimeoutMs: must be a positive number, got 0'
		)
		expect(() => resolveConsumerConfig(client, { maxPollRecords: -1 })).toThrow(ConfigError)
		expect(() => resolveConsumerConfig(client, { maxRecordsPerStreamPerPass: 2.5 })).toThrow(ConfigError)
		expect(() => resolveConsumerConfig(client, { groupId: '' })).toThrow(
			'Invalid configuration for groupId: must not be blank'
		)
	})
})

describe('resolveProducerConfig', () => {
	it('applies defaults', () => {
		const client = { endpoints: 'memory://test', scope: 'billing', clientId: 'test-client' }
		expect(resolveProducerConfig<string>(client)).toEqual({
			scope: 'billing',
			clientId: 'test-client',
			interceptors: [],
			propagateWriteErrors: false,
		})
		expect(resolveProducerConfig<string>(client, { propagateWriteErrors: true }).propagateWriteErrors).toBe(true)
	})
})
