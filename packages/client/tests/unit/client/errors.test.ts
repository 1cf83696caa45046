import { describe, expect, it } from 'vitest'

import {
	AdapterError,
	CodecError,
	ConfigError,
	IllegalArgumentError,
	IllegalStateError,
	ReinitializationRequiredError,
	SendError,
	UnsupportedOperationError,
	isAdapterError,
	isRetriable,
	toError,
} from '@/client/errors.js'

describe('client errors', () => {
	it('usage errors are adapter errors and never retriable', () => {
		const errors = [
			new IllegalArgumentError('bad'),
			new IllegalStateError('closed'),
			new UnsupportedOperationError('seek()'),
			new ConfigError('scope', 'must not be blank'),
		]
		for (const error of errors) {
			expect(error).toBeInstanceOf(AdapterError)
			expect(isAdapterError(error)).toBe(true)
			expect(isRetriable(error)).toBe(false)
		}
	})

	it('UnsupportedOperationError names the operation', () => {
		const error = new UnsupportedOperationError('seek()')
		expect(error.message).toBe('seek() is not supported')
		expect(error.operation).toBe('seek()')
		expect(error.name).toBe('UnsupportedOperationError')
	})

	it('ReinitializationRequiredError exposes stream and reader group', () => {
		const error = new ReinitializationRequiredError('orders', 'billing-1')
		expect(error.stream).toBe('orders')
		expect(error.readerGroup).toBe('billing-1')
		expect(error.message).toBe('Reader for stream orders in group billing-1 requires reinitialization')
	})

	it('SendError wraps the write fault', () => {
		const fault = new Error('connection lost')
		const error = new SendError('orders', fault)
		expect(error.message).toBe('Writing event to orders failed: connection lost')
		expect(error.cause).toBe(fault)
		expect(error.topic).toBe('orders')
		expect(isRetriable(error)).toBe(true)
	})

	it('SendError tolerates non-Error causes', () => {
		const error = new SendError('orders', 'timeout')
		expect(error.message).toBe('Writing event to orders failed')
		expect(error.cause).toBe('timeout')
	})

	it('ConfigError formats the field', () => {
		const error = new ConfigError('maxPollRecords', 'must be a positive integer, got 0')
		expect(error.message).toBe('Invalid configuration for maxPollRecords: must be a positive integer, got 0')
		expect(error.field).toBe('maxPollRecords')
	})

	it('CodecError keeps its cause', () => {
		const cause = new SyntaxError('Unexpected token')
		expect(new CodecError('Event is not valid JSON', cause).cause).toBe(cause)
	})

	it('plain errors are not adapter errors', () => {
		expect(isAdapterError(new Error('x'))).toBe(false)
		expect(isRetriable(new Error('x'))).toBe(false)
	})

	it('toError normalizes thrown values', () => {
		const error = new Error('kept')
		expect(toError(error)).toBe(error)
		expect(toError('text').message).toBe('text')
		expect(toError(42).message).toBe('42')
	})
})
