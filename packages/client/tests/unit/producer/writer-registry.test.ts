import { describe, expect, it } from 'vitest'

import { string } from '@/codec.js'
import { WriterRegistry } from '@/producer/writer-registry.js'
import type { StreamClient, StreamWriter, WriterOptions } from '@/streams/types.js'

import { createMockLogger } from '../helpers/logger.js'
import { FakeStreamClient } from '../helpers/streams.js'

function registry(streams: FakeStreamClient, logger = createMockLogger()) {
	return new WriterRegistry(streams, { scope: 'test-scope', codec: string() }, logger)
}

describe('WriterRegistry', () => {
	it('creates and initializes one writer per stream', async () => {
		const streams = new FakeStreamClient()
		const writers = registry(streams)

		const first = writers.resolve('orders')
		const again = writers.resolve('orders')
		writers.resolve('payments')
		await first.ready

		expect(again).toBe(first)
		expect(writers.size).toBe(2)
		expect(streams.writers.map(w => [w.stream, w.inits])).toEqual([
			['orders', 1],
			['payments', 1],
		])
	})

	it('writes through the codec once the writer is ready', async () => {
		const streams = new FakeStreamClient()
		const writers = registry(streams)

		await writers.resolve('orders').write('o1')
		await writers.resolve('orders').write('o2')

		expect(streams.writers[0]?.written).toEqual(['o1', 'o2'])
	})

	it('fails writes of a writer whose init failed', async () => {
		const logger = createMockLogger()
		const streams = new FakeStreamClient({ initError: () => new Error('stream missing') })
		const writers = registry(streams, logger)

		await expect(writers.resolve('orders').write('o1')).rejects.toThrow('stream missing')
		expect(streams.writers[0]?.written).toEqual([])
		expect(logger.error).toHaveBeenCalledWith('writer initialization failed', {
			stream: 'orders',
			error: 'stream missing',
		})
	})

	it('drops a writer whose init failed so the next resolve starts over', async () => {
		let initFailures = 1
		const streams = new FakeStreamClient({
			initError: () => (initFailures-- > 0 ? new Error('stream unavailable') : undefined),
		})
		const writers = registry(streams)

		await expect(writers.resolve('orders').write('o1')).rejects.toThrow('stream unavailable')
		expect(writers.size).toBe(0)

		await writers.resolve('orders').write('o2')
		await writers.resolve('orders').write('o3')

		expect(writers.size).toBe(1)
		expect(streams.writers.map(w => [w.stream, w.inits, w.written])).toEqual([
			['orders', 1, []],
			['orders', 1, ['o2', 'o3']],
		])
	})

	it('waits for a pending init before flushing', async () => {
		const calls: string[] = []
		let finishInit = () => {}
		const streams: StreamClient = {
			createReader: () => {
				throw new Error('no readers here')
			},
			createWriter: <T>({ stream }: WriterOptions<T>): StreamWriter<T> => ({
				stream,
				init: () =>
					new Promise<void>(resolve => {
						finishInit = () => {
							calls.push('init')
							resolve()
						}
					}),
				writeEvent: async () => {},
				flush: async () => {
					calls.push('flush')
				},
				close: async () => {},
			}),
		}
		const writers = new WriterRegistry(streams, { scope: 'test-scope', codec: string() }, createMockLogger())
		writers.resolve('orders')

		const flushed = writers.flushAll()
		finishInit()
		await flushed

		expect(calls).toEqual(['init', 'flush'])
	})

	it('flushes every writer even when one fails', async () => {
		const logger = createMockLogger()
		const streams = new FakeStreamClient({
			flushError: stream => (stream === 'orders' ? new Error('flush failed') : undefined),
		})
		const writers = registry(streams, logger)
		writers.resolve('orders')
		writers.resolve('payments')

		await writers.flushAll()

		expect(streams.writers.map(w => w.flushes)).toEqual([1, 1])
		expect(logger.warn).toHaveBeenCalledWith('unable to flush writer', { stream: 'orders', error: 'flush failed' })
	})

	it('closes every writer and forgets them', async () => {
		const logger = createMockLogger()
		const streams = new FakeStreamClient({
			closeError: stream => (stream === 'orders' ? new Error('close failed') : undefined),
		})
		const writers = registry(streams, logger)
		writers.resolve('orders')
		writers.resolve('payments')

		await writers.closeAll()
		await writers.closeAll()

		expect(writers.size).toBe(0)
		expect(streams.writers.map(w => w.closes)).toEqual([1, 1])
		expect(logger.warn).toHaveBeenCalledWith('unable to close writer', { stream: 'orders', error: 'close failed' })
	})
})
