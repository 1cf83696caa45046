import { describe, expect, it } from 'vitest'

import { IllegalStateError, ReinitializationRequiredError } from '@/client/errors.js'
import { json, string } from '@/codec.js'
import { noopLogger } from '@/logger.js'
import { InMemoryStreamClient, InMemoryStreamStore, createInMemoryStreamClient } from '@/streams/memory.js'

import { createMockLogger } from '../helpers/logger.js'

const SCOPE = 'test-scope'

function readerOptions(stream: string, readerGroup = 'group') {
	return { scope: SCOPE, stream, readerGroup, readerId: 'reader', codec: string() }
}

describe('InMemoryStreamStore', () => {
	it('creates a stream only once', () => {
		const store = new InMemoryStreamStore()
		expect(store.createStream(SCOPE, 'orders')).toBe(true)
		expect(store.createStream(SCOPE, 'orders')).toBe(false)
	})

	it('keeps one position per reader group', () => {
		const store = new InMemoryStreamStore()
		store.append(SCOPE, 'orders', Buffer.from('a'))
		store.append(SCOPE, 'orders', Buffer.from('b'))

		expect(store.takeNext(SCOPE, 'g1', 'orders')?.toString()).toBe('a')
		expect(store.takeNext(SCOPE, 'g2', 'orders')?.toString()).toBe('a')
		expect(store.takeNext(SCOPE, 'g1', 'orders')?.toString()).toBe('b')
		expect(store.takeNext(SCOPE, 'g1', 'orders')).toBeNull()
		expect(store.pending(SCOPE, 'g1', 'orders')).toBe(0)
		expect(store.pending(SCOPE, 'g2', 'orders')).toBe(1)
	})

	it('separates streams of different scopes', () => {
		const store = new InMemoryStreamStore()
		store.append('a', 'orders', Buffer.from('x'))
		expect(store.events('a', 'orders')).toHaveLength(1)
		expect(store.events('b', 'orders')).toHaveLength(0)
	})
})

describe('InMemoryStreamClient', () => {
	it('writes encoded events and reads them back in order', async () => {
		const client = new InMemoryStreamClient()
		const writer = client.createWriter({ scope: SCOPE, stream: 'orders', codec: json<{ id: number }>() })
		await writer.init()
		await writer.writeEvent({ id: 1 })
		await writer.writeEvent({ id: 2 })

		expect(client.store.events(SCOPE, 'orders').map(event => event.toString())).toEqual(['{"id":1}', '{"id":2}'])

		const reader = client.createReader({ ...readerOptions('orders'), codec: json<{ id: number }>() })
		expect(await reader.readNextEvent(10)).toEqual({ event: { id: 1 } })
		expect(await reader.readNextEvent(10)).toEqual({ event: { id: 2 } })
	})

	it('returns an empty read after the timeout', async () => {
		const client = new InMemoryStreamClient()
		const reader = client.createReader(readerOptions('orders'))
		expect(await reader.readNextEvent(5)).toEqual({ event: null })
	})

	it('wakes a waiting read when an event is appended', async () => {
		const client = new InMemoryStreamClient()
		const reader = client.createReader(readerOptions('orders'))
		const read = reader.readNextEvent(5_000)
		client.store.append(SCOPE, 'orders', Buffer.from('late'))
		expect(await read).toEqual({ event: 'late' })
	})

	it('splits events between readers of the same group', async () => {
		const client = new InMemoryStreamClient()
		client.store.append(SCOPE, 'orders', Buffer.from('a'))
		client.store.append(SCOPE, 'orders', Buffer.from('b'))
		const first = client.createReader(readerOptions('orders'))
		const second = client.createReader(readerOptions('orders'))

		expect(await first.readNextEvent(5)).toEqual({ event: 'a' })
		expect(await second.readNextEvent(5)).toEqual({ event: 'b' })
		expect(await first.readNextEvent(5)).toEqual({ event: null })
	})

	it('wakes a pending read with an empty result on close', async () => {
		const client = new InMemoryStreamClient()
		const reader = client.createReader(readerOptions('orders'))
		const read = reader.readNextEvent(5_000)
		await reader.close()
		expect(await read).toEqual({ event: null })
	})

	it('rejects reads from a closed reader', async () => {
		const client = new InMemoryStreamClient()
		const reader = client.createReader(readerOptions('orders'))
		await reader.close()
		await expect(reader.readNextEvent(5)).rejects.toBeInstanceOf(IllegalStateError)
	})

	it('fails readers of an invalidated group with ReinitializationRequiredError', async () => {
		const client = new InMemoryStreamClient()
		const stale = client.createReader(readerOptions('orders', 'billing'))
		client.store.invalidateReaderGroup(SCOPE, 'billing')

		await expect(stale.readNextEvent(5)).rejects.toBeInstanceOf(ReinitializationRequiredError)

		const fresh = client.createReader(readerOptions('orders', 'billing'))
		expect(await fresh.readNextEvent(5)).toEqual({ event: null })
	})

	it('rejects writes to a closed writer', async () => {
		const client = new InMemoryStreamClient()
		const writer = client.createWriter({ scope: SCOPE, stream: 'orders', codec: string() })
		await writer.close()
		await expect(writer.writeEvent('x')).rejects.toThrow('Writer for stream orders is closed')
	})

	it('logs stream creation through the stream-store component', async () => {
		const logger = createMockLogger()
		const client = new InMemoryStreamClient(new InMemoryStreamStore(), logger)
		await client.createWriter({ scope: SCOPE, stream: 'orders', codec: string() }).init()
		expect(logger.child).toHaveBeenCalledWith({ component: 'stream-store' })
		expect(logger.debug).toHaveBeenCalledWith('stream created', { scope: SCOPE, stream: 'orders' })
	})

	it('factory clients built on one store share events', async () => {
		const store = new InMemoryStreamStore()
		const factory = createInMemoryStreamClient(store)
		const options = { endpoints: 'memory://local', scope: SCOPE, logger: noopLogger }
		const producing = factory(options)
		const consuming = factory(options)

		await producing.createWriter({ scope: SCOPE, stream: 'orders', codec: string() }).writeEvent('shared')
		const reader = consuming.createReader(readerOptions('orders'))
		expect(await reader.readNextEvent(5)).toEqual({ event: 'shared' })
	})
})
