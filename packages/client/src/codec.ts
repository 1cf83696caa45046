/**
 * Value codecs
 *
 * A codec turns event values into the bytes the stream store keeps and back.
 * Readers decode with it and writers encode with it; the consumer and
 * producer only ever see decoded values.
 */

import { CodecError } from '@/client/errors.js'

export interface Codec<T> {
	encode(value: T): Buffer
	decode(buffer: Buffer): T
}

/**
 * Names of the built-in codecs
 */
export type CodecName = 'string' | 'json' | 'buffer'

export function string(): Codec<string> {
	return {
		encode: value => Buffer.from(value, 'utf-8'),
		decode: buffer => buffer.toString('utf-8'),
	}
}

/**
 * JSON codec. The decoded value is trusted to be a `T`; use a validating
 * codec (see `@logshim/codec-zod`) when it must be checked.
 */
export function json<T>(): Codec<T> {
	return {
		encode: value => Buffer.from(JSON.stringify(value), 'utf-8'),
		decode: buffer => {
			try {
				return JSON.parse(buffer.toString('utf-8')) as T
			} catch (error) {
				throw new CodecError('Event is not valid JSON', error)
			}
		},
	}
}

export function buffer(): Codec<Buffer> {
	return {
		encode: value => value,
		decode: value => value,
	}
}

export const codec = {
	string,
	json,
	buffer,
}

/**
 * Check that a value has the codec shape
 */
export function isCodec(value: unknown): value is Codec<unknown> {
	return (
		typeof value === 'object' &&
		value !== null &&
		'encode' in value &&
		'decode' in value &&
		typeof value.encode === 'function' &&
		typeof value.decode === 'function'
	)
}

/**
 * Look up a built-in codec by name
 *
 * @throws CodecError for an unknown name
 */
export function codecByName(name: 'string'): Codec<string>
export function codecByName(name: 'buffer'): Codec<Buffer>
export function codecByName(name: 'json'): Codec<unknown>
export function codecByName(name: string): Codec<string> | Codec<Buffer> | Codec<unknown>
export function codecByName(name: string): Codec<string> | Codec<Buffer> | Codec<unknown> {
	switch (name) {
		case 'string':
			return string()
		case 'json':
			return json<unknown>()
		case 'buffer':
			return buffer()
		default:
			throw new CodecError(`Unknown codec "${name}"`)
	}
}
