import { CodecError, type Codec } from '@logshim/client'
import type { ZodType } from 'zod'

export interface ZodCodecOptions {
	/** Turns a validated value into bytes (default: UTF-8 JSON) */
	encode?: (value: unknown) => Buffer
	/** Turns stored bytes into an unvalidated value (default: UTF-8 JSON) */
	decode?: (buffer: Buffer) => unknown
}

/**
 * Value codec that validates with a zod schema on both paths
 *
 * A value that fails the schema, or bytes that do not parse, raise a
 * CodecError whose cause is the underlying ZodError or SyntaxError.
 *
 * @example
 * ```typescript
 * const Order = z.object({ id: z.string(), total: z.number() })
 * const producer = client.producerOf(zodCodec(Order))
 * ```
 */
export function zodCodec<T>(schema: ZodType<T>, options: ZodCodecOptions = {}): Codec<T> {
	const encodeValue = options.encode ?? ((value: unknown) => Buffer.from(JSON.stringify(value), 'utf-8'))
	const decodeValue = options.decode ?? ((buffer: Buffer): unknown => JSON.parse(buffer.toString('utf-8')))

	const validate = (value: unknown, direction: 'encode' | 'decode'): T => {
		const result = schema.safeParse(value)
		if (!result.success) {
			throw new CodecError(`Value failed schema validation on ${direction}`, result.error)
		}
		return result.data
	}

	return {
		encode: value => encodeValue(validate(value, 'encode')),
		decode: buffer => {
			let raw: unknown
			try {
				raw = decodeValue(buffer)
			} catch (error) {
				throw new CodecError('Event could not be parsed', error)
			}
			return validate(raw, 'decode')
		},
	}
}
