import { ProtoCodec, type Codec, type CodecConfig, type MessageType } from '@protowire/core'
import type { ZodType } from 'zod'

/**
 * Codec that checks values with a zod schema on both sides of the wire:
 * before encoding, and after decoding.
 *
 * @example
 * ```typescript
 * const users = zodMessageCodec(User, z.object({ id: z.bigint(), email: z.string().email() }))
 * ```
 */
export function zodMessageCodec<T>(
	type: MessageType<T>,
	schema: ZodType<T>,
	config?: CodecConfig
): Codec<T> {
	const codec = new ProtoCodec(config)

	return {
		encode: value => codec.encode(type, schema.parse(value)),
		decode: buffer => schema.parse(codec.decode(type, buffer)),
	}
}
