/**
 * Codec facade
 *
 * Holds decode limits and the logger, and adapts message types to the
 * `Codec<T>` interface used by transports.
 */

import { DEFAULT_MAX_DEPTH, resolveLimit, type CodecConfig } from '@/config.js'
import { resolveLogger, type Logger } from '@/logger.js'
import type { MessageType } from '@/message/message-type.js'

/**
 * Encode and decode values of one type
 */
export interface Codec<T> {
	encode(value: T): Buffer
	decode(buffer: Buffer): T
}

export class ProtoCodec {
	private readonly maxDepth: number
	private readonly logger: Logger

	constructor(config: CodecConfig = {}) {
		this.maxDepth = resolveLimit('maxDepth', config.maxDepth, DEFAULT_MAX_DEPTH)
		this.logger = resolveLogger(config, { component: 'protowire' })
	}

	/**
	 * Validate and encode a record. Nothing is written when validation fails.
	 */
	encode<T>(type: MessageType<T>, record: T): Buffer {
		return type.encode(record)
	}

	/**
	 * Decode a record; unknown fields are skipped
	 *
	 * @throws DecodeError when the bytes are malformed or nested deeper than `maxDepth`
	 */
	decode<T>(type: MessageType<T>, bytes: Uint8Array): T {
		try {
			const record = type.decode(bytes, { maxDepth: this.maxDepth, logger: this.logger })
			this.logger.debug('decoded record', { messageType: type.fullName, size: bytes.byteLength })
			return record
		} catch (error) {
			this.logger.warn('failed to decode record', {
				messageType: type.fullName,
				size: bytes.byteLength,
				error: error instanceof Error ? error.message : String(error),
			})
			throw error
		}
	}

	/**
	 * Merge `source` into `target` and return `target`
	 */
	merge<T>(type: MessageType<T>, target: T, source: T): T {
		return type.merge(target, source)
	}

	/**
	 * Bind a message type to this codec's settings
	 */
	codec<T>(type: MessageType<T>): Codec<T> {
		return {
			encode: value => this.encode(type, value),
			decode: buffer => this.decode(type, buffer),
		}
	}
}

/**
 * Codec for a single message type
 *
 * @example
 * ```typescript
 * const events = messageCodec(Event, { logLevel: 'debug' })
 * const payload = events.encode({ id: 1n, name: 'created' })
 * ```
 */
export function messageCodec<T>(type: MessageType<T>, config?: CodecConfig): Codec<T> {
	return new ProtoCodec(config).codec(type)
}
