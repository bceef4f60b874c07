/**
 * Message types
 *
 * `message()` registers a record type once: field numbers are checked, element
 * types are mapped to serializers and fields are sorted by number. The returned
 * MessageType is immutable and can be shared by any number of concurrent
 * encode and decode calls.
 */

import { DEFAULT_MAX_DEPTH, resolveLimit, type DecodeOptions } from '@/config.js'
import { noopLogger } from '@/logger.js'
import { deriveSchema, type FieldBinding } from '@/message/derive.js'
import { MessageEngine } from '@/message/engine.js'
import type { InferShape, MessageShape, TypeDescriptor } from '@/message/shape.js'
import { Decoder } from '@/protocol/primitives/decoder.js'
import { Encoder } from '@/protocol/primitives/encoder.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { MessageSerializer, type EmbeddedMessage } from '@/serializers/message.js'
import type { DecodeContext, Serializer } from '@/serializers/serializer.js'

export const TYPE_URL_PREFIX = 'type.googleapis.com/'

export interface MessageOptions {
	/** Dotted package name; prefixes `fullName` and `typeUrl` */
	package?: string
}

function decodeContext(options: DecodeOptions): DecodeContext {
	return {
		depth: 0,
		maxDepth: resolveLimit('maxDepth', options.maxDepth, DEFAULT_MAX_DEPTH),
		logger: options.logger ?? noopLogger,
	}
}

export class MessageType<T> implements TypeDescriptor<T>, EmbeddedMessage<T> {
	readonly kind = 'message'
	readonly fullName: string
	readonly typeUrl: string

	private readonly engine: MessageEngine
	private readonly instance: MessageSerializer<T>

	constructor(
		readonly name: string,
		shape: MessageShape,
		options: MessageOptions = {}
	) {
		this.fullName = options.package ? `${options.package}.${name}` : name
		this.typeUrl = TYPE_URL_PREFIX + this.fullName
		this.engine = new MessageEngine(this.fullName, deriveSchema(this.fullName, shape))
		this.instance = new MessageSerializer(this)
	}

	get typeName(): string {
		return this.fullName
	}

	/** Fields in ascending field-number order */
	get fields(): readonly FieldBinding[] {
		return this.engine.bindings
	}

	serializer(): Serializer<T> {
		return this.instance
	}

	/**
	 * A record with every field at its default, with `init` applied over it
	 */
	create(init?: Partial<T>): T {
		return this.typed(Object.assign(this.engine.create(), init))
	}

	/**
	 * Throws a ValidationError naming the first offending field
	 */
	validate(record: unknown): void {
		this.engine.validate(record)
	}

	writeFields(record: T, encoder: IEncoder): void {
		this.engine.dump(this.engine.recordOf(record), encoder)
	}

	readFields(decoder: IDecoder, context: DecodeContext): T {
		return this.typed(this.engine.load(decoder, context))
	}

	/**
	 * Merge `source` into `target` field by field: scalars are replaced by set
	 * values, repeated fields concatenated, embedded messages merged.
	 * Returns `target`.
	 */
	merge(target: T, source: T): T {
		this.engine.merge(this.engine.validate(target), this.engine.validate(source))
		return target
	}

	/**
	 * Validate, then write the record's fields without a length prefix
	 */
	dump(record: T, encoder: IEncoder): void {
		this.engine.dump(this.engine.validate(record), encoder)
	}

	/**
	 * Read a record from the rest of `decoder`
	 */
	load(decoder: IDecoder, options: DecodeOptions = {}): T {
		return this.readFields(decoder, decodeContext(options))
	}

	encode(record: T): Buffer {
		const encoder = new Encoder()
		this.dump(record, encoder)
		return encoder.toBuffer()
	}

	decode(bytes: Uint8Array, options: DecodeOptions = {}): T {
		return this.load(new Decoder(bytes), options)
	}

	/**
	 * Encode with an unsigned-varint length prefix, so records can be concatenated
	 */
	encodeDelimited(record: T): Buffer {
		const valid = this.engine.validate(record)
		return new Encoder().writeDelimited(body => this.engine.dump(valid, body)).toBuffer()
	}

	/**
	 * Read one length-prefixed record, leaving `decoder` after it
	 */
	decodeDelimited(decoder: IDecoder, options: DecodeOptions = {}): T {
		return this.readFields(decoder.readDelimited(), decodeContext(options))
	}

	private typed(record: Record<string, unknown>): T {
		// Records are only built from this type's own fields
		const value: unknown = record
		return value as T
	}
}

/**
 * Register a message type
 *
 * @param name - Message name, used in errors and in `typeUrl`
 * @param shape - Record property names mapped to field specs
 *
 * @example
 * ```typescript
 * const Line = message('Line', {
 *   sku: field(1, types.string),
 *   quantity: field(2, types.uint32),
 * })
 * const Order = message('Order', {
 *   id: field(1, types.uint64),
 *   lines: repeated(2, Line),
 *   note: optional(3, types.string),
 * }, { package: 'shop' })
 *
 * const bytes = Order.encode({ id: 7n, lines: [{ sku: 'A-1', quantity: 2 }] })
 * Order.decode(bytes).lines[0]?.sku // 'A-1'
 * ```
 */
export function message<S extends MessageShape>(
	name: string,
	shape: S,
	options?: MessageOptions
): MessageType<InferShape<S>> {
	return new MessageType<InferShape<S>>(name, shape, options)
}

/**
 * Record type of a message type
 */
export type InferMessage<M> = M extends MessageType<infer T> ? T : never
