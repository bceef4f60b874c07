import { DecodeError, ValidationError } from '@/errors.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import { describeValue, isRecord, type DecodeContext, type Serializer } from '@/serializers/serializer.js'

/**
 * What the embedded-message serializer needs from a message type
 */
export interface EmbeddedMessage<T> {
	readonly fullName: string

	/** Validate every field of `record`; errors carry the field path */
	validate(record: Record<string, unknown>): void

	/** Write fields without validating; the outermost encode has already validated */
	writeFields(record: T, encoder: IEncoder): void

	/** Read fields until `decoder` is exhausted */
	readFields(decoder: IDecoder, context: DecodeContext): T

	merge(target: T, source: T): T
	create(): T
}

/**
 * Embedded message, framed as a length-delimited block
 */
export class MessageSerializer<T> implements Serializer<T> {
	readonly wireType = WireType.LengthDelimited

	constructor(private readonly message: EmbeddedMessage<T>) {}

	get typeName(): string {
		return this.message.fullName
	}

	validate(value: unknown): void {
		if (!isRecord(value)) {
			throw new ValidationError(`expected a ${this.message.fullName} record, got ${describeValue(value)}`)
		}
		this.message.validate(value)
	}

	dump(value: T, encoder: IEncoder): void {
		encoder.writeDelimited(body => this.message.writeFields(value, body))
	}

	load(decoder: IDecoder, context: DecodeContext): T {
		if (context.depth >= context.maxDepth) {
			throw new DecodeError(
				`${this.message.fullName} is nested deeper than maxDepth ${context.maxDepth}`,
				decoder.offset()
			)
		}
		return this.message.readFields(decoder.readDelimited(), { ...context, depth: context.depth + 1 })
	}

	merge(current: T, incoming: T): T {
		return this.message.merge(current, incoming)
	}

	defaultValue(): T {
		return this.message.create()
	}
}
