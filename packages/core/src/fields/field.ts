import { DecodeError, ValidationError } from '@/errors.js'
import { Encoder } from '@/protocol/primitives/encoder.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import type { DecodeContext } from '@/serializers/serializer.js'

/**
 * A record property as the message engine sees it: validated, merged and
 * defaulted by name. Fields are members; so is a oneof group.
 */
export interface Member {
	readonly name: string
	validate(value: unknown): void
	merge(current: unknown, incoming: unknown): unknown
	defaultValue(): unknown
}

/**
 * One named, numbered attribute of a message type.
 * Variants differ in how they handle repetition.
 */
export abstract class Field<V> implements Member {
	constructor(
		readonly number: number,
		readonly name: string
	) {}

	/** Write tag(s) and payload(s) for `value`; writes nothing when there is nothing to send */
	abstract dump(value: V, encoder: IEncoder): void

	/**
	 * Read one wire occurrence of this field (the tag is already consumed) and
	 * combine it with the value read so far.
	 */
	abstract loadAndMerge(decoder: IDecoder, wireType: WireType, current: V, context: DecodeContext): V

	abstract validate(value: unknown): void

	/** Combine `current` with `incoming` the way a repeated wire occurrence would */
	abstract merge(current: V, incoming: V): V

	abstract defaultValue(): V

	/**
	 * Validate and encode this field on its own
	 */
	encode(value: V): Buffer {
		this.validate(value)
		const encoder = new Encoder()
		this.dump(value, encoder)
		return encoder.toBuffer()
	}

	/**
	 * Run a validation step, prefixing any ValidationError with this field's name
	 */
	protected withPath(validate: () => void): void {
		try {
			validate()
		} catch (error) {
			throw error instanceof ValidationError ? error.within(this.name) : error
		}
	}

	protected unexpectedWireType(wireType: WireType, decoder: IDecoder): DecodeError {
		return new DecodeError(
			`Field ${this.number} (${this.name}) cannot be read from wire type ${WireType[wireType]}`,
			decoder.offset()
		)
	}
}
