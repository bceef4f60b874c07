import { ValidationError } from '@/errors.js'
import { Field } from '@/fields/field.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import type { WireType } from '@/protocol/primitives/wire-type.js'
import { ownedValue, type DecodeContext, type Serializer } from '@/serializers/serializer.js'

/**
 * Singular field. An absent value (`undefined`) writes nothing and is only
 * valid when the field is optional.
 *
 * Repeated wire occurrences follow "last one wins", except for embedded
 * messages, whose occurrences are merged.
 */
export class NonRepeatedField<T> extends Field<T | undefined> {
	constructor(
		number: number,
		name: string,
		readonly serializer: Serializer<T>,
		readonly isOptional: boolean
	) {
		super(number, name)
	}

	dump(value: T | undefined, encoder: IEncoder): void {
		if (value === undefined) {
			return
		}
		encoder.writeTag(this.number, this.serializer.wireType)
		this.serializer.dump(value, encoder)
	}

	loadAndMerge(decoder: IDecoder, wireType: WireType, current: T | undefined, context: DecodeContext): T {
		if (wireType !== this.serializer.wireType) {
			throw this.unexpectedWireType(wireType, decoder)
		}
		const incoming = this.serializer.load(decoder, context)
		return current !== undefined && this.serializer.merge ? this.serializer.merge(current, incoming) : incoming
	}

	validate(value: unknown): void {
		if (value === undefined) {
			if (!this.isOptional) {
				throw new ValidationError('required field is missing', [this.name])
			}
			return
		}
		this.withPath(() => this.serializer.validate(value))
	}

	merge(current: T | undefined, incoming: T | undefined): T | undefined {
		if (incoming === undefined) {
			return current
		}
		if (current !== undefined && this.serializer.merge) {
			return this.serializer.merge(current, incoming)
		}
		return ownedValue(this.serializer, incoming)
	}

	defaultValue(): T | undefined {
		return this.isOptional ? undefined : this.serializer.defaultValue()
	}
}
