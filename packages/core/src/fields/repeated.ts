import { ValidationError } from '@/errors.js'
import { Field } from '@/fields/field.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import { PackingSerializer } from '@/serializers/packing.js'
import { describeValue, ownedValue, type DecodeContext, type Serializer } from '@/serializers/serializer.js'

/**
 * Shared decode, validate and merge rules of both repeated variants.
 *
 * Reading accepts either representation for packable element types: a packed
 * block appends all of its elements, a single element appends one. The
 * variants differ only in what they write.
 */
export abstract class RepeatedField<T> extends Field<T[]> {
	/** Present when the element type can be packed */
	protected readonly packing?: PackingSerializer<T>

	constructor(
		number: number,
		name: string,
		readonly serializer: Serializer<T>
	) {
		super(number, name)
		if (serializer.wireType !== WireType.LengthDelimited) {
			this.packing = new PackingSerializer(serializer)
		}
	}

	loadAndMerge(decoder: IDecoder, wireType: WireType, current: T[], context: DecodeContext): T[] {
		if (wireType === this.serializer.wireType) {
			current.push(this.serializer.load(decoder, context))
			return current
		}
		if (wireType === WireType.LengthDelimited && this.packing) {
			for (const value of this.packing.load(decoder, context)) {
				current.push(value)
			}
			return current
		}
		throw this.unexpectedWireType(wireType, decoder)
	}

	validate(value: unknown): void {
		if (!Array.isArray(value)) {
			throw new ValidationError(`expected an array, got ${describeValue(value)}`, [this.name])
		}
		value.forEach((item: unknown, index) => {
			this.withPath(() => {
				try {
					this.serializer.validate(item)
				} catch (error) {
					throw error instanceof ValidationError ? error.within(`[${index}]`) : error
				}
			})
		})
	}

	merge(current: T[], incoming: T[]): T[] {
		return [...current, ...incoming.map(element => ownedValue(this.serializer, element))]
	}

	defaultValue(): T[] {
		return []
	}
}

/**
 * Repeated scalar written as one length-delimited block of untagged elements.
 * An empty sequence writes nothing.
 */
export class PackedRepeatedField<T> extends RepeatedField<T> {
	private readonly packer: PackingSerializer<T>

	constructor(number: number, name: string, serializer: Serializer<T>) {
		super(number, name, serializer)
		// Throws for length-delimited element types
		this.packer = this.packing ?? new PackingSerializer(serializer)
	}

	dump(values: T[], encoder: IEncoder): void {
		if (values.length === 0) {
			return
		}
		encoder.writeTag(this.number, WireType.LengthDelimited)
		this.packer.dump(values, encoder)
	}
}

/**
 * Repeated field written as one tag and payload per element, in order
 */
export class UnpackedRepeatedField<T> extends RepeatedField<T> {
	dump(values: T[], encoder: IEncoder): void {
		for (const value of values) {
			encoder.writeTag(this.number, this.serializer.wireType)
			this.serializer.dump(value, encoder)
		}
	}
}
