import { TypeMappingError, ValidationError } from '@/errors.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import { describeValue, type DecodeContext, type Serializer } from '@/serializers/serializer.js'

/**
 * Writes a sequence of scalars as one length-delimited block, elements back to
 * back with no per-element tag.
 */
export class PackingSerializer<T> implements Serializer<T[]> {
	readonly wireType = WireType.LengthDelimited

	constructor(private readonly element: Serializer<T>) {
		if (element.wireType === WireType.LengthDelimited) {
			throw new TypeMappingError(element.typeName, 'length-delimited elements cannot be packed')
		}
	}

	get typeName(): string {
		return `packed ${this.element.typeName}`
	}

	validate(value: unknown): void {
		if (!Array.isArray(value)) {
			throw new ValidationError(`expected an array, got ${describeValue(value)}`)
		}
		value.forEach((item: unknown, index) => {
			try {
				this.element.validate(item)
			} catch (error) {
				throw error instanceof ValidationError ? error.within(`[${index}]`) : error
			}
		})
	}

	dump(values: T[], encoder: IEncoder): void {
		encoder.writeDelimited(body => {
			for (const value of values) {
				this.element.dump(value, body)
			}
		})
	}

	load(decoder: IDecoder, context: DecodeContext): T[] {
		const block = decoder.readDelimited()
		const values: T[] = []
		while (block.remaining() > 0) {
			values.push(this.element.load(block, context))
		}
		return values
	}

	defaultValue(): T[] {
		return []
	}
}
