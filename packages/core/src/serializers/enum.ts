import { DecodeError, TypeMappingError, ValidationError } from '@/errors.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { toSigned64, toUnsigned64 } from '@/protocol/primitives/varint.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import { describeValue, type DecodeContext, type Serializer } from '@/serializers/serializer.js'

/**
 * Object shape of a TypeScript numeric enum, reverse mapping included
 */
export type EnumLike = Record<string, string | number>

/**
 * Numeric member values of an enum object, in declaration order
 */
export function enumMembers(values: EnumLike): number[] {
	return Object.keys(values)
		.filter(key => Number.isNaN(Number(key)))
		.map(key => values[key])
		.filter((value): value is number => typeof value === 'number')
}

/**
 * Integer-backed enumeration, written as a signed varint of the member value
 */
export class EnumSerializer<T extends number> implements Serializer<T> {
	readonly wireType = WireType.Varint
	private readonly members: ReadonlySet<number>
	private readonly zero: T

	/**
	 * @param members - Declared member values; the first is the default unless 0 is a member
	 */
	constructor(
		readonly typeName: string,
		members: readonly T[]
	) {
		const first = members[0]
		if (first === undefined) {
			throw new TypeMappingError(typeName, 'enum declares no numeric members')
		}
		this.members = new Set(members)
		this.zero = members.find(member => member === 0) ?? first
	}

	private isMember(value: unknown): value is T {
		return typeof value === 'number' && this.members.has(value)
	}

	validate(value: unknown): void {
		if (!this.isMember(value)) {
			throw new ValidationError(`${describeValue(value)} is not a member of enum ${this.typeName}`)
		}
	}

	dump(value: T, encoder: IEncoder): void {
		encoder.writeVarint64(toUnsigned64(BigInt(value)))
	}

	load(decoder: IDecoder, _context: DecodeContext): T {
		const start = decoder.offset()
		const value = Number(toSigned64(decoder.readVarint64()))
		if (!this.isMember(value)) {
			throw new DecodeError(`${value} is not a member of enum ${this.typeName}`, start)
		}
		return value
	}

	defaultValue(): T {
		return this.zero
	}
}
