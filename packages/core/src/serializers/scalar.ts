/**
 * Scalar serializers
 *
 * One shared instance per scalar kind. 32-bit and smaller integers are
 * JavaScript numbers, 64-bit integers are bigints.
 */

import { DecodeError, ValidationError } from '@/errors.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import {
	INT32_MAX,
	INT32_MIN,
	INT64_MAX,
	INT64_MIN,
	toSigned64,
	toUnsigned64,
	UINT32_MAX,
	UINT64_MAX,
	zigZagDecode64,
	zigZagEncode32,
	zigZagEncode64,
} from '@/protocol/primitives/varint.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import { describeValue, type DecodeContext, type Serializer } from '@/serializers/serializer.js'

/**
 * Integer held in a JavaScript number.
 * `read` may return a bigint for varint kinds; it is range-checked before
 * narrowing so oversized wire values are rejected instead of truncated.
 */
export class IntegerSerializer implements Serializer<number> {
	constructor(
		readonly typeName: string,
		readonly wireType: WireType,
		private readonly min: number,
		private readonly max: number,
		private readonly write: (encoder: IEncoder, value: number) => void,
		private readonly read: (decoder: IDecoder) => number | bigint
	) {}

	validate(value: unknown): void {
		if (typeof value !== 'number' || !Number.isInteger(value) || value < this.min || value > this.max) {
			throw new ValidationError(
				`expected ${this.typeName} in [${this.min}, ${this.max}], got ${describeValue(value)}`
			)
		}
	}

	dump(value: number, encoder: IEncoder): void {
		this.write(encoder, value)
	}

	load(decoder: IDecoder, _context: DecodeContext): number {
		const start = decoder.offset()
		const raw = this.read(decoder)
		const inRange =
			typeof raw === 'bigint'
				? raw >= BigInt(this.min) && raw <= BigInt(this.max)
				: raw >= this.min && raw <= this.max
		if (!inRange) {
			throw new DecodeError(`${this.typeName} value ${raw} is out of range`, start)
		}
		return Number(raw)
	}

	defaultValue(): number {
		return 0
	}
}

/**
 * 64-bit integer held in a bigint
 */
export class BigIntegerSerializer implements Serializer<bigint> {
	constructor(
		readonly typeName: string,
		readonly wireType: WireType,
		private readonly min: bigint,
		private readonly max: bigint,
		private readonly write: (encoder: IEncoder, value: bigint) => void,
		private readonly read: (decoder: IDecoder) => bigint
	) {}

	validate(value: unknown): void {
		if (typeof value !== 'bigint' || value < this.min || value > this.max) {
			throw new ValidationError(
				`expected ${this.typeName} in [${this.min}, ${this.max}], got ${describeValue(value)}`
			)
		}
	}

	dump(value: bigint, encoder: IEncoder): void {
		this.write(encoder, value)
	}

	load(decoder: IDecoder, _context: DecodeContext): bigint {
		return this.read(decoder)
	}

	defaultValue(): bigint {
		return 0n
	}
}

export class BooleanSerializer implements Serializer<boolean> {
	readonly typeName = 'bool'
	readonly wireType = WireType.Varint

	validate(value: unknown): void {
		if (typeof value !== 'boolean') {
			throw new ValidationError(`expected a boolean, got ${describeValue(value)}`)
		}
	}

	dump(value: boolean, encoder: IEncoder): void {
		encoder.writeUVarInt(value ? 1 : 0)
	}

	load(decoder: IDecoder, _context: DecodeContext): boolean {
		return decoder.readVarint64() !== 0n
	}

	defaultValue(): boolean {
		return false
	}
}

/**
 * IEEE 754 single or double precision
 */
export class FloatingPointSerializer implements Serializer<number> {
	readonly wireType: WireType

	constructor(readonly typeName: 'float' | 'double') {
		this.wireType = typeName === 'float' ? WireType.Fixed32 : WireType.Fixed64
	}

	validate(value: unknown): void {
		if (typeof value !== 'number') {
			throw new ValidationError(`expected a number, got ${describeValue(value)}`)
		}
	}

	dump(value: number, encoder: IEncoder): void {
		if (this.typeName === 'float') {
			encoder.writeFloat(value)
		} else {
			encoder.writeDouble(value)
		}
	}

	load(decoder: IDecoder, _context: DecodeContext): number {
		return this.typeName === 'float' ? decoder.readFloat() : decoder.readDouble()
	}

	defaultValue(): number {
		return 0
	}
}

export class BytesSerializer implements Serializer<Uint8Array> {
	readonly typeName = 'bytes'
	readonly wireType = WireType.LengthDelimited

	validate(value: unknown): void {
		if (!(value instanceof Uint8Array)) {
			throw new ValidationError(`expected bytes, got ${describeValue(value)}`)
		}
	}

	dump(value: Uint8Array, encoder: IEncoder): void {
		encoder.writeLengthDelimited(value)
	}

	load(decoder: IDecoder, _context: DecodeContext): Uint8Array {
		// Copy so the record does not alias the input buffer
		return Buffer.from(decoder.readLengthDelimited())
	}

	defaultValue(): Uint8Array {
		return Buffer.alloc(0)
	}
}

// High surrogate not followed by a low one, or low surrogate not preceded by a high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/

export class StringSerializer implements Serializer<string> {
	readonly typeName = 'string'
	readonly wireType = WireType.LengthDelimited

	validate(value: unknown): void {
		if (typeof value !== 'string') {
			throw new ValidationError(`expected a string, got ${describeValue(value)}`)
		}
		if (LONE_SURROGATE.test(value)) {
			throw new ValidationError('expected a well-formed string, got a lone surrogate')
		}
	}

	dump(value: string, encoder: IEncoder): void {
		encoder.writeString(value)
	}

	load(decoder: IDecoder, _context: DecodeContext): string {
		return decoder.readString()
	}

	defaultValue(): string {
		return ''
	}
}

/** Two's-complement varint; negative values take ten bytes */
function writeSignedVarint(encoder: IEncoder, value: number): void {
	if (value >= 0) {
		encoder.writeUVarInt(value)
	} else {
		encoder.writeVarint64(toUnsigned64(BigInt(value)))
	}
}

function readSignedVarint(decoder: IDecoder): bigint {
	return toSigned64(decoder.readVarint64())
}

export const bool = new BooleanSerializer()

/** Plain signed integer (any safe integer), two's-complement varint */
export const int = new IntegerSerializer(
	'int',
	WireType.Varint,
	Number.MIN_SAFE_INTEGER,
	Number.MAX_SAFE_INTEGER,
	writeSignedVarint,
	readSignedVarint
)

/** Plain unsigned integer (any non-negative safe integer) */
export const uint = new IntegerSerializer(
	'uint',
	WireType.Varint,
	0,
	Number.MAX_SAFE_INTEGER,
	(encoder, value) => encoder.writeUVarInt(value),
	decoder => decoder.readVarint64()
)

export const int32 = new IntegerSerializer('int32', WireType.Varint, INT32_MIN, INT32_MAX, writeSignedVarint, readSignedVarint)

export const uint32 = new IntegerSerializer(
	'uint32',
	WireType.Varint,
	0,
	UINT32_MAX,
	(encoder, value) => encoder.writeUVarInt(value),
	decoder => decoder.readVarint64()
)

export const sint32 = new IntegerSerializer(
	'sint32',
	WireType.Varint,
	INT32_MIN,
	INT32_MAX,
	(encoder, value) => encoder.writeUVarInt(zigZagEncode32(value)),
	// 64-bit zigzag so oversized payloads decode out of range instead of wrapping
	decoder => zigZagDecode64(decoder.readVarint64())
)

export const fixed32 = new IntegerSerializer(
	'fixed32',
	WireType.Fixed32,
	0,
	UINT32_MAX,
	(encoder, value) => encoder.writeFixed32(value),
	decoder => decoder.readFixed32()
)

export const sfixed32 = new IntegerSerializer(
	'sfixed32',
	WireType.Fixed32,
	INT32_MIN,
	INT32_MAX,
	(encoder, value) => encoder.writeSFixed32(value),
	decoder => decoder.readSFixed32()
)

export const int64 = new BigIntegerSerializer(
	'int64',
	WireType.Varint,
	INT64_MIN,
	INT64_MAX,
	(encoder, value) => encoder.writeVarint64(toUnsigned64(value)),
	readSignedVarint
)

export const uint64 = new BigIntegerSerializer(
	'uint64',
	WireType.Varint,
	0n,
	UINT64_MAX,
	(encoder, value) => encoder.writeVarint64(value),
	decoder => decoder.readVarint64()
)

export const sint64 = new BigIntegerSerializer(
	'sint64',
	WireType.Varint,
	INT64_MIN,
	INT64_MAX,
	(encoder, value) => encoder.writeVarint64(zigZagEncode64(value)),
	decoder => zigZagDecode64(decoder.readVarint64())
)

export const fixed64 = new BigIntegerSerializer(
	'fixed64',
	WireType.Fixed64,
	0n,
	UINT64_MAX,
	(encoder, value) => encoder.writeFixed64(value),
	decoder => decoder.readFixed64()
)

export const sfixed64 = new BigIntegerSerializer(
	'sfixed64',
	WireType.Fixed64,
	INT64_MIN,
	INT64_MAX,
	(encoder, value) => encoder.writeSFixed64(value),
	decoder => decoder.readSFixed64()
)

export const float = new FloatingPointSerializer('float')
export const double = new FloatingPointSerializer('double')
export const bytes = new BytesSerializer()
export const string = new StringSerializer()
