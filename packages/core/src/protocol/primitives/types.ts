import type { FieldTag, WireType } from '@/protocol/primitives/wire-type.js'

/**
 * Binary encoder for the protobuf wire format.
 * All write methods return `this` for fluent chaining.
 */
export interface IEncoder {
	// Varints
	writeUVarInt(value: number): this // unsigned, up to Number.MAX_SAFE_INTEGER
	writeVarint64(value: bigint): this // unsigned 64-bit bit pattern

	// Fixed-width (little-endian)
	writeFixed32(value: number): this
	writeSFixed32(value: number): this
	writeFixed64(value: bigint): this
	writeSFixed64(value: bigint): this
	writeFloat(value: number): this // IEEE 754 single
	writeDouble(value: number): this // IEEE 754 double

	// Framing
	writeTag(fieldNumber: number, wireType: WireType): this
	writeLengthDelimited(value: Uint8Array): this // UVARINT length + bytes
	writeString(value: string): this // UVARINT length + UTF-8
	writeDelimited(writeBody: (encoder: IEncoder) => void): this // body built in a child encoder, then length-prefixed

	// Raw bytes and buffer management
	writeRaw(data: Uint8Array): this
	toBuffer(): Buffer
	size(): number
}

/**
 * Binary decoder for the protobuf wire format.
 * Every read either consumes exactly its value or throws a DecodeError.
 */
export interface IDecoder {
	// Varints
	readUVarInt(): number
	readVarint64(): bigint

	// Fixed-width (little-endian)
	readFixed32(): number
	readSFixed32(): number
	readFixed64(): bigint
	readSFixed64(): bigint
	readFloat(): number
	readDouble(): number

	// Framing
	readTag(): FieldTag
	readLengthDelimited(): Buffer
	readString(): string
	readDelimited(): IDecoder // bounded child decoder over the next length-delimited payload
	skipField(wireType: WireType): void

	// Position
	remaining(): number
	offset(): number // absolute offset, including the parent's when this is a child decoder
	skip(length: number): void
}
