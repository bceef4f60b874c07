import { TextDecoder } from 'node:util'

import { DecodeError } from '@/errors.js'
import type { IDecoder } from '@/protocol/primitives/types.js'
import { MAX_VARINT_BYTES } from '@/protocol/primitives/varint.js'
import { isWireType, splitTag, WireType, type FieldTag } from '@/protocol/primitives/wire-type.js'

const utf8 = new TextDecoder('utf-8', { fatal: true })

function toBuffer(data: Uint8Array): Buffer {
	return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * Binary decoder for protobuf messages
 * Reads sequentially from a buffer with position tracking
 */
export class Decoder implements IDecoder {
	private readonly buffer: Buffer
	private readonly baseOffset: number
	private position: number

	/**
	 * @param data - Bytes to read; the decoder never reads past their end
	 * @param baseOffset - Offset of `data` within an enclosing buffer, used in error messages
	 */
	constructor(data: Uint8Array, baseOffset: number = 0) {
		this.buffer = toBuffer(data)
		this.baseOffset = baseOffset
		this.position = 0
	}

	/**
	 * Check that we have enough bytes remaining
	 */
	private ensureAvailable(bytes: number, what: string): void {
		if (this.position + bytes > this.buffer.length) {
			throw new DecodeError(
				`Truncated ${what}: need ${bytes} bytes but only ${this.buffer.length - this.position} remaining`,
				this.offset()
			)
		}
	}

	readUVarInt(): number {
		const start = this.offset()
		let value = 0
		let scale = 1

		for (let i = 0; i < MAX_VARINT_BYTES; i++) {
			this.ensureAvailable(1, 'varint')
			const byte = this.buffer[this.position++]!
			value += (byte & 0x7f) * scale

			if ((byte & 0x80) === 0) {
				if (value > Number.MAX_SAFE_INTEGER) {
					throw new DecodeError('Varint exceeds Number.MAX_SAFE_INTEGER', start)
				}
				return value
			}
			scale *= 0x80
		}

		throw new DecodeError(`Varint is longer than ${MAX_VARINT_BYTES} bytes`, start)
	}

	readVarint64(): bigint {
		const start = this.offset()
		let value = 0n
		let shift = 0n

		for (let i = 0; i < MAX_VARINT_BYTES; i++) {
			this.ensureAvailable(1, 'varint')
			const byte = this.buffer[this.position++]!

			// The tenth byte carries only bit 63
			if (i === MAX_VARINT_BYTES - 1 && byte > 1) {
				throw new DecodeError('Varint overflows 64 bits', start)
			}

			value |= BigInt(byte & 0x7f) << shift
			if ((byte & 0x80) === 0) {
				return value
			}
			shift += 7n
		}

		throw new DecodeError(`Varint is longer than ${MAX_VARINT_BYTES} bytes`, start)
	}

	readFixed32(): number {
		this.ensureAvailable(4, 'fixed32')
		const value = this.buffer.readUInt32LE(this.position)
		this.position += 4
		return value
	}

	readSFixed32(): number {
		this.ensureAvailable(4, 'sfixed32')
		const value = this.buffer.readInt32LE(this.position)
		this.position += 4
		return value
	}

	readFixed64(): bigint {
		this.ensureAvailable(8, 'fixed64')
		const value = this.buffer.readBigUInt64LE(this.position)
		this.position += 8
		return value
	}

	readSFixed64(): bigint {
		this.ensureAvailable(8, 'sfixed64')
		const value = this.buffer.readBigInt64LE(this.position)
		this.position += 8
		return value
	}

	readFloat(): number {
		this.ensureAvailable(4, 'float')
		const value = this.buffer.readFloatLE(this.position)
		this.position += 4
		return value
	}

	readDouble(): number {
		this.ensureAvailable(8, 'double')
		const value = this.buffer.readDoubleLE(this.position)
		this.position += 8
		return value
	}

	readTag(): FieldTag {
		const start = this.offset()
		const { fieldNumber, wireType } = splitTag(this.readUVarInt())

		if (fieldNumber === 0) {
			throw new DecodeError('Invalid field number 0', start)
		}
		if (!isWireType(wireType)) {
			throw new DecodeError(`Unsupported wire type ${wireType} for field ${fieldNumber}`, start)
		}
		return { fieldNumber, wireType }
	}

	readLengthDelimited(): Buffer {
		const length = this.readUVarInt()
		this.ensureAvailable(length, 'length-delimited payload')
		const value = this.buffer.subarray(this.position, this.position + length)
		this.position += length
		return value
	}

	readString(): string {
		const bytes = this.readLengthDelimited()
		try {
			return utf8.decode(bytes)
		} catch {
			throw new DecodeError('Invalid UTF-8 in string payload', this.offset() - bytes.length)
		}
	}

	readDelimited(): Decoder {
		const length = this.readUVarInt()
		this.ensureAvailable(length, 'length-delimited payload')
		const child = new Decoder(this.buffer.subarray(this.position, this.position + length), this.offset())
		this.position += length
		return child
	}

	skipField(wireType: WireType): void {
		switch (wireType) {
			case WireType.Varint:
				this.readVarint64()
				break
			case WireType.Fixed64:
				this.skip(8)
				break
			case WireType.LengthDelimited:
				this.skip(this.readUVarInt())
				break
			case WireType.Fixed32:
				this.skip(4)
				break
		}
	}

	remaining(): number {
		return this.buffer.length - this.position
	}

	offset(): number {
		return this.baseOffset + this.position
	}

	skip(length: number): void {
		this.ensureAvailable(length, 'field')
		this.position += length
	}
}
