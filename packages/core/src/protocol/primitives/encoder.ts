import type { IEncoder } from '@/protocol/primitives/types.js'
import { makeTag, type WireType } from '@/protocol/primitives/wire-type.js'
import { MAX_VARINT_BYTES } from '@/protocol/primitives/varint.js'

/**
 * Return the next power of 2 >= value
 */
function nextPowerOfTwo(value: number): number {
	if (value <= 0) return 1
	value--
	value |= value >> 1
	value |= value >> 2
	value |= value >> 4
	value |= value >> 8
	value |= value >> 16
	return value + 1
}

/**
 * Binary encoder for protobuf messages
 * Uses dynamic buffer expansion with power-of-2 growth
 */
export class Encoder implements IEncoder {
	private buffer: Buffer
	private position: number

	constructor(initialSize: number = 256) {
		this.buffer = Buffer.allocUnsafe(nextPowerOfTwo(initialSize))
		this.position = 0
	}

	/**
	 * Ensure the buffer has space for the specified number of bytes
	 */
	private ensureCapacity(bytes: number): void {
		const required = this.position + bytes
		if (required > this.buffer.length) {
			const newBuffer = Buffer.allocUnsafe(nextPowerOfTwo(required))
			this.buffer.copy(newBuffer, 0, 0, this.position)
			this.buffer = newBuffer
		}
	}

	writeUVarInt(value: number): this {
		if (!Number.isSafeInteger(value) || value < 0) {
			throw new RangeError(`UVARINT cannot encode ${value}`)
		}

		this.ensureCapacity(MAX_VARINT_BYTES)

		// Division instead of >>> so values above 2^32 survive
		while (value > 0x7f) {
			this.buffer[this.position++] = (value % 0x80) | 0x80
			value = Math.floor(value / 0x80)
		}
		this.buffer[this.position++] = value
		return this
	}

	writeVarint64(value: bigint): this {
		if (value < 0n || value > 0xffffffffffffffffn) {
			throw new RangeError(`64-bit varint cannot encode ${value}`)
		}

		this.ensureCapacity(MAX_VARINT_BYTES)

		while (value > 0x7fn) {
			this.buffer[this.position++] = Number(value & 0x7fn) | 0x80
			value >>= 7n
		}
		this.buffer[this.position++] = Number(value)
		return this
	}

	writeFixed32(value: number): this {
		this.ensureCapacity(4)
		this.buffer.writeUInt32LE(value, this.position)
		this.position += 4
		return this
	}

	writeSFixed32(value: number): this {
		this.ensureCapacity(4)
		this.buffer.writeInt32LE(value, this.position)
		this.position += 4
		return this
	}

	writeFixed64(value: bigint): this {
		this.ensureCapacity(8)
		this.buffer.writeBigUInt64LE(value, this.position)
		this.position += 8
		return this
	}

	writeSFixed64(value: bigint): this {
		this.ensureCapacity(8)
		this.buffer.writeBigInt64LE(value, this.position)
		this.position += 8
		return this
	}

	writeFloat(value: number): this {
		this.ensureCapacity(4)
		this.buffer.writeFloatLE(value, this.position)
		this.position += 4
		return this
	}

	writeDouble(value: number): this {
		this.ensureCapacity(8)
		this.buffer.writeDoubleLE(value, this.position)
		this.position += 8
		return this
	}

	writeTag(fieldNumber: number, wireType: WireType): this {
		return this.writeUVarInt(makeTag(fieldNumber, wireType))
	}

	writeLengthDelimited(value: Uint8Array): this {
		this.writeUVarInt(value.length)
		return this.writeRaw(value)
	}

	writeString(value: string): this {
		return this.writeLengthDelimited(Buffer.from(value, 'utf-8'))
	}

	writeDelimited(writeBody: (encoder: IEncoder) => void): this {
		const body = new Encoder(64)
		writeBody(body)
		return this.writeLengthDelimited(body.toBuffer())
	}

	writeRaw(data: Uint8Array): this {
		this.ensureCapacity(data.length)
		this.buffer.set(data, this.position)
		this.position += data.length
		return this
	}

	toBuffer(): Buffer {
		return this.buffer.subarray(0, this.position)
	}

	size(): number {
		return this.position
	}
}
