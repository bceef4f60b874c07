import { describe, expect, it } from 'vitest'

import { DecodeError } from '@/errors.js'
import { Decoder } from '@/protocol/primitives/decoder.js'
import { Encoder } from '@/protocol/primitives/encoder.js'
import { UINT64_MAX } from '@/protocol/primitives/varint.js'
import { WireType } from '@/protocol/primitives/wire-type.js'

function bytes(...values: number[]): Buffer {
	return Buffer.from(values)
}

describe('Encoder', () => {
	it('writes unsigned varints', () => {
		expect(new Encoder().writeUVarInt(0).toBuffer()).toEqual(bytes(0x00))
		expect(new Encoder().writeUVarInt(150).toBuffer()).toEqual(bytes(0x96, 0x01))
		expect(new Encoder().writeUVarInt(300).toBuffer()).toEqual(bytes(0xac, 0x02))
	})

	it('writes values above 2^32 without truncating', () => {
		const encoded = new Encoder().writeUVarInt(2 ** 35).toBuffer()
		expect(encoded).toEqual(bytes(0x80, 0x80, 0x80, 0x80, 0x80, 0x01))
		expect(new Decoder(encoded).readUVarInt()).toBe(2 ** 35)
	})

	it('rejects values a UVARINT cannot hold', () => {
		expect(() => new Encoder().writeUVarInt(-1)).toThrow(RangeError)
		expect(() => new Encoder().writeUVarInt(1.5)).toThrow(RangeError)
		expect(() => new Encoder().writeVarint64(-1n)).toThrow(RangeError)
		expect(() => new Encoder().writeVarint64(UINT64_MAX + 1n)).toThrow(RangeError)
	})

	it('writes the largest 64-bit varint in ten bytes', () => {
		const encoded = new Encoder().writeVarint64(UINT64_MAX).toBuffer()
		expect(encoded).toEqual(bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01))
	})

	it('writes fixed-width values little-endian', () => {
		const encoded = new Encoder()
			.writeFixed32(1)
			.writeSFixed32(-2)
			.writeFixed64(0x0102030405060708n)
			.writeFloat(1.5)
			.writeDouble(1)
			.toBuffer()

		expect(encoded).toEqual(
			bytes(
				0x01, 0x00, 0x00, 0x00,
				0xfe, 0xff, 0xff, 0xff,
				0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01,
				0x00, 0x00, 0xc0, 0x3f,
				0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xf0, 0x3f
			)
		)
	})

	it('writes tags, strings and delimited bodies', () => {
		const encoded = new Encoder()
			.writeTag(1, WireType.Varint)
			.writeTag(2, WireType.LengthDelimited)
			.writeString('hi')
			.writeDelimited(body => body.writeUVarInt(150))
			.toBuffer()

		expect(encoded).toEqual(bytes(0x08, 0x12, 0x02, 0x68, 0x69, 0x02, 0x96, 0x01))
	})

	it('grows past its initial size', () => {
		const encoder = new Encoder(1)
		encoder.writeRaw(Buffer.alloc(300, 7))
		encoder.writeUVarInt(1)
		expect(encoder.size()).toBe(301)
		expect(encoder.toBuffer()[299]).toBe(7)
		expect(encoder.toBuffer()[300]).toBe(1)
	})
})

describe('Decoder', () => {
	it('reads the largest 64-bit varint', () => {
		const decoder = new Decoder(bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x01))
		expect(decoder.readVarint64()).toBe(UINT64_MAX)
		expect(decoder.remaining()).toBe(0)
	})

	it('rejects a tenth varint byte above 1', () => {
		const decoder = new Decoder(bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x02))
		expect(() => decoder.readVarint64()).toThrow('Varint overflows 64 bits (at offset 0)')
	})

	it('rejects varints longer than ten bytes', () => {
		const decoder = new Decoder(bytes(0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x00))
		expect(() => decoder.readUVarInt()).toThrow('Varint is longer than 10 bytes (at offset 0)')
	})

	it('rejects unsigned varints above the safe integer range', () => {
		const decoder = new Decoder(bytes(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x7f))
		expect(() => decoder.readUVarInt()).toThrow('Varint exceeds Number.MAX_SAFE_INTEGER')
	})

	it('rejects truncated varints', () => {
		expect(() => new Decoder(bytes(0x96)).readUVarInt()).toThrow(
			'Truncated varint: need 1 bytes but only 0 remaining (at offset 1)'
		)
	})

	it('rejects truncated fixed-width values', () => {
		expect(() => new Decoder(bytes(0x01, 0x02)).readFixed32()).toThrow(
			'Truncated fixed32: need 4 bytes but only 2 remaining (at offset 0)'
		)
		expect(() => new Decoder(bytes(0x01)).readDouble()).toThrow(DecodeError)
	})

	it('rejects a length prefix longer than the input', () => {
		expect(() => new Decoder(bytes(0x05, 0x01)).readLengthDelimited()).toThrow(
			'Truncated length-delimited payload: need 5 bytes but only 1 remaining (at offset 1)'
		)
	})

	it('reads fixed-width values little-endian', () => {
		const decoder = new Decoder(bytes(0xfe, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff))
		expect(decoder.readSFixed32()).toBe(-2)
		expect(decoder.readSFixed64()).toBe(-1n)
	})

	it('reads tags', () => {
		expect(new Decoder(bytes(0x12)).readTag()).toEqual({ fieldNumber: 2, wireType: WireType.LengthDelimited })
	})

	it('rejects field number 0', () => {
		expect(() => new Decoder(bytes(0x00)).readTag()).toThrow('Invalid field number 0 (at offset 0)')
	})

	it('rejects group wire types', () => {
		expect(() => new Decoder(bytes(0x0b)).readTag()).toThrow('Unsupported wire type 3 for field 1 (at offset 0)')
		expect(() => new Decoder(bytes(0x0c)).readTag()).toThrow('Unsupported wire type 4 for field 1 (at offset 0)')
	})

	it('bounds a delimited child decoder and reports absolute offsets', () => {
		const decoder = new Decoder(bytes(0x03, 0x01, 0x02, 0x03, 0x09))
		const child = decoder.readDelimited()

		expect(child.offset()).toBe(1)
		expect(child.remaining()).toBe(3)
		expect(child.readUVarInt()).toBe(1)
		expect(child.offset()).toBe(2)
		expect(decoder.remaining()).toBe(1)
		expect(decoder.readUVarInt()).toBe(9)
	})

	it('reports errors inside a child decoder at their absolute offset', () => {
		const child = new Decoder(bytes(0x02, 0x96, 0x96)).readDelimited()

		try {
			child.readUVarInt()
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(DecodeError)
			expect(error).toHaveProperty('offset', 3)
		}
	})

	it('skips each wire type', () => {
		const decoder = new Decoder(
			bytes(
				0x96, 0x01,
				0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08,
				0x02, 0xaa, 0xbb,
				0x01, 0x02, 0x03, 0x04,
				0x2a
			)
		)
		decoder.skipField(WireType.Varint)
		decoder.skipField(WireType.Fixed64)
		decoder.skipField(WireType.LengthDelimited)
		decoder.skipField(WireType.Fixed32)
		expect(decoder.readUVarInt()).toBe(42)
	})

	it('accepts a plain Uint8Array', () => {
		const decoder = new Decoder(new Uint8Array([0x02, 0x68, 0x69]))
		expect(decoder.readString()).toBe('hi')
	})
})
