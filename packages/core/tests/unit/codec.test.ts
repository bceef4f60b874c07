import { afterEach, describe, expect, it, vi } from 'vitest'

import { messageCodec, ProtoCodec } from '@/codec.js'
import { DecodeError } from '@/errors.js'
import { message } from '@/message/message-type.js'
import { field, optional, repeated, types } from '@/message/shape.js'

const Event = message('Event', {
	id: field(1, types.uint64),
	name: field(2, types.string),
	labels: repeated(3, types.string),
	retries: optional(4, types.uint32),
})

function parseLine(line: unknown): Record<string, unknown> {
	return JSON.parse(String(line)) as Record<string, unknown>
}

describe('ProtoCodec', () => {
	afterEach(() => {
		vi.restoreAllMocks()
	})

	it('encodes and decodes records', () => {
		const codec = new ProtoCodec()
		const record = { id: 7n, name: 'created', labels: ['a', 'b'], retries: 2 }
		const encoded = codec.encode(Event, record)

		expect(encoded.toString('hex')).toBe('0807' + '1207637265617465' + '64' + '1a0161' + '1a0162' + '2002')
		expect(codec.decode(Event, encoded)).toEqual(record)
	})

	it('merges into the target', () => {
		const codec = new ProtoCodec()
		const target = Event.create({ name: 'a', labels: ['x'] })
		const merged = codec.merge(Event, target, Event.create({ id: 3n, labels: ['y'] }))

		expect(merged).toBe(target)
		expect(merged).toEqual({ id: 3n, name: '', labels: ['x', 'y'] })
	})

	it('applies maxDepth', () => {
		const Leaf = message('Leaf', { value: field(1, types.bool) })
		const Branch = message('Branch', { leaf: field(1, Leaf) })
		const encoded = Branch.encode({ leaf: { value: true } })

		expect(new ProtoCodec().decode(Branch, encoded)).toEqual({ leaf: { value: true } })
		expect(() => new ProtoCodec({ maxDepth: 0 }).decode(Branch, encoded)).toThrow(
			'Leaf is nested deeper than maxDepth 0 (at offset 1)'
		)
	})

	it('rejects an invalid maxDepth', () => {
		expect(() => new ProtoCodec({ maxDepth: -1 })).toThrow('maxDepth must be a non-negative integer, got -1')
		expect(() => new ProtoCodec({ maxDepth: 1.5 })).toThrow(RangeError)
	})

	it('logs skipped fields and decoded records at debug', () => {
		const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
		const codec = new ProtoCodec({ logLevel: 'debug' })

		codec.decode(Event, Buffer.from('0801' + '6001', 'hex'))

		expect(spy).toHaveBeenCalledTimes(2)
		const skipped = parseLine(spy.mock.calls[0]?.[0])
		expect(skipped).toMatchObject({
			level: 'debug',
			message: 'skipping unknown field',
			component: 'protowire',
			messageType: 'Event',
			fieldNumber: 12,
			wireType: 'Varint',
			offset: 3,
		})
		const decoded = parseLine(spy.mock.calls[1]?.[0])
		expect(decoded).toMatchObject({ message: 'decoded record', messageType: 'Event', size: 4 })
	})

	it('logs a warning and rethrows when decoding fails', () => {
		const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
		const codec = new ProtoCodec({ logLevel: 'warn' })

		expect(() => codec.decode(Event, Buffer.from([0x08]))).toThrow(DecodeError)
		expect(spy).toHaveBeenCalledTimes(1)
		expect(parseLine(spy.mock.calls[0]?.[0])).toMatchObject({
			level: 'warn',
			message: 'failed to decode record',
			messageType: 'Event',
			size: 1,
			error: 'Truncated varint: need 1 bytes but only 0 remaining (at offset 1)',
		})
	})

	it('logs nothing by default', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {})
		const error = vi.spyOn(console, 'error').mockImplementation(() => {})
		const codec = new ProtoCodec()

		codec.decode(Event, Buffer.from('6001', 'hex'))
		expect(() => codec.decode(Event, Buffer.from([0x08]))).toThrow(DecodeError)

		expect(log).not.toHaveBeenCalled()
		expect(error).not.toHaveBeenCalled()
	})
})

describe('messageCodec', () => {
	it('adapts a message type to Codec', () => {
		const codec = messageCodec(Event)
		const encoded = codec.encode({ id: 1n, name: '', labels: [] })

		expect(encoded.toString('hex')).toBe('08011200')
		expect(codec.decode(encoded)).toEqual({ id: 1n, name: '', labels: [] })
	})
})
