import { describe, expect, it } from 'vitest'

import { DecodeError } from '@/errors.js'
import { message } from '@/message/message-type.js'
import { field, optional, types } from '@/message/shape.js'
import { MessageStreamDecoder } from '@/stream/message-stream-decoder.js'

const Point = message('Point', {
	x: field(1, types.sint32),
	y: field(2, types.sint32),
	label: optional(3, types.string),
})

describe('MessageStreamDecoder', () => {
	it('yields records as their frames complete', () => {
		const stream = Buffer.concat([
			Point.encodeDelimited({ x: 1, y: 2 }),
			Point.encodeDelimited({ x: -1, y: 0, label: 'p' }),
		])
		expect(stream.toString('hex')).toBe('0408021004' + '07080110001a0170')

		const decoder = new MessageStreamDecoder(Point)

		expect(decoder.push(stream.subarray(0, 3))).toEqual([])
		expect(decoder.push(stream.subarray(3, 7))).toEqual([{ x: 1, y: 2 }])
		expect(decoder.push(stream.subarray(7))).toEqual([{ x: -1, y: 0, label: 'p' }])
		expect(decoder.count).toBe(2)
		expect(() => decoder.finish()).not.toThrow()
	})

	it('rethrows decode failures of a complete frame', () => {
		const decoder = new MessageStreamDecoder(Point)
		expect(() => decoder.push(Buffer.from([0x01, 0x08]))).toThrow(DecodeError)
	})

	it('returns records decoded before a failing frame and keeps the ones after it', () => {
		const good = Point.encodeDelimited({ x: 1, y: 2 })
		const bad = Buffer.from([0x01, 0x08])
		const later = Point.encodeDelimited({ x: 0, y: 0 })
		const decoder = new MessageStreamDecoder(Point)

		expect(decoder.push(Buffer.concat([good, bad, later]))).toEqual([{ x: 1, y: 2 }])
		expect(decoder.count).toBe(1)

		expect(() => decoder.push(Buffer.alloc(0))).toThrow(DecodeError)
		expect(decoder.push(Buffer.alloc(0))).toEqual([{ x: 0, y: 0 }])
		expect(decoder.count).toBe(2)
		expect(() => decoder.finish()).not.toThrow()
	})

	it('throws a deferred failure from finish', () => {
		const decoder = new MessageStreamDecoder(Point)
		decoder.push(Buffer.concat([Point.encodeDelimited({ x: 1, y: 1 }), Buffer.from([0x01, 0x08])]))
		expect(() => decoder.finish()).toThrow(DecodeError)
		expect(() => decoder.finish()).not.toThrow()
	})

	it('keeps frames after a failing first frame', () => {
		const decoder = new MessageStreamDecoder(Point)
		const chunk = Buffer.concat([Buffer.from([0x01, 0x08]), Point.encodeDelimited({ x: 3, y: 4 })])

		expect(() => decoder.push(chunk)).toThrow(DecodeError)
		expect(decoder.push(Buffer.alloc(0))).toEqual([{ x: 3, y: 4 }])
	})

	it('applies maxFrameBytes', () => {
		const decoder = new MessageStreamDecoder(Point, { maxFrameBytes: 2 })
		expect(() => decoder.push(Point.encodeDelimited({ x: 1, y: 1 }))).toThrow(
			'Frame of 4 bytes exceeds maxFrameBytes 2'
		)
	})

	it('reset clears the count', () => {
		const decoder = new MessageStreamDecoder(Point)
		decoder.push(Point.encodeDelimited({ x: 0, y: 0 }))
		decoder.reset()
		expect(decoder.count).toBe(0)
	})
})
