import { describe, expect, it } from 'vitest'

import { DecodeError, TypeMappingError } from '@/errors.js'
import { noopLogger } from '@/logger.js'
import { Decoder } from '@/protocol/primitives/decoder.js'
import { Encoder } from '@/protocol/primitives/encoder.js'
import { EnumSerializer, enumMembers } from '@/serializers/enum.js'

enum Status {
	Unknown = 0,
	Active = 1,
	Banned = -1,
}

enum Priority {
	Low = 1,
	High = 2,
}

const context = { depth: 0, maxDepth: 100, logger: noopLogger }

describe('enumMembers', () => {
	it('drops the reverse mapping', () => {
		expect(enumMembers(Status)).toEqual([0, 1, -1])
		expect(enumMembers(Priority)).toEqual([1, 2])
	})
})

describe('EnumSerializer', () => {
	const status = new EnumSerializer<Status>('Status', enumMembers(Status))
	const priority = new EnumSerializer<Priority>('Priority', [Priority.Low, Priority.High])

	it('defaults to the zero member, else the first member', () => {
		expect(status.defaultValue()).toBe(Status.Unknown)
		expect(priority.defaultValue()).toBe(Priority.Low)
	})

	it('writes the member value as a varint', () => {
		const encoder = new Encoder()
		status.dump(Status.Active, encoder)
		status.dump(Status.Banned, encoder)

		const encoded = encoder.toBuffer()
		expect(encoded).toHaveLength(11)

		const decoder = new Decoder(encoded)
		expect(status.load(decoder, context)).toBe(Status.Active)
		expect(status.load(decoder, context)).toBe(Status.Banned)
	})

	it('rejects non-members on validate', () => {
		expect(() => priority.validate(3)).toThrow('3 is not a member of enum Priority')
		expect(() => priority.validate('Low')).toThrow('string is not a member of enum Priority')
	})

	it('rejects non-members on decode', () => {
		const decoder = new Decoder(Buffer.from([0x07]))
		expect(() => priority.load(decoder, context)).toThrow(DecodeError)
		expect(() => priority.load(new Decoder(Buffer.from([0x07])), context)).toThrow(
			'7 is not a member of enum Priority (at offset 0)'
		)
	})

	it('requires at least one member', () => {
		expect(() => new EnumSerializer('Empty', [])).toThrow(TypeMappingError)
	})
})
