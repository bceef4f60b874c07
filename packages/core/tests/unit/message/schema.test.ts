import { describe, expect, it } from 'vitest'

import { SchemaError, TypeMappingError } from '@/errors.js'
import { message } from '@/message/message-type.js'
import { enumType, field, oneof, optional, repeated, types } from '@/message/shape.js'

enum Suit {
	Hearts = 1,
	Spades = 2,
}

describe('message registration', () => {
	it.each([0, -1, 1.5, 2 ** 29])('rejects field number %d', number => {
		expect(() => message('Bad', { a: field(number, types.uint32) })).toThrow(
			`Bad: field 'a' has invalid number ${number}`
		)
	})

	it('accepts the largest field number', () => {
		const Wide = message('Wide', { a: field(2 ** 29 - 1, types.bool) })
		expect(Wide.encode({ a: true }).toString('hex')).toBe('f8ffffff0f01')
		expect(Wide.decode(Buffer.from('f8ffffff0f01', 'hex'))).toEqual({ a: true })
	})

	it('rejects duplicate field numbers', () => {
		expect(() =>
			message('Dup', {
				a: field(1, types.uint32),
				b: optional(1, types.string),
			})
		).toThrow("Dup: field number 1 is used by both 'a' and 'b'")
	})

	it('counts oneof arms towards duplicates', () => {
		expect(() =>
			message('Dup', {
				a: field(1, types.uint32),
				choice: oneof({ b: field(1, types.string) }),
			})
		).toThrow("Dup: field number 1 is used by both 'a' and 'choice.b'")
	})

	it('rejects an empty oneof', () => {
		expect(() => message('Bad', { choice: oneof({}) })).toThrow(SchemaError)
	})

	it('rejects packing a length-delimited element type', () => {
		expect(() => message('Bad', { names: repeated(1, types.string, { packed: true }) })).toThrow(
			"Bad: field 'names' has a length-delimited element type and cannot be packed"
		)
	})

	it('uses the package in schema errors', () => {
		expect(() => message('Bad', { a: field(0, types.bool) }, { package: 'pkg' })).toThrow(
			"pkg.Bad: field 'a' has invalid number 0"
		)
	})

	it('rejects element types without a serializer', () => {
		expect(() => message('Bad', { pair: field(1, JSON.parse('{"kind":"tuple"}')) })).toThrow(
			"type of 'pair' is not serializable: expected a scalar type, an enum type or a message type"
		)
	})

	it('rejects repeated-of-repeated element types', () => {
		expect(() => message('Bad', { matrix: repeated(1, JSON.parse('{"label":"repeated","number":2}')) })).toThrow(
			"type of 'matrix' is not serializable: a repeated field spec cannot be an element type"
		)
	})

	it('rejects a type thunk that does not return a message type', () => {
		const Bad = message('Bad', { values: repeated(1, () => types.uint32) })
		expect(() => Bad.encode({ values: [1] })).toThrow(TypeMappingError)
	})

	it('rejects enums without numeric members', () => {
		expect(() => enumType({}, 'Empty')).toThrow("type of 'Empty' is not serializable: enum declares no numeric members")
	})
})

describe('enum fields', () => {
	const Card = message('Card', {
		suit: field(1, enumType(Suit, 'Suit')),
		previous: repeated(2, enumType(Suit, 'Suit')),
	})

	it('defaults to the first member when 0 is not one', () => {
		expect(Card.create()).toEqual({ suit: Suit.Hearts, previous: [] })
	})

	it('packs repeated enums', () => {
		const encoded = Card.encode({ suit: Suit.Spades, previous: [Suit.Hearts, Suit.Spades] })
		expect(encoded.toString('hex')).toBe('0802' + '12020102')
		expect(Card.decode(encoded)).toEqual({ suit: Suit.Spades, previous: [Suit.Hearts, Suit.Spades] })
	})

	it('rejects unknown members on both sides', () => {
		expect(() => Card.validate({ suit: 3, previous: [] })).toThrow('suit: 3 is not a member of enum Suit')
		expect(() => Card.decode(Buffer.from('0803', 'hex'))).toThrow('3 is not a member of enum Suit (at offset 1)')
	})
})
