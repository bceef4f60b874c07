/**
 * Declaring message shapes
 *
 * A shape maps record property names to field specs. The record type of a
 * message is inferred from its shape, so the declaration is the only place
 * field numbers, labels and element types are written down.
 *
 * @example
 * ```typescript
 * const Point = message('Point', {
 *   x: field(1, types.sint32),
 *   y: field(2, types.sint32),
 *   label: optional(3, types.string),
 * })
 * type Point = InferMessage<typeof Point>
 * // { x: number; y: number; label?: string | undefined }
 * ```
 */

import type { OneofCase } from '@/fields/oneof.js'
import { EnumSerializer, enumMembers, type EnumLike } from '@/serializers/enum.js'
import * as scalars from '@/serializers/scalar.js'
import type { Serializer } from '@/serializers/serializer.js'

/**
 * Anything a field can hold: a scalar, an enum or a message type
 */
export interface TypeDescriptor<T> {
	readonly kind: 'scalar' | 'enum' | 'message'
	readonly typeName: string
	serializer(): Serializer<T>
}

/**
 * A type, or a thunk returning a message type for records that refer to
 * themselves or to types declared further down
 */
export type TypeRef<T> = TypeDescriptor<T> | (() => TypeDescriptor<T>)

export class ScalarType<T> implements TypeDescriptor<T> {
	readonly kind = 'scalar'

	constructor(
		readonly typeName: string,
		private readonly instance: Serializer<T>
	) {}

	serializer(): Serializer<T> {
		return this.instance
	}
}

export class EnumType<T extends number> implements TypeDescriptor<T> {
	readonly kind = 'enum'
	private readonly instance: EnumSerializer<T>

	constructor(
		readonly typeName: string,
		members: readonly T[]
	) {
		this.instance = new EnumSerializer(typeName, members)
	}

	serializer(): Serializer<T> {
		return this.instance
	}
}

/**
 * Scalar types.
 *
 * `int` and `uint` are conveniences for any safe integer. `int` writes negative
 * values as ten-byte two's-complement varints, like `int32` and `int64`; use
 * `sint32`/`sint64` for compact negatives.
 */
export const types = {
	bool: new ScalarType('bool', scalars.bool),
	int: new ScalarType('int', scalars.int),
	uint: new ScalarType('uint', scalars.uint),
	int32: new ScalarType('int32', scalars.int32),
	int64: new ScalarType('int64', scalars.int64),
	uint32: new ScalarType('uint32', scalars.uint32),
	uint64: new ScalarType('uint64', scalars.uint64),
	sint32: new ScalarType('sint32', scalars.sint32),
	sint64: new ScalarType('sint64', scalars.sint64),
	fixed32: new ScalarType('fixed32', scalars.fixed32),
	fixed64: new ScalarType('fixed64', scalars.fixed64),
	sfixed32: new ScalarType('sfixed32', scalars.sfixed32),
	sfixed64: new ScalarType('sfixed64', scalars.sfixed64),
	float: new ScalarType('float', scalars.float),
	double: new ScalarType('double', scalars.double),
	string: new ScalarType('string', scalars.string),
	bytes: new ScalarType('bytes', scalars.bytes),
} as const

/**
 * Use a TypeScript numeric enum as a field type
 *
 * @example
 * ```typescript
 * enum Status { Unknown = 0, Active = 1 }
 * const Account = message('Account', { status: field(1, enumType(Status, 'Status')) })
 * ```
 */
export function enumType<E extends EnumLike>(values: E, name: string = 'enum'): EnumType<Extract<E[keyof E], number>> {
	return new EnumType(
		name,
		enumMembers(values).filter((value): value is Extract<E[keyof E], number> => typeof value === 'number')
	)
}

export type FieldLabel = 'required' | 'optional' | 'repeated'

export interface FieldSpec<L extends FieldLabel, T> {
	readonly label: L
	readonly number: number
	readonly type: TypeRef<T>
	/** Repeated fields only; defaults to packing every non-length-delimited element type */
	readonly packed?: boolean
}

export type OneofArms = Record<string, FieldSpec<'required', unknown>>

export interface OneofSpec<A extends OneofArms> {
	readonly label: 'oneof'
	readonly arms: A
}

export type MemberSpec = FieldSpec<FieldLabel, unknown> | OneofSpec<OneofArms>

export type MessageShape = Record<string, MemberSpec>

/** Required singular field; always written */
export function field<T>(number: number, type: TypeRef<T>): FieldSpec<'required', T> {
	return { label: 'required', number, type }
}

/** Optional singular field; `undefined` writes nothing */
export function optional<T>(number: number, type: TypeRef<T>): FieldSpec<'optional', T> {
	return { label: 'optional', number, type }
}

export interface RepeatedOptions {
	/** Set `false` to write one tag per element even for packable types */
	packed?: boolean
}

/** Repeated field, held as an array */
export function repeated<T>(number: number, type: TypeRef<T>, options: RepeatedOptions = {}): FieldSpec<'repeated', T> {
	return { label: 'repeated', number, type, packed: options.packed }
}

/**
 * At most one of several fields, held as `{ case, value }` or `undefined`
 *
 * @example
 * ```typescript
 * const Shape = message('Shape', {
 *   kind: oneof({ circle: field(1, Circle), square: field(2, Square) }),
 * })
 * ```
 */
export function oneof<A extends OneofArms>(arms: A): OneofSpec<A> {
	return { label: 'oneof', arms }
}

type Simplify<T> = { [K in keyof T]: T[K] } & {}

export type OneofValue<A extends OneofArms> = {
	[K in keyof A & string]: OneofCase<K, InferMember<A[K]>>
}[keyof A & string]

/**
 * Property type a member spec produces
 */
export type InferMember<S> =
	S extends FieldSpec<'required', infer T>
		? T
		: S extends FieldSpec<'optional', infer T>
			? T | undefined
			: S extends FieldSpec<'repeated', infer T>
				? T[]
				: S extends OneofSpec<infer A>
					? OneofValue<A> | undefined
					: never

type OptionalKeys<S> = {
	[K in keyof S]: S[K] extends { readonly label: 'optional' | 'oneof' } ? K : never
}[keyof S]

/**
 * Record type of a shape; optional fields and oneofs become optional properties
 */
export type InferShape<S extends MessageShape> = Simplify<
	{ [K in Exclude<keyof S, OptionalKeys<S>>]: InferMember<S[K]> } & {
		[K in OptionalKeys<S>]?: InferMember<S[K]>
	}
>
