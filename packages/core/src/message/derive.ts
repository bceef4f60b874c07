/**
 * Turns a declared shape into the fields the message engine runs on.
 * Runs once per message type, when the type is registered.
 */

import { SchemaError, TypeMappingError } from '@/errors.js'
import type { Field, Member } from '@/fields/field.js'
import { NonRepeatedField } from '@/fields/non-repeated.js'
import { OneofGroup } from '@/fields/oneof.js'
import { PackedRepeatedField, UnpackedRepeatedField } from '@/fields/repeated.js'
import type { FieldLabel, FieldSpec, MessageShape, OneofArms, TypeDescriptor, TypeRef } from '@/message/shape.js'
import { MAX_FIELD_NUMBER, WireType } from '@/protocol/primitives/wire-type.js'
import { LazySerializer } from '@/serializers/lazy.js'
import { isRecord, type Serializer } from '@/serializers/serializer.js'

/**
 * A field plus how to reach its value on a record
 */
export interface FieldBinding {
	readonly field: Field<unknown>
	get(record: Record<string, unknown>): unknown
	set(record: Record<string, unknown>, value: unknown): void
}

export interface DerivedSchema {
	/** Record properties, in declaration order */
	readonly members: readonly Member[]
	/** Wire fields, in ascending field-number order */
	readonly bindings: readonly FieldBinding[]
}

function isTypeDescriptor(value: unknown): value is TypeDescriptor<unknown> {
	return (
		isRecord(value) &&
		(value.kind === 'scalar' || value.kind === 'enum' || value.kind === 'message') &&
		typeof value.serializer === 'function'
	)
}

/**
 * Find the serializer for a declared element type
 */
function resolveSerializer(subject: string, ref: TypeRef<unknown>): Serializer<unknown> {
	if (typeof ref === 'function') {
		// Only message types are lazily referenced, so the framing is known now
		return new LazySerializer(WireType.LengthDelimited, () => {
			const target: unknown = ref()
			if (!isTypeDescriptor(target) || target.kind !== 'message') {
				throw new TypeMappingError(subject, 'a type thunk must return a message type')
			}
			return target.serializer()
		})
	}

	const candidate: unknown = ref
	if (isTypeDescriptor(candidate)) {
		return candidate.serializer()
	}
	if (isRecord(candidate) && typeof candidate.label === 'string') {
		throw new TypeMappingError(subject, `a ${candidate.label} field spec cannot be an element type`)
	}
	throw new TypeMappingError(subject, 'expected a scalar type, an enum type or a message type')
}

function buildField(messageName: string, name: string, spec: FieldSpec<FieldLabel, unknown>): Field<unknown> {
	const serializer = resolveSerializer(name, spec.type)

	switch (spec.label) {
		case 'required':
			return new NonRepeatedField(spec.number, name, serializer, false)
		case 'optional':
			return new NonRepeatedField(spec.number, name, serializer, true)
		case 'repeated':
			if (serializer.wireType === WireType.LengthDelimited) {
				if (spec.packed === true) {
					throw new SchemaError(messageName, `field '${name}' has a length-delimited element type and cannot be packed`)
				}
				return new UnpackedRepeatedField(spec.number, name, serializer)
			}
			return spec.packed === false
				? new UnpackedRepeatedField(spec.number, name, serializer)
				: new PackedRepeatedField(spec.number, name, serializer)
	}
}

/**
 * Build the members and field bindings of a message type.
 *
 * Throws SchemaError for invalid or duplicate field numbers and malformed
 * oneofs, TypeMappingError for element types without a serializer.
 */
export function deriveSchema(messageName: string, shape: MessageShape): DerivedSchema {
	const members: Member[] = []
	const bindings: FieldBinding[] = []
	const claimed = new Map<number, string>()

	const claim = (number: number, path: string): void => {
		if (!Number.isInteger(number) || number < 1 || number > MAX_FIELD_NUMBER) {
			throw new SchemaError(messageName, `field '${path}' has invalid number ${number}`)
		}
		const owner = claimed.get(number)
		if (owner !== undefined) {
			throw new SchemaError(messageName, `field number ${number} is used by both '${owner}' and '${path}'`)
		}
		claimed.set(number, path)
	}

	for (const [name, spec] of Object.entries(shape)) {
		if (spec.label === 'oneof') {
			const group = buildOneof(messageName, name, spec.arms, claim)
			members.push(group)
			for (const [armName, arm] of group.arms) {
				bindings.push({
					field: arm,
					get: record => group.armValue(record[name], armName),
					set: (record, value) => {
						record[name] = { case: armName, value }
					},
				})
			}
			continue
		}

		claim(spec.number, name)
		const built = buildField(messageName, name, spec)
		members.push(built)
		bindings.push({
			field: built,
			get: record => record[name],
			set: (record, value) => {
				record[name] = value
			},
		})
	}

	bindings.sort((a, b) => a.field.number - b.field.number)
	return { members, bindings }
}

function buildOneof(
	messageName: string,
	name: string,
	arms: OneofArms,
	claim: (number: number, path: string) => void
): OneofGroup {
	const entries = Object.entries(arms)
	if (entries.length === 0) {
		throw new SchemaError(messageName, `oneof '${name}' declares no fields`)
	}

	const fields = new Map<string, NonRepeatedField<unknown>>()
	for (const [armName, arm] of entries) {
		if (arm.label !== 'required') {
			throw new SchemaError(messageName, `oneof '${name}' field '${armName}' must be declared with field()`)
		}
		claim(arm.number, `${name}.${armName}`)
		fields.set(armName, new NonRepeatedField(arm.number, armName, resolveSerializer(armName, arm.type), false))
	}
	return new OneofGroup(name, fields)
}
