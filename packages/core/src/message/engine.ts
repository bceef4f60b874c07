import { ValidationError } from '@/errors.js'
import type { FieldBinding, DerivedSchema } from '@/message/derive.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import { WireType } from '@/protocol/primitives/wire-type.js'
import { describeValue, isRecord, type DecodeContext } from '@/serializers/serializer.js'

/**
 * Whole-record encode, decode and merge over untyped records.
 *
 * Bindings are ordered by field number, which fixes the output order. Decode
 * is driven by the tags on the wire, so the input may be in any order and may
 * repeat a field; unknown field numbers are skipped.
 */
export class MessageEngine {
	private readonly byNumber: ReadonlyMap<number, FieldBinding>

	constructor(
		readonly fullName: string,
		private readonly schema: DerivedSchema
	) {
		this.byNumber = new Map(schema.bindings.map((binding): [number, FieldBinding] => [binding.field.number, binding]))
	}

	get bindings(): readonly FieldBinding[] {
		return this.schema.bindings
	}

	/**
	 * A record with every member at its default; absent members are left unset
	 */
	create(): Record<string, unknown> {
		const record: Record<string, unknown> = {}
		for (const member of this.schema.members) {
			const value = member.defaultValue()
			if (value !== undefined) {
				record[member.name] = value
			}
		}
		return record
	}

	/**
	 * Narrow `value` to a record without checking its members
	 */
	recordOf(value: unknown): Record<string, unknown> {
		if (!isRecord(value)) {
			throw new ValidationError(`expected a ${this.fullName} record, got ${describeValue(value)}`)
		}
		return value
	}

	/**
	 * Narrow `value` to a record of this type, checking every member
	 */
	validate(value: unknown): Record<string, unknown> {
		const record = this.recordOf(value)
		for (const member of this.schema.members) {
			member.validate(record[member.name])
		}
		return record
	}

	/**
	 * Write every field in field-number order; `record` must already be valid
	 */
	dump(record: Record<string, unknown>, encoder: IEncoder): void {
		for (const binding of this.schema.bindings) {
			binding.field.dump(binding.get(record), encoder)
		}
	}

	/**
	 * Read fields until `decoder` is exhausted
	 */
	load(decoder: IDecoder, context: DecodeContext): Record<string, unknown> {
		const record = this.create()

		while (decoder.remaining() > 0) {
			const { fieldNumber, wireType } = decoder.readTag()
			const binding = this.byNumber.get(fieldNumber)

			if (!binding) {
				context.logger.debug('skipping unknown field', {
					messageType: this.fullName,
					fieldNumber,
					wireType: WireType[wireType],
					offset: decoder.offset(),
				})
				decoder.skipField(wireType)
				continue
			}

			binding.set(record, binding.field.loadAndMerge(decoder, wireType, binding.get(record), context))
		}

		return record
	}

	/**
	 * Apply every member's merge rule, writing the result into `target`
	 */
	merge(target: Record<string, unknown>, source: Record<string, unknown>): void {
		for (const member of this.schema.members) {
			const merged = member.merge(target[member.name], source[member.name])
			if (merged !== undefined) {
				target[member.name] = merged
			}
		}
	}
}
