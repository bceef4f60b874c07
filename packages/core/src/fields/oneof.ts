import { ValidationError } from '@/errors.js'
import type { Member } from '@/fields/field.js'
import type { NonRepeatedField } from '@/fields/non-repeated.js'
import { describeValue, isRecord } from '@/serializers/serializer.js'

/**
 * Value of a oneof property: the selected arm and its payload
 */
export interface OneofCase<K extends string = string, V = unknown> {
	readonly case: K
	readonly value: V
}

/**
 * Alternative fields stored as one tagged-union property.
 *
 * Each arm is a required singular field with its own number. Only the
 * selected arm is ever written, and reading any arm replaces the selection.
 */
export class OneofGroup implements Member {
	constructor(
		readonly name: string,
		readonly arms: ReadonlyMap<string, NonRepeatedField<unknown>>
	) {}

	/**
	 * Payload of `arm` if it is the selected case
	 */
	armValue(value: unknown, arm: string): unknown {
		return isRecord(value) && value.case === arm ? value.value : undefined
	}

	validate(value: unknown): void {
		if (value === undefined) {
			return
		}
		if (!isRecord(value) || typeof value.case !== 'string') {
			throw new ValidationError(`expected { case, value } or undefined, got ${describeValue(value)}`, [this.name])
		}
		const arm = this.arms.get(value.case)
		if (!arm) {
			throw new ValidationError(`unknown case '${value.case}'`, [this.name])
		}
		try {
			arm.validate(value.value)
		} catch (error) {
			throw error instanceof ValidationError ? error.within(this.name) : error
		}
	}

	merge(current: unknown, incoming: unknown): unknown {
		if (!isRecord(incoming) || typeof incoming.case !== 'string') {
			return current
		}
		const arm = this.arms.get(incoming.case)
		if (!arm) {
			return current
		}
		const base = isRecord(current) && current.case === incoming.case ? current.value : undefined
		return { case: incoming.case, value: arm.merge(base, incoming.value) }
	}

	defaultValue(): undefined {
		return undefined
	}
}
