import type { Logger } from '@/logger.js'
import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import type { WireType } from '@/protocol/primitives/wire-type.js'

/**
 * Per-call decode state threaded through nested message loads
 */
export interface DecodeContext {
	/** Number of enclosing messages currently open */
	readonly depth: number
	/** Nesting level at which decoding fails */
	readonly maxDepth: number
	readonly logger: Logger
}

/**
 * Encodes and decodes one kind of value.
 *
 * Serializers are stateless and shared by every field that uses them. A
 * serializer never writes a tag; framing of the value itself (fixed width,
 * varint or length prefix) is its concern.
 */
export interface Serializer<T> {
	/** Framing used for a single value; fixed for the serializer's lifetime */
	readonly wireType: WireType

	/** Type name used in error messages */
	readonly typeName: string

	/**
	 * Throws a ValidationError when `value` is not representable.
	 * The error carries no path; fields add their own name.
	 */
	validate(value: unknown): void

	dump(value: T, encoder: IEncoder): void
	load(decoder: IDecoder, context: DecodeContext): T

	/** Value a freshly created record holds for a required field */
	defaultValue(): T

	/**
	 * Combine two values of a singular field seen twice. Absent means the
	 * incoming value replaces the current one.
	 */
	merge?(current: T, incoming: T): T
}

/**
 * Value of `incoming` that shares no mutable state with it. Embedded messages
 * are rebuilt by merging into a fresh default; other values are immutable.
 */
export function ownedValue<T>(serializer: Serializer<T>, incoming: T): T {
	return serializer.merge ? serializer.merge(serializer.defaultValue(), incoming) : incoming
}

/**
 * Short description of a value for error messages
 */
export function describeValue(value: unknown): string {
	if (value === null) return 'null'
	if (Array.isArray(value)) return 'array'
	if (value instanceof Uint8Array) return 'bytes'
	switch (typeof value) {
		case 'number':
		case 'boolean':
			return String(value)
		case 'bigint':
			return `${value}n`
		default:
			return typeof value
	}
}

/**
 * Narrow an unknown value to an indexable record
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array)
}
