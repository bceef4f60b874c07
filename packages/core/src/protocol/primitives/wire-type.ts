/**
 * Wire types and field tags
 *
 * A tag is the unsigned varint `(fieldNumber << 3) | wireType` written before
 * every field payload.
 */

/**
 * Payload framing selected by the low three bits of a tag.
 * Group framing (3 and 4) is not supported.
 */
export enum WireType {
	/** Unsigned LEB128 varint */
	Varint = 0,
	/** 8 bytes, little-endian */
	Fixed64 = 1,
	/** Varint length followed by that many bytes */
	LengthDelimited = 2,
	/** 4 bytes, little-endian */
	Fixed32 = 5,
}

/**
 * Field number and wire type parsed from a tag
 */
export interface FieldTag {
	fieldNumber: number
	wireType: WireType
}

/** Largest field number the format allows (2^29 - 1) */
export const MAX_FIELD_NUMBER = 0x1fffffff

/**
 * Narrow a raw three-bit value to a supported wire type
 */
export function isWireType(value: number): value is WireType {
	return (
		value === WireType.Varint ||
		value === WireType.Fixed64 ||
		value === WireType.LengthDelimited ||
		value === WireType.Fixed32
	)
}

/**
 * Compute the numeric tag for a field.
 * Multiplication keeps field numbers above 2^28 out of sign-bit trouble.
 */
export function makeTag(fieldNumber: number, wireType: WireType): number {
	return fieldNumber * 8 + wireType
}

/**
 * Split a numeric tag into its field number and raw wire type bits
 */
export function splitTag(tag: number): { fieldNumber: number; wireType: number } {
	return {
		fieldNumber: Math.floor(tag / 8),
		wireType: tag % 8,
	}
}
