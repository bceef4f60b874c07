/**
 * Varint helpers
 *
 * UVARINT: unsigned LEB128, 7 data bits per byte, MSB set while more bytes follow
 * ZigZag: maps signed to unsigned so small magnitudes stay short,
 *   0 -> 0, -1 -> 1, 1 -> 2, -2 -> 3, ...
 */

/** A 64-bit value never needs more than ceil(64 / 7) bytes */
export const MAX_VARINT_BYTES = 10

export const INT32_MIN = -0x80000000
export const INT32_MAX = 0x7fffffff
export const UINT32_MAX = 0xffffffff
export const INT64_MIN = -(1n << 63n)
export const INT64_MAX = (1n << 63n) - 1n
export const UINT64_MAX = (1n << 64n) - 1n

/**
 * ZigZag encode a 32-bit signed integer, returned as an unsigned 32-bit number
 */
export function zigZagEncode32(value: number): number {
	return ((value << 1) ^ (value >> 31)) >>> 0
}

/**
 * ZigZag encode a 64-bit signed bigint to unsigned
 */
export function zigZagEncode64(value: bigint): bigint {
	return BigInt.asUintN(64, (value << 1n) ^ (value >> 63n))
}

/**
 * ZigZag decode an unsigned 64-bit bigint back to signed
 */
export function zigZagDecode64(value: bigint): bigint {
	return (value >> 1n) ^ -(value & 1n)
}

/**
 * Two's-complement bit pattern of a signed 64-bit value, as written by the
 * plain signed varint (negative values always take ten bytes)
 */
export function toUnsigned64(value: bigint): bigint {
	return BigInt.asUintN(64, value)
}

/**
 * Reinterpret an unsigned 64-bit bit pattern as signed
 */
export function toSigned64(value: bigint): bigint {
	return BigInt.asIntN(64, value)
}
