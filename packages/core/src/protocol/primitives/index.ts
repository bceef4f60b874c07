export { Decoder } from '@/protocol/primitives/decoder.js'
export { Encoder } from '@/protocol/primitives/encoder.js'
export type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
export {
	INT32_MAX,
	INT32_MIN,
	INT64_MAX,
	INT64_MIN,
	MAX_VARINT_BYTES,
	UINT32_MAX,
	UINT64_MAX,
	toSigned64,
	toUnsigned64,
	zigZagDecode64,
	zigZagEncode32,
	zigZagEncode64,
} from '@/protocol/primitives/varint.js'
export { MAX_FIELD_NUMBER, WireType, isWireType, makeTag, splitTag, type FieldTag } from '@/protocol/primitives/wire-type.js'
