// Message types and schema builder
export { message, MessageType, TYPE_URL_PREFIX, type InferMessage, type MessageOptions } from '@/message/message-type.js'
export {
	enumType,
	EnumType,
	field,
	oneof,
	optional,
	repeated,
	ScalarType,
	types,
	type FieldLabel,
	type FieldSpec,
	type InferMember,
	type InferShape,
	type MemberSpec,
	type MessageShape,
	type OneofArms,
	type OneofSpec,
	type OneofValue,
	type RepeatedOptions,
	type TypeDescriptor,
	type TypeRef,
} from '@/message/shape.js'
export type { FieldBinding } from '@/message/derive.js'

// Codec facade
export { messageCodec, ProtoCodec, type Codec } from '@/codec.js'
export {
	DEFAULT_MAX_DEPTH,
	DEFAULT_MAX_FRAME_BYTES,
	type CodecConfig,
	type DecodeOptions,
	type StreamConfig,
} from '@/config.js'

// Streams
export { DelimitedFrameDecoder, type DelimitedFrameDecoderOptions } from '@/stream/delimited-frame-decoder.js'
export { MessageStreamDecoder } from '@/stream/message-stream-decoder.js'

// Fields
export { Field, type Member } from '@/fields/field.js'
export { NonRepeatedField } from '@/fields/non-repeated.js'
export { OneofGroup, type OneofCase } from '@/fields/oneof.js'
export { PackedRepeatedField, RepeatedField, UnpackedRepeatedField } from '@/fields/repeated.js'

// Serializers and wire primitives
export * from '@/serializers/index.js'
export * from '@/protocol/primitives/index.js'

// Errors
export { DecodeError, ProtowireError, SchemaError, TypeMappingError, ValidationError } from '@/errors.js'

// Logger
export { createLogger, noopLogger, type Logger, type LogLevel } from '@/logger.js'
