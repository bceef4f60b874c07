export { EnumSerializer, enumMembers, type EnumLike } from '@/serializers/enum.js'
export { LazySerializer } from '@/serializers/lazy.js'
export { MessageSerializer, type EmbeddedMessage } from '@/serializers/message.js'
export { PackingSerializer } from '@/serializers/packing.js'
export * as scalars from '@/serializers/scalar.js'
export {
	BigIntegerSerializer,
	BooleanSerializer,
	BytesSerializer,
	FloatingPointSerializer,
	IntegerSerializer,
	StringSerializer,
} from '@/serializers/scalar.js'
export { describeValue, isRecord, type DecodeContext, type Serializer } from '@/serializers/serializer.js'
