import type { IDecoder, IEncoder } from '@/protocol/primitives/types.js'
import type { WireType } from '@/protocol/primitives/wire-type.js'
import type { DecodeContext, Serializer } from '@/serializers/serializer.js'

/**
 * Defers resolving a serializer until first use, so a message type can refer
 * to itself or to a type declared later. The wire type must be known up front.
 */
export class LazySerializer<T> implements Serializer<T> {
	private resolved?: Serializer<T>

	constructor(
		readonly wireType: WireType,
		private readonly resolve: () => Serializer<T>
	) {}

	private get target(): Serializer<T> {
		this.resolved ??= this.resolve()
		return this.resolved
	}

	get typeName(): string {
		return this.target.typeName
	}

	validate(value: unknown): void {
		this.target.validate(value)
	}

	dump(value: T, encoder: IEncoder): void {
		this.target.dump(value, encoder)
	}

	load(decoder: IDecoder, context: DecodeContext): T {
		return this.target.load(decoder, context)
	}

	merge(current: T, incoming: T): T {
		const { target } = this
		return target.merge ? target.merge(current, incoming) : incoming
	}

	defaultValue(): T {
		return this.target.defaultValue()
	}
}
