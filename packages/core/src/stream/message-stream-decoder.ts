/**
 * Decodes a chunked stream of length-prefixed records of one message type,
 * as written by `MessageType.encodeDelimited`.
 */

import { DEFAULT_MAX_DEPTH, resolveLimit, type StreamConfig } from '@/config.js'
import { resolveLogger, type Logger } from '@/logger.js'
import type { MessageType } from '@/message/message-type.js'
import { DelimitedFrameDecoder } from '@/stream/delimited-frame-decoder.js'

export class MessageStreamDecoder<T> {
	private readonly frames: DelimitedFrameDecoder
	private readonly maxDepth: number
	private readonly logger: Logger
	private decodedCount = 0
	private deferredError?: Error

	constructor(
		private readonly type: MessageType<T>,
		config: StreamConfig = {}
	) {
		this.frames = new DelimitedFrameDecoder({ maxFrameBytes: config.maxFrameBytes })
		this.maxDepth = resolveLimit('maxDepth', config.maxDepth, DEFAULT_MAX_DEPTH)
		this.logger = resolveLogger(config, { component: 'protowire-stream', messageType: type.fullName })
	}

	/** Records decoded since construction or the last reset */
	get count(): number {
		return this.decodedCount
	}

	/**
	 * Push a chunk and return the records it completes, in stream order.
	 *
	 * When a frame fails after other records were decoded from the same chunk,
	 * those records are returned and the failure is thrown by the next push or
	 * finish. Frames after the failing one stay queued.
	 */
	push(chunk: Uint8Array): T[] {
		this.frames.write(chunk)
		this.throwDeferred()

		const records: T[] = []
		try {
			for (let frame = this.frames.next(); frame !== undefined; frame = this.frames.next()) {
				records.push(this.decodeFrame(frame))
			}
		} catch (error) {
			if (records.length === 0 || !(error instanceof Error)) {
				throw error
			}
			this.deferredError = error
		}
		if (records.length > 0) {
			this.logger.debug('decoded streamed records', { count: records.length, total: this.decodedCount })
		}
		return records
	}

	/**
	 * Signal end of input; throws if a record was left incomplete
	 */
	finish(): void {
		this.throwDeferred()
		this.frames.finish()
	}

	reset(): void {
		this.frames.reset()
		this.decodedCount = 0
		this.deferredError = undefined
	}

	private decodeFrame(frame: Buffer): T {
		try {
			const record = this.type.decode(frame, { maxDepth: this.maxDepth, logger: this.logger })
			this.decodedCount++
			return record
		} catch (error) {
			this.logger.warn('failed to decode streamed record', {
				index: this.decodedCount,
				size: frame.length,
				error: error instanceof Error ? error.message : String(error),
			})
			throw error
		}
	}

	private throwDeferred(): void {
		const error = this.deferredError
		if (error) {
			this.deferredError = undefined
			throw error
		}
	}
}
