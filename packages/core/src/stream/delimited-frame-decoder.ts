/**
 * Incremental decoder for varint-delimited streams.
 *
 * Framing:
 * - unsigned varint length prefix (payload length, excludes the prefix)
 * - payload bytes
 *
 * Received chunks are queued and only copied when a frame spans more than one
 * of them. A zero length prefix is a valid empty frame.
 */

import { DEFAULT_MAX_FRAME_BYTES, resolveLimit } from '@/config.js'
import { DecodeError } from '@/errors.js'
import { MAX_VARINT_BYTES } from '@/protocol/primitives/varint.js'

export interface DelimitedFrameDecoderOptions {
	/** Largest accepted payload in bytes (default: 64 MiB) */
	maxFrameBytes?: number
}

interface LengthPrefix {
	length: number
	size: number
}

export class DelimitedFrameDecoder {
	private readonly maxFrameBytes: number
	private readonly buffers: Buffer[] = []
	private bufferOffset = 0 // Offset within buffers[0]
	private availableBytes = 0 // Total bytes available across buffers (from bufferOffset)
	private expectedLength: number | undefined // undefined means "need length prefix"
	private consumed = 0 // Bytes consumed since the last reset, for error offsets

	constructor(options: DelimitedFrameDecoderOptions = {}) {
		this.maxFrameBytes = resolveLimit('maxFrameBytes', options.maxFrameBytes, DEFAULT_MAX_FRAME_BYTES)
	}

	/**
	 * Bytes received but not yet returned as part of a frame
	 */
	get pendingBytes(): number {
		return this.availableBytes
	}

	/**
	 * Push a new chunk and return any complete payloads extracted.
	 *
	 * Frames read before a malformed or oversized prefix are returned; the
	 * prefix stays queued, so the next push or finish throws for it.
	 */
	push(chunk: Uint8Array): Buffer[] {
		this.write(chunk)

		const frames: Buffer[] = []
		try {
			for (let frame = this.next(); frame !== undefined; frame = this.next()) {
				frames.push(frame)
			}
		} catch (error) {
			if (frames.length === 0) {
				throw error
			}
		}
		return frames
	}

	/**
	 * Queue a chunk without extracting frames
	 */
	write(chunk: Uint8Array): void {
		if (chunk.length === 0) return

		this.buffers.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength))
		this.availableBytes += chunk.length
	}

	/**
	 * Extract the next complete payload, or undefined while it is still incomplete.
	 * A failing prefix is left in the queue.
	 */
	next(): Buffer | undefined {
		// Need length prefix
		if (this.expectedLength === undefined) {
			const prefix = this.peekLengthPrefix()
			if (!prefix) {
				return undefined
			}

			if (prefix.length > this.maxFrameBytes) {
				throw new DecodeError(
					`Frame of ${prefix.length} bytes exceeds maxFrameBytes ${this.maxFrameBytes}`,
					this.consumed
				)
			}

			this.consumeBytes(prefix.size)
			this.expectedLength = prefix.length
		}

		// Need full payload
		if (this.availableBytes < this.expectedLength) {
			return undefined
		}

		const frame = this.consumeBytes(this.expectedLength)
		this.expectedLength = undefined
		return frame
	}

	/**
	 * Signal end of input; throws if a frame was left incomplete
	 */
	finish(): void {
		if (this.availableBytes > 0 || this.expectedLength !== undefined) {
			// Rethrows for a queued malformed prefix
			if (this.next() !== undefined) {
				throw new DecodeError('Stream ended with an unread frame', this.consumed)
			}
			const missing = this.expectedLength === undefined ? 'length prefix' : `${this.expectedLength}-byte frame`
			throw new DecodeError(`Stream ended inside a ${missing}`, this.consumed)
		}
	}

	reset(): void {
		this.buffers.length = 0
		this.bufferOffset = 0
		this.availableBytes = 0
		this.expectedLength = undefined
		this.consumed = 0
	}

	/**
	 * Read the varint at the head of the queue without consuming it.
	 * Returns undefined while the varint is still incomplete.
	 */
	private peekLengthPrefix(): LengthPrefix | undefined {
		let length = 0
		let scale = 1
		let size = 0

		for (let i = 0; i < this.buffers.length; i++) {
			const buf = this.buffers[i]!
			for (let j = i === 0 ? this.bufferOffset : 0; j < buf.length; j++) {
				const byte = buf[j]!
				length += (byte & 0x7f) * scale
				size++

				if ((byte & 0x80) === 0) {
					return { length, size }
				}
				if (size === MAX_VARINT_BYTES) {
					throw new DecodeError(`Length prefix is longer than ${MAX_VARINT_BYTES} bytes`, this.consumed)
				}
				scale *= 0x80
			}
		}

		return undefined
	}

	private consumeBytes(length: number): Buffer {
		this.consumed += length

		if (length === 0) {
			return Buffer.alloc(0)
		}

		const first = this.buffers[0]!
		const availableInFirst = first.length - this.bufferOffset

		if (length <= availableInFirst) {
			const start = this.bufferOffset
			const end = start + length
			const slice = first.subarray(start, end)

			this.bufferOffset = end
			this.availableBytes -= length

			if (this.bufferOffset === first.length) {
				this.buffers.shift()
				this.bufferOffset = 0
			}

			return slice
		}

		const out = Buffer.allocUnsafe(length)
		let copied = 0

		while (copied < length) {
			const buf = this.buffers[0]!
			const start = this.bufferOffset
			const available = buf.length - start
			const toCopy = Math.min(length - copied, available)
			buf.copy(out, copied, start, start + toCopy)
			copied += toCopy

			this.bufferOffset += toCopy
			this.availableBytes -= toCopy

			if (this.bufferOffset === buf.length) {
				this.buffers.shift()
				this.bufferOffset = 0
			}
		}

		return out
	}
}
