/**
 * Codec configuration
 */

import type { Logger, LogLevel } from '@/logger.js'

/** Default cap on embedded-message nesting while decoding */
export const DEFAULT_MAX_DEPTH = 100

/** Default cap on a single length-prefixed frame in a message stream (64 MiB) */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024 * 1024

/**
 * Options for a single decode call
 */
export interface DecodeOptions {
	/** Maximum embedded-message nesting below the top-level record (default: 100) */
	maxDepth?: number

	/** Logger for decode diagnostics such as skipped unknown fields (default: no-op) */
	logger?: Logger
}

/**
 * Codec configuration
 */
export interface CodecConfig {
	/** Maximum embedded-message nesting below the top-level record (default: 100) */
	maxDepth?: number

	/** Logger instance (optional, defaults to no-op) */
	logger?: Logger

	/** Log level when using default logger (default: no logging) */
	logLevel?: LogLevel
}

/**
 * Stream decoding configuration
 */
export interface StreamConfig extends CodecConfig {
	/** Largest accepted frame payload in bytes (default: 64 MiB) */
	maxFrameBytes?: number
}

/**
 * Check a count option, falling back to its default when unset
 */
export function resolveLimit(name: string, value: number | undefined, fallback: number): number {
	const resolved = value ?? fallback
	if (!Number.isSafeInteger(resolved) || resolved < 0) {
		throw new RangeError(`${name} must be a non-negative integer, got ${resolved}`)
	}
	return resolved
}
