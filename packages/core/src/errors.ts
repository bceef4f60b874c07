/**
 * Codec error hierarchy
 *
 * Validation failures happen before any byte is written, schema and type-mapping
 * failures at registration time, decode failures on malformed input.
 */

/**
 * Base class for all protowire errors
 */
export class ProtowireError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ProtowireError'

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * Render a field path, e.g. `order.lines[2].sku`
 */
function formatPath(path: readonly string[]): string {
	return path.reduce((rendered, segment) => {
		if (segment.startsWith('[') || rendered === '') {
			return rendered + segment
		}
		return `${rendered}.${segment}`
	}, '')
}

/**
 * A record or field value is outside its serializer's domain
 */
export class ValidationError extends ProtowireError {
	/** Field names (and `[index]` segments) from the outermost record down to the offending value */
	readonly path: readonly string[]

	/** The reason without the path prefix */
	readonly reason: string

	constructor(reason: string, path: readonly string[] = []) {
		super(path.length > 0 ? `${formatPath(path)}: ${reason}` : reason)
		this.name = 'ValidationError'
		this.reason = reason
		this.path = path
	}

	/**
	 * Same error, nested one level deeper under `parent`
	 */
	within(parent: string): ValidationError {
		return new ValidationError(this.reason, [parent, ...this.path])
	}
}

/**
 * A message declaration is malformed (field numbering, duplicates, packing)
 */
export class SchemaError extends ProtowireError {
	/** Name of the message type being registered */
	readonly messageName: string

	constructor(messageName: string, message: string) {
		super(`${messageName}: ${message}`)
		this.name = 'SchemaError'
		this.messageName = messageName
	}
}

/**
 * A declared attribute type has no serializer
 */
export class TypeMappingError extends ProtowireError {
	/** Field (or type) whose declared type could not be mapped */
	readonly subject: string

	constructor(subject: string, description: string) {
		super(`type of '${subject}' is not serializable: ${description}`)
		this.name = 'TypeMappingError'
		this.subject = subject
	}
}

/**
 * Wire bytes are malformed
 */
export class DecodeError extends ProtowireError {
	/** Byte offset in the buffer being read, when known */
	readonly offset?: number

	constructor(message: string, offset?: number) {
		super(offset === undefined ? message : `${message} (at offset ${offset})`)
		this.name = 'DecodeError'
		this.offset = offset
	}
}
