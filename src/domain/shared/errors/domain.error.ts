/**
 * Domain Errors
 *
 * Error taxonomy shared by every layer. Each error carries a stable `code`
 * that the CLI error handler maps to an exit status.
 */

export class DomainError extends Error {
	constructor(
		message: string,
		public readonly code: string,
	) {
		super(message);
		this.name = 'DomainError';
	}
}

/**
 * Malformed dataset content. `line` is the 1-based file line the record starts on.
 */
export class DatasetParseError extends DomainError {
	constructor(
		detail: string,
		public readonly line: number,
		public readonly field?: string,
	) {
		super(`Line ${line}${field ? ` (${field})` : ''}: ${detail}`, 'DATASET_PARSE_ERROR');
		this.name = 'DatasetParseError';
	}
}

export class DatasetReadError extends DomainError {
	constructor(
		public readonly path: string,
		cause: string,
	) {
		super(`Unable to read flight dataset at ${path}: ${cause}`, 'DATASET_READ_ERROR');
		this.name = 'DatasetReadError';
	}
}

export class InvalidQueryError extends DomainError {
	constructor(message: string) {
		super(message, 'INVALID_QUERY');
		this.name = 'InvalidQueryError';
	}
}

export class ConfigError extends DomainError {
	constructor(message: string) {
		super(message, 'CONFIG_ERROR');
		this.name = 'ConfigError';
	}
}
