/**
 * Error Handling Utilities
 *
 * Maps errors to CLI exit codes
 */

import {
	ConfigError,
	DatasetParseError,
	DatasetReadError,
	InvalidQueryError,
} from '../domain/shared/errors/domain.error';
import { Logger } from '../observability/logger';
import { UsageError } from './args';

export interface CliFailure {
	exitCode: number;
	code: string;
	message: string;
}

export const EXIT_CODES = {
	internal: 1,
	usage: 2,
	invalidQuery: 3,
	dataset: 4,
} as const;

export function handleError(error: unknown, logger?: Logger): CliFailure {
	const failure = toFailure(error);

	logger?.error('Flight search failed', error instanceof Error ? error : undefined, {
		metadata: { code: failure.code, exitCode: failure.exitCode },
	});

	return failure;
}

function toFailure(error: unknown): CliFailure {
	if (error instanceof UsageError || error instanceof ConfigError) {
		return { exitCode: EXIT_CODES.usage, code: error.code, message: error.message };
	}

	if (error instanceof InvalidQueryError) {
		return { exitCode: EXIT_CODES.invalidQuery, code: error.code, message: error.message };
	}

	if (error instanceof DatasetParseError || error instanceof DatasetReadError) {
		return { exitCode: EXIT_CODES.dataset, code: error.code, message: error.message };
	}

	// Generic error
	const detail = error instanceof Error ? error.message : String(error);
	return {
		exitCode: EXIT_CODES.internal,
		code: 'INTERNAL_ERROR',
		message: `An unexpected error occurred: ${detail}`,
	};
}
