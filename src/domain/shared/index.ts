/**
 * Shared Kernel - Public API
 */

export {
	DomainError,
	DatasetParseError,
	DatasetReadError,
	InvalidQueryError,
	ConfigError,
} from './errors/domain.error';
