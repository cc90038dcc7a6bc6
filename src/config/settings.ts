/**
 * Configuration Settings
 *
 * Environment variable access and validation
 */

import { ConfigError } from '../domain/shared/errors/domain.error';
import { DEFAULT_SEARCH_CONSTRAINTS } from '../domain/travel/services/connection-search';
import { LogLevel, isLogLevel } from '../observability/logger';

export type Environment = 'development' | 'test' | 'production';

export interface AppConfig {
	environment: Environment;
	logLevel: LogLevel;
	outputDir: string;
	minLayoverHours: number;
	maxLayoverHours: number;
}

export type EnvSource = Record<string, string | undefined>;

export function loadConfig(env: EnvSource = process.env): AppConfig {
	const config: AppConfig = {
		environment: parseEnvironment(env.APP_ENV),
		logLevel: parseLogLevel(env.LOG_LEVEL),
		outputDir: env.FLIGHT_SEARCH_OUTPUT_DIR || '.',
		minLayoverHours: parseHours(env.MIN_LAYOVER_HOURS, 'MIN_LAYOVER_HOURS', DEFAULT_SEARCH_CONSTRAINTS.minLayoverHours),
		maxLayoverHours: parseHours(env.MAX_LAYOVER_HOURS, 'MAX_LAYOVER_HOURS', DEFAULT_SEARCH_CONSTRAINTS.maxLayoverHours),
	};

	if (config.minLayoverHours > config.maxLayoverHours) {
		throw new ConfigError(
			`MIN_LAYOVER_HOURS (${config.minLayoverHours}) cannot exceed MAX_LAYOVER_HOURS (${config.maxLayoverHours})`,
		);
	}

	return config;
}

function parseEnvironment(value: string | undefined): Environment {
	if (!value) {
		return 'development';
	}
	if (value === 'development' || value === 'test' || value === 'production') {
		return value;
	}
	throw new ConfigError(`APP_ENV must be development, test or production, got "${value}"`);
}

function parseLogLevel(value: string | undefined): LogLevel {
	if (!value) {
		return 'info';
	}
	const normalized = value.toLowerCase();
	if (!isLogLevel(normalized)) {
		throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${value}"`);
	}
	return normalized;
}

function parseHours(value: string | undefined, name: string, fallback: number): number {
	if (value === undefined || value.trim() === '') {
		return fallback;
	}
	const hours = Number(value);
	if (!Number.isFinite(hours) || hours < 0) {
		throw new ConfigError(`${name} must be a non-negative number of hours, got "${value}"`);
	}
	return hours;
}
