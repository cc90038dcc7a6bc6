/**
 * Dependency Injection Container
 *
 * Factory functions for creating services with dependencies
 */

import { randomUUID } from 'node:crypto';

import { CsvFlightDatasetAdapter } from '../adapters/csv/csv-flight-dataset.adapter';
import { FlightRowMapper } from '../adapters/csv/mappers/flight-row.mapper';
import { FlightRowValidator } from '../adapters/csv/validators/flight-row.validator';
import { FlightSearchService } from '../application/flight-search.service';
import { TravelService } from '../application/travel.service';
import { TripQueryValidator } from '../application/validators/trip-query.validator';
import { IFlightDatasetPort } from '../domain/travel/ports/flight-dataset.port';
import { LogSink, Logger } from '../observability/logger';
import { AppConfig } from './settings';

export interface Container {
	config: AppConfig;
	correlationId: string;
	logger: Logger;

	// Adapters
	flightRowValidator: FlightRowValidator;
	flightRowMapper: FlightRowMapper;
	createDataset(filePath: string): IFlightDatasetPort;

	// Application Services
	flightSearchService: FlightSearchService;
	travelService: TravelService;
}

export interface ContainerOptions {
	logSink?: LogSink;
	/** Run id stamped on every log line; a random UUID when omitted. */
	correlationId?: string;
}

export function createContainer(config: AppConfig, options: ContainerOptions = {}): Container {
	const correlationId = options.correlationId ?? randomUUID();
	const logger = new Logger('flight-search', config.logLevel, options.logSink).withContext({ correlationId });

	// Adapters
	const flightRowValidator = new FlightRowValidator();
	const flightRowMapper = new FlightRowMapper();

	// Application Services
	const flightSearchService = new FlightSearchService(
		{ minLayoverHours: config.minLayoverHours, maxLayoverHours: config.maxLayoverHours },
		logger,
	);
	const travelService = new TravelService(flightSearchService, new TripQueryValidator(), logger);

	logger.debug('Container created', {
		metadata: { environment: config.environment, logLevel: config.logLevel },
	});

	return {
		config,
		correlationId,
		logger,

		flightRowValidator,
		flightRowMapper,
		createDataset: (filePath) => new CsvFlightDatasetAdapter(filePath, flightRowValidator, flightRowMapper, logger),

		flightSearchService,
		travelService,
	};
}
