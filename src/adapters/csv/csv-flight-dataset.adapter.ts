/**
 * CsvFlightDatasetAdapter - Loads the flight network from a CSV file
 *
 * Implements IFlightDatasetPort
 */

import { readFile } from 'node:fs/promises';
import { DatasetReadError } from '../../domain/shared/errors/domain.error';
import { AirportIndex } from '../../domain/travel/aggregates/airport-index.aggregate';
import { IFlightDatasetPort } from '../../domain/travel/ports/flight-dataset.port';
import { Logger } from '../../observability/logger';
import { loadDataset } from './load-dataset';
import { FlightRowMapper } from './mappers/flight-row.mapper';
import { readFlightRows } from './parsers/flight-rows';
import { FlightRowValidator } from './validators/flight-row.validator';

export class CsvFlightDatasetAdapter implements IFlightDatasetPort {
	constructor(
		private readonly filePath: string,
		private readonly validator: FlightRowValidator,
		private readonly mapper: FlightRowMapper,
		private readonly logger: Logger,
	) {}

	async load(): Promise<AirportIndex> {
		const text = await this.readText();

		const startTime = Date.now();
		const index = loadDataset(readFlightRows(text), this.validator, this.mapper);

		this.logger.info('Flight dataset loaded', {
			metadata: {
				path: this.filePath,
				airportCount: index.size,
				flightCount: index.flightCount,
				durationMs: Date.now() - startTime,
			},
		});

		return index;
	}

	private async readText(): Promise<string> {
		try {
			return await readFile(this.filePath, 'utf8');
		} catch (error) {
			throw new DatasetReadError(this.filePath, error instanceof Error ? error.message : String(error));
		}
	}
}
