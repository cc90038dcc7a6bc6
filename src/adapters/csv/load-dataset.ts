import { AirportIndex } from '../../domain/travel/aggregates/airport-index.aggregate';
import { Flight } from '../../domain/travel/entities/flight.entity';
import { FlightRowMapper } from './mappers/flight-row.mapper';
import { FlightRow } from './parsers/flight-rows';
import { FlightRowValidator } from './validators/flight-row.validator';

/**
 * Builds a frozen AirportIndex from raw rows, stopping at the first bad row.
 */
export function loadDataset(
	rows: readonly FlightRow[],
	validator: FlightRowValidator = new FlightRowValidator(),
	mapper: FlightRowMapper = new FlightRowMapper(),
): AirportIndex {
	const flights: Flight[] = rows.map((row) => {
		validator.validateRow(row, row.line);
		return mapper.toFlight(row);
	});

	return AirportIndex.fromFlights(flights);
}
