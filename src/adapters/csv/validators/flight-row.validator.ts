/**
 * FlightRowValidator - Validates raw dataset rows
 *
 * Ensures every field can be mapped before a Flight is built.
 * Errors carry the file line of the row and the column.
 */

import { DatasetParseError } from '../../../domain/shared/errors/domain.error';
import { AirportCode } from '../../../domain/travel/value-objects/airport-code.vo';
import { FlightTime } from '../../../domain/travel/value-objects/flight-time.vo';
import { FLIGHT_COLUMNS, FlightColumn, RawFlightRow } from '../parsers/flight-rows';

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;
const COUNT_PATTERN = /^\d+$/;

export class FlightRowValidator {
	validateRow(row: RawFlightRow, line: number): void {
		for (const column of FLIGHT_COLUMNS) {
			if (row[column].trim() === '') {
				throw new DatasetParseError('value is empty', line, column);
			}
		}

		this.validateAirportCode(row, 'origin', line);
		this.validateAirportCode(row, 'destination', line);
		this.validateFlightTime(row, 'departure', line);
		this.validateFlightTime(row, 'arrival', line);

		const departure = FlightTime.create(row.departure.trim());
		const arrival = FlightTime.create(row.arrival.trim());
		if (!departure.isBefore(arrival)) {
			throw new DatasetParseError(
				`departure ${departure.toString()} is not before arrival ${arrival.toString()}`,
				line,
				'arrival',
			);
		}

		this.validateDecimal(row, 'base_price', line);
		this.validateCount(row, 'bag_price', line);
		this.validateCount(row, 'bags_allowed', line);
	}

	private validateAirportCode(row: RawFlightRow, column: FlightColumn, line: number): void {
		if (!AirportCode.isValid(row[column])) {
			throw new DatasetParseError(`invalid airport code "${row[column]}"`, line, column);
		}
	}

	private validateFlightTime(row: RawFlightRow, column: FlightColumn, line: number): void {
		if (!FlightTime.isValid(row[column].trim())) {
			throw new DatasetParseError(
				`invalid timestamp "${row[column]}", expected YYYY-MM-DDTHH:MM:SS`,
				line,
				column,
			);
		}
	}

	private validateDecimal(row: RawFlightRow, column: FlightColumn, line: number): void {
		if (!DECIMAL_PATTERN.test(row[column].trim())) {
			throw new DatasetParseError(`"${row[column]}" is not a non-negative number`, line, column);
		}
	}

	private validateCount(row: RawFlightRow, column: FlightColumn, line: number): void {
		if (!COUNT_PATTERN.test(row[column].trim())) {
			throw new DatasetParseError(`"${row[column]}" is not a non-negative integer`, line, column);
		}
	}
}
