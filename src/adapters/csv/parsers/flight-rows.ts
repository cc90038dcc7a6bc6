/**
 * Flight Rows
 *
 * Maps CSV records onto the dataset columns by header name. Column order is
 * free and extra columns are ignored.
 */

import { DatasetParseError } from '../../../domain/shared/errors/domain.error';
import { parseCsv } from './csv.parser';

export const FLIGHT_COLUMNS = [
	'flight_no',
	'origin',
	'destination',
	'departure',
	'arrival',
	'base_price',
	'bag_price',
	'bags_allowed',
] as const;

export type FlightColumn = (typeof FLIGHT_COLUMNS)[number];

export type RawFlightRow = Record<FlightColumn, string>;

/** A data row together with the file line it starts on. */
export type FlightRow = RawFlightRow & { line: number };

export function readFlightRows(text: string): FlightRow[] {
	const [header, ...records] = parseCsv(text);
	if (!header) {
		throw new DatasetParseError('dataset is empty', 1);
	}

	const positions = new Map<string, number>();
	header.fields.forEach((name, position) => positions.set(name.trim(), position));

	for (const column of FLIGHT_COLUMNS) {
		if (!positions.has(column)) {
			throw new DatasetParseError(`missing column "${column}"`, header.line, column);
		}
	}

	return records.map(({ line, fields: cells }) => {
		if (cells.length !== header.fields.length) {
			throw new DatasetParseError(`expected ${header.fields.length} fields, found ${cells.length}`, line);
		}

		const cell = (column: FlightColumn): string => cells[positions.get(column) ?? -1] ?? '';

		return {
			line,
			flight_no: cell('flight_no'),
			origin: cell('origin'),
			destination: cell('destination'),
			departure: cell('departure'),
			arrival: cell('arrival'),
			base_price: cell('base_price'),
			bag_price: cell('bag_price'),
			bags_allowed: cell('bags_allowed'),
		};
	});
}
