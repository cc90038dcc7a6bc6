/**
 * CSV Adapter - Public API
 */

export { CsvFlightDatasetAdapter } from './csv-flight-dataset.adapter';
export { loadDataset } from './load-dataset';
export { parseCsv } from './parsers/csv.parser';
export { readFlightRows, FLIGHT_COLUMNS } from './parsers/flight-rows';
export type { CsvRecord } from './parsers/csv.parser';
export type { FlightColumn, FlightRow, RawFlightRow } from './parsers/flight-rows';
export { FlightRowValidator } from './validators/flight-row.validator';
export { FlightRowMapper } from './mappers/flight-row.mapper';
