import { describe, it, expect, beforeEach } from 'vitest';
import { FlightSearchService, searchFlights } from '../../../src/application/flight-search.service';
import { AirportIndex } from '../../../src/domain/travel/aggregates/airport-index.aggregate';
import { DEFAULT_SEARCH_CONSTRAINTS } from '../../../src/domain/travel/services/connection-search';
import { Logger } from '../../../src/observability/logger';
import { makeIndex } from '../../fixtures/flight.factory';

describe('searchFlights', () => {
	let index: AirportIndex;

	beforeEach(() => {
		index = makeIndex([
			{
				flightNo: 'WB1',
				origin: 'WAW',
				destination: 'BCN',
				departure: '2024-03-01T07:00:00',
				arrival: '2024-03-01T10:00:00',
				basePrice: 300,
				bagPrice: 0,
			},
			{
				flightNo: 'WP100',
				origin: 'WAW',
				destination: 'PRG',
				departure: '2024-03-01T10:00:00',
				arrival: '2024-03-01T12:00:00',
				basePrice: 100,
				bagPrice: 10,
			},
			{
				flightNo: 'WB2',
				origin: 'WAW',
				destination: 'BCN',
				departure: '2024-03-01T11:00:00',
				arrival: '2024-03-01T14:00:00',
				basePrice: 150,
				bagPrice: 0,
			},
			{
				flightNo: 'PB200',
				origin: 'PRG',
				destination: 'BCN',
				departure: '2024-03-01T14:00:00',
				arrival: '2024-03-01T16:00:00',
				basePrice: 50,
				bagPrice: 5,
			},
			{
				flightNo: 'WB3',
				origin: 'WAW',
				destination: 'BCN',
				departure: '2024-03-01T20:00:00',
				arrival: '2024-03-01T23:00:00',
				basePrice: 90,
				bagPrice: 0,
			},
		]);
	});

	it('should sort by total price and keep discovery order for ties', () => {
		const itineraries = searchFlights(index, 'WAW', 'BCN', 0);

		expect(itineraries.map((itinerary) => itinerary.flight.map((leg) => leg.flight_no))).toEqual([
			['WB3'],
			['WP100', 'PB200'],
			['WB2'],
			['WB1'],
		]);
		expect(itineraries.map((itinerary) => itinerary.total_price)).toEqual([90, 150, 150, 300]);
	});

	it('should price bags into the ranking', () => {
		const itineraries = searchFlights(index, 'WAW', 'BCN', 1);

		expect(itineraries.map((itinerary) => itinerary.total_price)).toEqual([90, 150, 165, 300]);
		expect(itineraries[2].bags_count).toBe(1);
	});

	it('should describe the requested airports', () => {
		const [cheapest] = searchFlights(index, 'WAW', 'BCN', 0);

		expect(cheapest.origin).toBe('WAW');
		expect(cheapest.destination).toBe('BCN');
		expect(cheapest.travel_time).toBe('03:00:00');
	});

	it('should return an empty list for unknown airports', () => {
		expect(searchFlights(index, 'LHR', 'BCN', 0)).toEqual([]);
		expect(searchFlights(index, 'WAW', 'LHR', 0)).toEqual([]);
	});

	it('should return an empty list when nothing matches', () => {
		expect(searchFlights(index, 'BCN', 'WAW', 0)).toEqual([]);
	});

	it('should be repeatable on the same index', () => {
		expect(searchFlights(index, 'WAW', 'BCN', 1)).toEqual(searchFlights(index, 'WAW', 'BCN', 1));
	});
});

describe('FlightSearchService', () => {
	it('should log the outcome at debug level', () => {
		const lines: string[] = [];
		const logger = new Logger('test', 'debug', (line) => lines.push(line));
		const index = makeIndex([
			{
				flightNo: 'WP100',
				origin: 'WAW',
				destination: 'PRG',
				departure: '2024-03-01T10:00:00',
				arrival: '2024-03-01T12:00:00',
			},
		]);

		const service = new FlightSearchService(DEFAULT_SEARCH_CONSTRAINTS, logger);
		const itineraries = service.searchFlights(index, 'WAW', 'PRG', 0);

		expect(itineraries).toHaveLength(1);
		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0])).toMatchObject({
			level: 'debug',
			message: 'Connection search finished',
			origin: 'WAW',
			destination: 'PRG',
			itineraryCount: 1,
		});
	});

	it('should apply its configured constraints', () => {
		const logger = new Logger('test', 'error', () => undefined);
		const index = makeIndex([
			{
				flightNo: 'WP100',
				origin: 'WAW',
				destination: 'PRG',
				departure: '2024-03-01T10:00:00',
				arrival: '2024-03-01T12:00:00',
			},
			{
				flightNo: 'PB200',
				origin: 'PRG',
				destination: 'BCN',
				departure: '2024-03-01T20:00:00',
				arrival: '2024-03-01T22:00:00',
			},
		]);

		expect(new FlightSearchService(DEFAULT_SEARCH_CONSTRAINTS, logger).searchFlights(index, 'WAW', 'BCN', 0)).toEqual(
			[],
		);
		expect(
			new FlightSearchService({ minLayoverHours: 1, maxLayoverHours: 8 }, logger).searchFlights(index, 'WAW', 'BCN', 0),
		).toHaveLength(1);
	});
});
