/**
 * FlightSearchService - Ranked itinerary search
 *
 * Runs the connection search on an AirportIndex and returns summaries
 * cheapest first. Equal prices keep discovery order. Airport codes are not
 * validated here; an unknown code simply yields no itineraries.
 */

import { AirportIndex } from '../domain/travel/aggregates/airport-index.aggregate';
import { ItinerarySummary } from '../domain/travel/entities/itinerary-summary';
import {
	ConnectionSearch,
	DEFAULT_SEARCH_CONSTRAINTS,
	SearchConstraints,
} from '../domain/travel/services/connection-search';
import { formatItinerary } from '../domain/travel/services/itinerary-formatter';
import { Logger } from '../observability/logger';

export function searchFlights(
	index: AirportIndex,
	originCode: string,
	destinationCode: string,
	bags: number,
	constraints: SearchConstraints = DEFAULT_SEARCH_CONSTRAINTS,
): ItinerarySummary[] {
	const start = index.get(originCode);
	const finish = index.get(destinationCode);
	if (!start || !finish) {
		return [];
	}

	const paths = new ConnectionSearch(index, constraints).search(start, finish, bags);

	// Array.prototype.sort is stable
	return paths
		.map((path) => formatItinerary(path, start.code, finish.code, bags))
		.sort((a, b) => a.total_price - b.total_price);
}

export class FlightSearchService {
	constructor(
		private readonly constraints: SearchConstraints,
		private readonly logger: Logger,
	) {}

	searchFlights(
		index: AirportIndex,
		originCode: string,
		destinationCode: string,
		bags: number,
	): ItinerarySummary[] {
		const startTime = Date.now();
		const itineraries = searchFlights(index, originCode, destinationCode, bags, this.constraints);

		this.logger.debug('Connection search finished', {
			metadata: {
				origin: originCode,
				destination: destinationCode,
				bags,
				itineraryCount: itineraries.length,
				durationMs: Date.now() - startTime,
			},
		});

		return itineraries;
	}
}
