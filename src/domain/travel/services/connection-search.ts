/**
 * ConnectionSearch - Enumerates every itinerary between two airports
 *
 * Domain Service in Travel Bounded Context
 *
 * Depth-first over each airport's departures in dataset order. A flight may
 * extend a partial path only when it passes `isEligibleConnection`. Paths are
 * never mutated; every extension is a new array.
 */

import { AirportIndex } from '../aggregates/airport-index.aggregate';
import { Airport } from '../entities/airport.entity';
import { Flight } from '../entities/flight.entity';

export type FlightPath = readonly Flight[];

export interface SearchConstraints {
	minLayoverHours: number;
	maxLayoverHours: number;
}

export const DEFAULT_SEARCH_CONSTRAINTS: SearchConstraints = Object.freeze({
	minLayoverHours: 1,
	maxLayoverHours: 6,
});

/**
 * Bag allowance, layover window and revisit rule.
 *
 * The revisit rule only compares the candidate's destination with the
 * origins already in the path. A destination reached earlier may still be
 * departed from again as long as it was never an origin.
 */
export function isEligibleConnection(
	flight: Flight,
	path: FlightPath,
	bags: number,
	constraints: SearchConstraints = DEFAULT_SEARCH_CONSTRAINTS,
): boolean {
	if (flight.bagsAllowed < bags) {
		return false;
	}

	const previous = path[path.length - 1];
	if (previous) {
		const layoverHours = previous.arrival.hoursUntil(flight.departure);
		if (layoverHours < constraints.minLayoverHours || layoverHours > constraints.maxLayoverHours) {
			return false;
		}
	}

	return !path.some((leg) => leg.origin === flight.destination);
}

export class ConnectionSearch {
	constructor(
		private readonly index: AirportIndex,
		private readonly constraints: SearchConstraints = DEFAULT_SEARCH_CONSTRAINTS,
	) {}

	search(start: Airport, finish: Airport, bags: number): FlightPath[] {
		return this.extend(start, finish.code, bags, []);
	}

	private extend(current: Airport, finish: string, bags: number, path: FlightPath): FlightPath[] {
		const found: FlightPath[] = [];

		for (const flight of current.departures) {
			if (!isEligibleConnection(flight, path, bags, this.constraints)) {
				continue;
			}

			const extended: FlightPath = [...path, flight];
			if (flight.destination === finish) {
				found.push(extended);
				continue;
			}

			const next = this.index.get(flight.destination);
			if (next) {
				for (const completed of this.extend(next, finish, bags, extended)) {
					found.push(completed);
				}
			}
		}

		return found;
	}
}
