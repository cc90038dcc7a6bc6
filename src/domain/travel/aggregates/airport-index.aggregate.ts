/**
 * AirportIndex - Adjacency list of the flight network
 *
 * Aggregate Root in Travel Bounded Context
 * Owns every Airport and Flight loaded for a run. Airports are created lazily
 * the first time a flight names them. Frozen once loading completes.
 */

import { DomainError } from '../../shared/errors/domain.error';
import { Airport } from '../entities/airport.entity';
import { Flight } from '../entities/flight.entity';

export class AirportIndex {
	private readonly airports = new Map<string, Airport>();
	private readonly departures = new Map<string, Flight[]>();
	private flights = 0;
	private frozen = false;

	static fromFlights(flights: Iterable<Flight>): AirportIndex {
		const index = new AirportIndex();
		for (const flight of flights) {
			index.addFlight(flight);
		}
		return index.freeze();
	}

	addFlight(flight: Flight): void {
		if (this.frozen) {
			throw new DomainError('AirportIndex is frozen and cannot accept new flights', 'INDEX_FROZEN');
		}

		this.getOrCreate(flight.origin).push(flight);
		this.getOrCreate(flight.destination);
		this.flights++;
	}

	/** Locks the index and every departure list the Airports expose. */
	freeze(): this {
		this.frozen = true;
		for (const list of this.departures.values()) {
			Object.freeze(list);
		}
		return this;
	}

	get(code: string): Airport | undefined {
		return this.airports.get(code);
	}

	has(code: string): boolean {
		return this.airports.has(code);
	}

	get size(): number {
		return this.airports.size;
	}

	get flightCount(): number {
		return this.flights;
	}

	private getOrCreate(code: string): Flight[] {
		let list = this.departures.get(code);
		if (!list) {
			list = [];
			this.departures.set(code, list);
			this.airports.set(code, new Airport(code, list));
		}
		return list;
	}
}
