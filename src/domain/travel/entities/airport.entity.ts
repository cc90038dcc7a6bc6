/**
 * Airport - A node of the flight network
 *
 * Entity in Travel Bounded Context
 * Exposes its departures in dataset order. The list is owned and appended to
 * by AirportIndex; an Airport offers no way to change it.
 */

import { Flight } from './flight.entity';

export class Airport {
	constructor(
		readonly code: string,
		private readonly outbound: readonly Flight[],
	) {
		for (const flight of outbound) {
			if (flight.origin !== code) {
				throw new Error(`Flight ${flight.flightNo} departs from ${flight.origin}, not ${code}`);
			}
		}
	}

	get departures(): readonly Flight[] {
		return this.outbound;
	}
}
