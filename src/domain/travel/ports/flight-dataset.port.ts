/**
 * IFlightDatasetPort - Port for loading the flight network
 *
 * Port in Travel Bounded Context
 * Implementations parse their source and return a frozen AirportIndex.
 */

import { AirportIndex } from '../aggregates/airport-index.aggregate';

export interface IFlightDatasetPort {
	load(): Promise<AirportIndex>;
}
