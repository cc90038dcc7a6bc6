/**
 * Travel Bounded Context - Public API
 *
 * Exports aggregates, entities, value objects, services and ports
 */

// Aggregates
export { AirportIndex } from './aggregates/airport-index.aggregate';

// Entities
export { Flight } from './entities/flight.entity';
export type { FlightProps } from './entities/flight.entity';
export { Airport } from './entities/airport.entity';
export type { ItinerarySummary, LegDetail } from './entities/itinerary-summary';

// Value Objects
export { AirportCode } from './value-objects/airport-code.vo';
export { FlightTime } from './value-objects/flight-time.vo';

// Services
export { ConnectionSearch, DEFAULT_SEARCH_CONSTRAINTS, isEligibleConnection } from './services/connection-search';
export type { FlightPath, SearchConstraints } from './services/connection-search';
export {
	formatItinerary,
	formatDuration,
	minBagsAllowed,
	toLegDetails,
	totalPrice,
	travelTime,
} from './services/itinerary-formatter';

// Ports
export type { IFlightDatasetPort } from './ports/flight-dataset.port';
