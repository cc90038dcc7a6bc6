/**
 * Application Services - Public API
 */

export { FlightSearchService, searchFlights } from './flight-search.service';
export { TravelService } from './travel.service';
export type { PlanTripCommand, TripPlan } from './travel.service';
export { TripQueryValidator } from './validators/trip-query.validator';
export type { TripQuery } from './validators/trip-query.validator';
