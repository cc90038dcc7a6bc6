/**
 * TravelService - Application service for trip planning
 *
 * Validates the query, then runs the outbound search and, on request, the
 * return search against the same index.
 */

import { AirportIndex } from '../domain/travel/aggregates/airport-index.aggregate';
import { ItinerarySummary } from '../domain/travel/entities/itinerary-summary';
import { Logger } from '../observability/logger';
import { FlightSearchService } from './flight-search.service';
import { TripQueryValidator } from './validators/trip-query.validator';

export interface PlanTripCommand {
	origin: string;
	destination: string;
	bags: number;
	includeReturn: boolean;
}

export interface TripPlan {
	outbound: ItinerarySummary[];
	inbound?: ItinerarySummary[];
}

export class TravelService {
	constructor(
		private readonly flightSearch: FlightSearchService,
		private readonly validator: TripQueryValidator,
		private readonly logger: Logger,
	) {}

	planTrip(index: AirportIndex, command: PlanTripCommand): TripPlan {
		const { origin, destination, bags } = this.validator.validate(command, index);

		const plan: TripPlan = {
			outbound: this.flightSearch.searchFlights(index, origin, destination, bags),
		};

		if (command.includeReturn) {
			plan.inbound = this.flightSearch.searchFlights(index, destination, origin, bags);
		}

		this.logger.info('Trip search completed', {
			metadata: {
				origin,
				destination,
				bags,
				outboundCount: plan.outbound.length,
				inboundCount: plan.inbound?.length,
			},
		});

		return plan;
	}
}
