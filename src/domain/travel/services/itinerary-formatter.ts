/**
 * Itinerary Formatter
 *
 * Turns a discovered FlightPath into the ItinerarySummary written to output.
 */

import { FlightPath } from './connection-search';
import { ItinerarySummary, LegDetail } from '../entities/itinerary-summary';

export function totalPrice(path: FlightPath, bags: number): number {
	let total = 0;
	for (const flight of path) {
		total += flight.priceFor(bags);
	}
	return total;
}

/** Hours are not folded into days, so a 30 hour trip reads `30:00:00`. */
export function formatDuration(durationMs: number): string {
	const totalSeconds = Math.floor(durationMs / 1000);
	const hours = Math.floor(totalSeconds / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	const seconds = totalSeconds % 60;

	return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
}

export function travelTime(path: FlightPath): string {
	const first = path[0];
	const last = path[path.length - 1];
	if (!first || !last) {
		throw new Error('Cannot compute travel time of an empty path');
	}
	return formatDuration(first.departure.msUntil(last.arrival));
}

export function minBagsAllowed(path: FlightPath): number {
	if (path.length === 0) {
		throw new Error('Cannot compute bag allowance of an empty path');
	}
	return Math.min(...path.map((flight) => flight.bagsAllowed));
}

export function toLegDetails(path: FlightPath): LegDetail[] {
	return path.map((flight) => ({
		flight_no: flight.flightNo,
		origin: flight.origin,
		destination: flight.destination,
		departure: flight.departure.toString(),
		arrival: flight.arrival.toString(),
		base_price: flight.basePrice,
		bag_price: flight.bagPrice,
		bags_allowed: flight.bagsAllowed,
	}));
}

export function formatItinerary(
	path: FlightPath,
	origin: string,
	destination: string,
	bags: number,
): ItinerarySummary {
	return {
		flight: toLegDetails(path),
		bags_allowed: minBagsAllowed(path),
		bags_count: bags,
		destination,
		origin,
		total_price: totalPrice(path, bags),
		travel_time: travelTime(path),
	};
}
