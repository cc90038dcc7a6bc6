/**
 * ItinerarySummary - Ranked search result
 *
 * Field names follow the JSON output format, so they are snake_case.
 */

export interface LegDetail {
	flight_no: string;
	origin: string;
	destination: string;
	departure: string;
	arrival: string;
	base_price: number;
	bag_price: number;
	bags_allowed: number;
}

export interface ItinerarySummary {
	flight: LegDetail[];
	bags_allowed: number;
	bags_count: number;
	destination: string;
	origin: string;
	total_price: number;
	travel_time: string;
}
