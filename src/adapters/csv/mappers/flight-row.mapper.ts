/**
 * FlightRowMapper - Translates validated dataset rows to domain entities
 */

import { Flight } from '../../../domain/travel/entities/flight.entity';
import { AirportCode } from '../../../domain/travel/value-objects/airport-code.vo';
import { FlightTime } from '../../../domain/travel/value-objects/flight-time.vo';
import { RawFlightRow } from '../parsers/flight-rows';

export class FlightRowMapper {
	toFlight(row: RawFlightRow): Flight {
		return Flight.create({
			flightNo: row.flight_no.trim(),
			origin: AirportCode.create(row.origin),
			destination: AirportCode.create(row.destination),
			departure: FlightTime.create(row.departure.trim()),
			arrival: FlightTime.create(row.arrival.trim()),
			basePrice: Number(row.base_price.trim()),
			bagPrice: Number.parseInt(row.bag_price.trim(), 10),
			bagsAllowed: Number.parseInt(row.bags_allowed.trim(), 10),
		});
	}
}
