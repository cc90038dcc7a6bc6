/**
 * Flight - One scheduled flight leg
 *
 * Entity in Travel Bounded Context
 * Immutable once created. Airports are referenced by code, never by object.
 */

import { AirportCode } from '../value-objects/airport-code.vo';
import { FlightTime } from '../value-objects/flight-time.vo';

export interface FlightProps {
	flightNo: string;
	origin: AirportCode;
	destination: AirportCode;
	departure: FlightTime;
	arrival: FlightTime;
	basePrice: number;
	bagPrice: number;
	bagsAllowed: number;
}

export class Flight {
	readonly flightNo: string;
	readonly origin: string;
	readonly destination: string;
	readonly departure: FlightTime;
	readonly arrival: FlightTime;
	readonly basePrice: number;
	readonly bagPrice: number;
	readonly bagsAllowed: number;

	private constructor(props: FlightProps) {
		if (props.flightNo.trim() === '') {
			throw new Error('Flight number cannot be empty');
		}
		if (!props.departure.isBefore(props.arrival)) {
			throw new Error(`Flight ${props.flightNo} must depart before it arrives`);
		}
		if (!Number.isFinite(props.basePrice) || props.basePrice < 0) {
			throw new Error('Flight base price cannot be negative');
		}
		if (!Number.isInteger(props.bagPrice) || props.bagPrice < 0) {
			throw new Error('Flight bag price must be a non-negative integer');
		}
		if (!Number.isInteger(props.bagsAllowed) || props.bagsAllowed < 0) {
			throw new Error('Flight bag allowance must be a non-negative integer');
		}

		this.flightNo = props.flightNo;
		this.origin = props.origin.toString();
		this.destination = props.destination.toString();
		this.departure = props.departure;
		this.arrival = props.arrival;
		this.basePrice = props.basePrice;
		this.bagPrice = props.bagPrice;
		this.bagsAllowed = props.bagsAllowed;

		Object.freeze(this);
	}

	static create(props: FlightProps): Flight {
		return new Flight(props);
	}

	priceFor(bags: number): number {
		return this.basePrice + bags * this.bagPrice;
	}
}
