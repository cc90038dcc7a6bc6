/**
 * TripQueryValidator - Rejects queries the search must never see
 */

import { InvalidQueryError } from '../../domain/shared/errors/domain.error';
import { AirportIndex } from '../../domain/travel/aggregates/airport-index.aggregate';
import { AirportCode } from '../../domain/travel/value-objects/airport-code.vo';

export interface TripQuery {
	origin: string;
	destination: string;
	bags: number;
}

export class TripQueryValidator {
	/**
	 * Returns the query with normalised airport codes.
	 */
	validate(query: TripQuery, index: AirportIndex): TripQuery {
		const origin = this.normalizeCode(query.origin, 'origin');
		const destination = this.normalizeCode(query.destination, 'destination');

		if (!index.has(origin)) {
			throw new InvalidQueryError(`Code for origin airport ${query.origin} is not in dataset`);
		}
		if (!index.has(destination)) {
			throw new InvalidQueryError(`Code for destination airport ${query.destination} is not in dataset`);
		}
		if (origin === destination) {
			throw new InvalidQueryError('The origin and the destination airports are identical');
		}
		if (!Number.isInteger(query.bags) || query.bags < 0) {
			throw new InvalidQueryError(`Number of bags must be a non-negative integer, got ${query.bags}`);
		}

		return { origin, destination, bags: query.bags };
	}

	private normalizeCode(code: string, fieldName: string): string {
		if (!code || code.trim() === '') {
			throw new InvalidQueryError(`Trip search requires ${fieldName} airport code`);
		}
		if (!AirportCode.isValid(code)) {
			throw new InvalidQueryError(`Invalid ${fieldName} airport code format: ${code}`);
		}
		return AirportCode.create(code).toString();
	}
}
