/**
 * FlightTime - Scheduled wall-clock time of a departure or arrival
 *
 * Value Object in Travel Bounded Context
 * Accepts `YYYY-MM-DDTHH:MM:SS` only. The wall clock is read as UTC so that
 * differences never depend on the host time zone.
 */

const FLIGHT_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

const MS_PER_HOUR = 3_600_000;

export class FlightTime {
	private constructor(
		private readonly value: string,
		readonly epochMs: number,
	) {}

	static create(value: string): FlightTime {
		const epochMs = FlightTime.toEpochMs(value);
		if (epochMs === null) {
			throw new Error(`Invalid flight time: ${value}. Expected YYYY-MM-DDTHH:MM:SS.`);
		}
		return new FlightTime(value, epochMs);
	}

	static isValid(value: string): boolean {
		return FlightTime.toEpochMs(value) !== null;
	}

	private static toEpochMs(value: string): number | null {
		if (!FLIGHT_TIME_PATTERN.test(value)) {
			return null;
		}

		const epochMs = Date.parse(`${value}Z`);
		if (Number.isNaN(epochMs)) {
			return null;
		}

		// Date.parse rolls 2024-02-30 over into March
		if (new Date(epochMs).toISOString().slice(0, 19) !== value) {
			return null;
		}

		return epochMs;
	}

	/** Signed number of milliseconds from this time until `later`. */
	msUntil(later: FlightTime): number {
		return later.epochMs - this.epochMs;
	}

	hoursUntil(later: FlightTime): number {
		return this.msUntil(later) / MS_PER_HOUR;
	}

	isBefore(other: FlightTime): boolean {
		return this.epochMs < other.epochMs;
	}

	toString(): string {
		return this.value;
	}
}
