/**
 * Output writers for search results
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ItinerarySummary } from '../domain/travel/entities/itinerary-summary';
import { Logger } from '../observability/logger';
import { OutputMode } from './args';

export const OUTBOUND_FILE = 'flights.json';
export const RETURN_FILE = 'return_flights.json';

export interface OutputWriter {
	write(fileName: string, itineraries: ItinerarySummary[]): Promise<void>;
}

export function serializeItineraries(itineraries: ItinerarySummary[]): string {
	return `${JSON.stringify(itineraries, null, 2)}\n`;
}

export class StdoutOutputWriter implements OutputWriter {
	constructor(private readonly out: (text: string) => void) {}

	async write(_fileName: string, itineraries: ItinerarySummary[]): Promise<void> {
		this.out(serializeItineraries(itineraries));
	}
}

export class FileOutputWriter implements OutputWriter {
	constructor(
		private readonly directory: string,
		private readonly logger: Logger,
	) {}

	async write(fileName: string, itineraries: ItinerarySummary[]): Promise<void> {
		await mkdir(this.directory, { recursive: true });
		const path = join(this.directory, fileName);
		await writeFile(path, serializeItineraries(itineraries), 'utf8');

		this.logger.info('Results written', {
			metadata: { path, itineraryCount: itineraries.length },
		});
	}
}

export function createOutputWriter(
	mode: OutputMode,
	directory: string,
	out: (text: string) => void,
	logger: Logger,
): OutputWriter {
	return mode === 'files' ? new FileOutputWriter(directory, logger) : new StdoutOutputWriter(out);
}
