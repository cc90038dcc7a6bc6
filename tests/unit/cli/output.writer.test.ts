import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
	FileOutputWriter,
	StdoutOutputWriter,
	createOutputWriter,
	serializeItineraries,
} from '../../../src/cli/output.writer';
import { ItinerarySummary } from '../../../src/domain/travel/entities/itinerary-summary';
import { Logger } from '../../../src/observability/logger';

const itinerary: ItinerarySummary = {
	flight: [
		{
			flight_no: 'WB100',
			origin: 'WAW',
			destination: 'BCN',
			departure: '2024-03-01T10:00:00',
			arrival: '2024-03-01T13:00:00',
			base_price: 120,
			bag_price: 10,
			bags_allowed: 2,
		},
	],
	bags_allowed: 2,
	bags_count: 0,
	destination: 'BCN',
	origin: 'WAW',
	total_price: 120,
	travel_time: '03:00:00',
};

const quietLogger = new Logger('test', 'error', () => undefined);

describe('serializeItineraries', () => {
	it('should indent with two spaces and end with a newline', () => {
		expect(serializeItineraries([])).toBe('[]\n');
		expect(serializeItineraries([itinerary]).split('\n').slice(0, 3)).toEqual(['[', '  {', '    "flight": [']);
	});
});

describe('StdoutOutputWriter', () => {
	it('should print the JSON document', async () => {
		const chunks: string[] = [];
		await new StdoutOutputWriter((text) => chunks.push(text)).write('flights.json', [itinerary]);

		expect(chunks).toHaveLength(1);
		expect(JSON.parse(chunks[0])).toEqual([itinerary]);
	});
});

describe('FileOutputWriter', () => {
	let directory: string;

	beforeEach(async () => {
		directory = await mkdtemp(join(tmpdir(), 'flight-output-'));
	});

	afterEach(async () => {
		await rm(directory, { recursive: true, force: true });
	});

	it('should write the file, creating the directory first', async () => {
		const target = join(directory, 'nested');
		await new FileOutputWriter(target, quietLogger).write('flights.json', [itinerary]);

		const written = await readFile(join(target, 'flights.json'), 'utf8');
		expect(written).toBe(serializeItineraries([itinerary]));
	});
});

describe('createOutputWriter', () => {
	it('should pick the writer for the mode', () => {
		const out = (): void => undefined;

		expect(createOutputWriter('stdout', '.', out, quietLogger)).toBeInstanceOf(StdoutOutputWriter);
		expect(createOutputWriter('files', '.', out, quietLogger)).toBeInstanceOf(FileOutputWriter);
	});
});
