/**
 * CLI argument parsing
 */

import { parseArgs } from 'node:util';
import { DomainError } from '../domain/shared/errors/domain.error';

export class UsageError extends DomainError {
	constructor(message: string) {
		super(message, 'USAGE_ERROR');
		this.name = 'UsageError';
	}
}

export type OutputMode = 'stdout' | 'files';

export interface SearchCommand {
	command: 'search';
	csvPath: string;
	origin: string;
	destination: string;
	bags: number;
	includeReturn: boolean;
	output: OutputMode;
	outputDir?: string;
}

export type CliCommand = { command: 'help' } | SearchCommand;

export const HELP = `Usage: flight-search <csv> <origin> <destination> [options]

Lists every connection between two airports in a flight dataset,
cheapest first, as JSON.

Arguments:
  csv                  Path to the flight dataset
  origin               Origin airport code
  destination          Destination airport code

Options:
  --bags <n>           Number of bags to carry (default 0)
  --return             Also search flights from destination back to origin
  --output <mode>      stdout | files (default stdout)
  --output-dir <dir>   Directory for flights.json and return_flights.json
  -h, --help           Show this help

--return_flight and --output_mode (with output_files for files) are
accepted as older spellings of --return and --output.
`;

export function parseCliArgs(argv: string[]): CliCommand {
	let parsed: ReturnType<typeof parseSearchArgs>;
	try {
		parsed = parseSearchArgs(argv);
	} catch (error) {
		throw new UsageError(error instanceof Error ? error.message : String(error));
	}

	const { values, positionals } = parsed;
	if (values.help) {
		return { command: 'help' };
	}

	if (positionals.length !== 3) {
		throw new UsageError(`Expected <csv> <origin> <destination>, got ${positionals.length} argument(s)`);
	}
	const [csvPath, origin, destination] = positionals;

	return {
		command: 'search',
		csvPath,
		origin,
		destination,
		bags: parseBags(values.bags),
		includeReturn: values.return ?? values.return_flight ?? false,
		output: parseOutputMode(values.output ?? values.output_mode),
		outputDir: values['output-dir'],
	};
}

function parseSearchArgs(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		strict: true,
		options: {
			bags: { type: 'string' },
			return: { type: 'boolean' },
			output: { type: 'string' },
			'output-dir': { type: 'string' },
			return_flight: { type: 'boolean' },
			output_mode: { type: 'string' },
			help: { type: 'boolean', short: 'h' },
		},
	});
}

function parseBags(value: string | undefined): number {
	if (value === undefined) {
		return 0;
	}
	if (!/^\d+$/.test(value)) {
		throw new UsageError(`--bags must be a non-negative integer, got "${value}"`);
	}
	return Number.parseInt(value, 10);
}

function parseOutputMode(value: string | undefined): OutputMode {
	if (value === undefined || value === 'stdout') {
		return 'stdout';
	}
	if (value === 'files' || value === 'output_files') {
		return 'files';
	}
	throw new UsageError(`--output must be stdout or files, got "${value}"`);
}
