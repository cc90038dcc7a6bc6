/**
 * flight-search CLI
 *
 * Loads a CSV flight dataset, searches connections and prints or writes
 * the ranked itineraries.
 */

import { EnvSource, loadConfig } from '../config/settings';
import { createContainer } from '../config/container';
import { Logger } from '../observability/logger';
import { HELP, parseCliArgs } from './args';
import { handleError } from './error-handler';
import { OUTBOUND_FILE, RETURN_FILE, createOutputWriter } from './output.writer';

export interface CliIo {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
}

const processIo: CliIo = {
	stdout: (text) => {
		process.stdout.write(text);
	},
	stderr: (text) => {
		process.stderr.write(text);
	},
};

/** Resolves to the process exit code. */
export async function run(argv: string[], env: EnvSource = process.env, io: CliIo = processIo): Promise<number> {
	const logSink = (line: string): void => io.stderr(`${line}\n`);
	let logger = new Logger('flight-search', 'info', logSink);

	try {
		const command = parseCliArgs(argv);
		if (command.command === 'help') {
			io.stdout(HELP);
			return 0;
		}

		const config = loadConfig(env);
		const container = createContainer(config, { logSink });
		logger = container.logger;

		const index = await container.createDataset(command.csvPath).load();
		const plan = container.travelService.planTrip(index, {
			origin: command.origin,
			destination: command.destination,
			bags: command.bags,
			includeReturn: command.includeReturn,
		});

		const writer = createOutputWriter(command.output, command.outputDir ?? config.outputDir, io.stdout, logger);
		await writer.write(OUTBOUND_FILE, plan.outbound);
		if (plan.inbound) {
			await writer.write(RETURN_FILE, plan.inbound);
		}

		return 0;
	} catch (error) {
		const failure = handleError(error, logger);
		io.stderr(`Error: ${failure.message}\n`);
		return failure.exitCode;
	}
}
