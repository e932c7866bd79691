/**
 * Command-line arguments
 *
 *   ddi-agent [serverUrl] [controllerId] [--poll-interval ms] [--timeout ms]
 *             [--download-path file] [--log-level level]
 */

import yargs from 'yargs';
import type { RawAgentConfig } from './config-loader';
import { LOG_LEVEL_NAMES } from './logging';

export function parseCliArgs(argv: string[]): RawAgentConfig {
	const args = yargs(argv)
		.scriptName('ddi-agent')
		.usage('$0 [serverUrl] [controllerId]')
		.option('poll-interval', {
			alias: 'i',
			description: 'Milliseconds to wait between polls',
			type: 'number',
		})
		.option('timeout', {
			alias: 't',
			description: 'Per-request timeout in milliseconds',
			type: 'number',
		})
		.option('download-path', {
			alias: 'o',
			description: 'File the artifact is written to (overwritten every deployment)',
			type: 'string',
		})
		.option('log-level', {
			alias: 'l',
			description: 'Log level (debug, info, warn, error)',
			type: 'string',
			choices: LOG_LEVEL_NAMES,
		})
		// Controller IDs such as 001 must stay strings
		.parserConfiguration({ 'parse-positional-numbers': false })
		.strictOptions()
		.help()
		.alias('help', 'h')
		.parseSync();

	const [serverUrl, controllerId] = args._.map(String);

	return {
		serverUrl,
		controllerId,
		pollInterval: args.pollInterval,
		apiTimeout: args.timeout,
		downloadPath: args.downloadPath,
		logLevel: args.logLevel,
	};
}
