#!/usr/bin/env node
/**
 * DDI Agent Entry Point
 *
 * Runs on the device. Resolves configuration (argv > config file > env >
 * defaults), then polls the control plane until SIGINT/SIGTERM.
 */

import process from 'process';
import * as dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';
import DdiAgent from './agent';
import { parseCliArgs } from './cli';
import { ConfigLoader } from './config-loader';

// Load environment variables
dotenv.config();

let agent: DdiAgent | undefined;
let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
	if (shuttingDown) {
		console.log(`Already shutting down, ignoring ${signal}`);
		return;
	}

	shuttingDown = true;
	console.log(`\n${signal} received. Starting graceful shutdown...`);

	try {
		await agent?.stop();
		console.log('✅ DDI agent stopped successfully');
		process.exit(0);
	} catch (error) {
		console.error('❌ Error during shutdown:', error);
		process.exit(1);
	}
}

async function main(): Promise<void> {
	const config = new ConfigLoader({ overrides: parseCliArgs(hideBin(process.argv)) }).getConfig();

	console.log('DDI Client');
	console.log('==========');

	agent = new DdiAgent(config);
	await agent.init();
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
	console.error('Unhandled Rejection, reason:', reason);
	void gracefulShutdown('unhandledRejection');
});

main().catch((error: unknown) => {
	console.error('Failed to initialize DDI agent:', error);
	process.exit(1);
});
