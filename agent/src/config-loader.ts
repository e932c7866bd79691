/**
 * Agent Configuration Loader
 * ==========================
 * Loads configuration from multiple sources with priority:
 * 1. Command-line overrides - highest priority
 * 2. Config file (${CONFIG_DIR}/ddi-config.json)
 * 3. Environment variables
 * 4. Default values
 *
 * The merged result is validated as a whole.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigValidationError } from './errors';
import { LOG_LEVEL_NAMES } from './logging';

export const CONFIG_FILE_NAME = 'ddi-config.json';

export const agentConfigSchema = z.object({
	serverUrl: z.string().url(),
	controllerId: z.string().min(1),
	pollInterval: z.number().int().positive(), // ms
	apiTimeout: z.number().int().positive(), // ms
	downloadPath: z.string().min(1),
	logLevel: z.enum(LOG_LEVEL_NAMES),
	logDir: z.string().min(1),
	enableFileLogging: z.boolean(),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;

/** Unvalidated values from a single source */
export type RawAgentConfig = { [K in keyof AgentConfig]?: unknown };

export const DEFAULT_CONFIG: AgentConfig = {
	serverUrl: 'http://localhost:8000',
	controllerId: 'device001',
	pollInterval: 10000, // 10s
	apiTimeout: 30000, // 30s
	downloadPath: 'downloaded_firmware.bin',
	logLevel: 'info',
	logDir: './data/logs',
	enableFileLogging: false,
};

const CONFIG_KEYS = agentConfigSchema.keyof().options;

export interface ConfigLoaderOptions {
	/** Directory holding ddi-config.json (default: $CONFIG_DIR or ./data) */
	configDir?: string;
	env?: NodeJS.ProcessEnv;
	/** Highest-priority values, typically parsed from argv */
	overrides?: RawAgentConfig;
}

export class ConfigLoader {
	private readonly env: NodeJS.ProcessEnv;
	private readonly configFile: string;
	private readonly overrides: RawAgentConfig;
	private fileConfig: RawAgentConfig = {};
	private envConfig: RawAgentConfig = {};

	constructor(options: ConfigLoaderOptions = {}) {
		this.env = options.env ?? process.env;
		this.configFile = path.join(options.configDir ?? this.env.CONFIG_DIR ?? './data', CONFIG_FILE_NAME);
		this.overrides = pickConfigKeys(options.overrides ?? {});

		this.loadFileConfig();
		this.loadEnvConfig();
	}

	public getConfigFilePath(): string {
		return this.configFile;
	}

	/**
	 * Merged and validated configuration
	 *
	 * @throws ConfigValidationError listing every invalid field
	 */
	public getConfig(): AgentConfig {
		const merged = {
			...DEFAULT_CONFIG,
			...this.envConfig,
			...this.fileConfig,
			...this.overrides,
		};

		const result = agentConfigSchema.safeParse(merged);
		if (!result.success) {
			throw new ConfigValidationError(
				result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
			);
		}
		return result.data;
	}

	/**
	 * Re-read the config file and environment
	 */
	public reload(): void {
		this.loadFileConfig();
		this.loadEnvConfig();
	}

	private loadFileConfig(): void {
		this.fileConfig = {};

		if (!fs.existsSync(this.configFile)) {
			return;
		}

		try {
			const parsed: unknown = JSON.parse(fs.readFileSync(this.configFile, 'utf-8'));
			if (!isRecord(parsed)) {
				console.error(`⚠️  Ignoring ${this.configFile}: expected a JSON object`);
				return;
			}
			this.fileConfig = pickConfigKeys(parsed);
			console.log(`📋 Loaded config from ${this.configFile}`);
		} catch (error) {
			console.error('⚠️  Failed to load config file:', error);
		}
	}

	private loadEnvConfig(): void {
		const env = this.env;

		this.envConfig = pickConfigKeys({
			serverUrl: env.DDI_SERVER_URL,
			controllerId: env.DDI_CONTROLLER_ID,
			pollInterval: parseNumber(env.POLL_INTERVAL),
			apiTimeout: parseNumber(env.API_TIMEOUT),
			downloadPath: env.DOWNLOAD_PATH,
			logLevel: env.LOG_LEVEL,
			logDir: env.LOG_DIR,
			enableFileLogging: parseBoolean(env.ENABLE_FILE_LOGGING),
		});
	}
}

// ========================================================================
// Helpers
// ========================================================================

function parseNumber(value: string | undefined): number | string | undefined {
	if (value === undefined) return undefined;
	const num = Number(value);
	// Non-numeric input stays a string and fails validation
	return value.trim() === '' || Number.isNaN(num) ? value : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	return value === 'true' || value === '1' || value === 'yes';
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Known keys with a defined value; everything else is dropped
 */
function pickConfigKeys(source: Record<string, unknown>): RawAgentConfig {
	const picked: RawAgentConfig = {};
	for (const key of CONFIG_KEYS) {
		if (source[key] !== undefined) {
			picked[key] = source[key];
		}
	}
	return picked;
}
