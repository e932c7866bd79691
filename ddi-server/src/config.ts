/**
 * Mock server configuration, read from the environment
 */

import { z } from 'zod';

const serverConfigSchema = z.object({
	port: z.coerce.number().int().min(0).max(65535),
	host: z.string().min(1),
	/** Base URL put into artifact links; derived from the request when unset */
	publicUrl: z.string().url().optional(),
	firmwarePath: z.string().min(1),
	deploymentId: z.string().min(1),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
	const result = serverConfigSchema.safeParse({
		port: env.PORT ?? 8000,
		host: env.HOST ?? '0.0.0.0',
		publicUrl: env.PUBLIC_URL || undefined,
		firmwarePath: env.FIRMWARE_PATH ?? 'files/firmware.bin',
		deploymentId: env.DEPLOYMENT_ID ?? '12345',
	});

	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
		throw new Error(`Invalid server configuration: ${issues.join('; ')}`);
	}

	return result.data;
}
