import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file; values already set in the process win
config({ override: false });

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).catch('development'),
	PROFILES_LOG_LEVEL: z.enum(LOG_LEVELS).catch('info'),
	PROFILES_DEFAULT_CONTEXT: z.string().min(1).default('default'),
});

export type EnvSchema = z.infer<typeof envSchema>;

/**
 * Read and validate the environment. Always reads from the given source so that
 * changes to process.env after startup are picked up.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): EnvSchema {
	return envSchema.parse({
		NODE_ENV: source.NODE_ENV || undefined,
		PROFILES_LOG_LEVEL: source.PROFILES_LOG_LEVEL?.toLowerCase(),
		PROFILES_DEFAULT_CONTEXT: source.PROFILES_DEFAULT_CONTEXT || undefined,
	});
}

export function isLogLevel(value: string): value is LogLevel {
	return (LOG_LEVELS as readonly string[]).includes(value);
}
