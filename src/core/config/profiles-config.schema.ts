/**
 * Profiles Configuration Schema
 *
 * Settings for a profile manager. Explicit overrides take precedence over the
 * environment.
 */

import { z } from 'zod';
import { readEnv } from '../env.js';
import { InvalidConfigurationError } from '../errors/index.js';

export const NameSchema = z.string().refine(value => value.trim().length > 0, 'Name must not be blank');

export const ProfilesConfigSchema = z.object({
	defaultContext: NameSchema.default('default'),
});

export type ProfilesConfig = z.infer<typeof ProfilesConfigSchema>;
export type ProfilesConfigInput = z.input<typeof ProfilesConfigSchema>;

/**
 * Build a validated configuration from overrides and the environment
 */
export function loadProfilesConfig(
	overrides: ProfilesConfigInput = {},
	source: NodeJS.ProcessEnv = process.env
): ProfilesConfig {
	const env = readEnv(source);
	const result = ProfilesConfigSchema.safeParse({
		defaultContext: overrides.defaultContext ?? env.PROFILES_DEFAULT_CONTEXT,
	});

	if (!result.success) {
		throw new InvalidConfigurationError(
			result.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
		);
	}

	return result.data;
}
