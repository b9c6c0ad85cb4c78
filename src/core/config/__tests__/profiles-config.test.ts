import { describe, it, expect } from 'vitest';
import { loadProfilesConfig, ProfilesConfigSchema } from '../profiles-config.schema.js';
import { readEnv } from '../../env.js';
import { InvalidConfigurationError } from '../../errors/index.js';

describe('Profiles configuration', () => {
	describe('readEnv', () => {
		it('applies defaults for an empty environment', () => {
			expect(readEnv({})).toEqual({
				NODE_ENV: 'development',
				PROFILES_LOG_LEVEL: 'info',
				PROFILES_DEFAULT_CONTEXT: 'default',
			});
		});

		it('reads and normalizes values', () => {
			expect(
				readEnv({
					NODE_ENV: 'production',
					PROFILES_LOG_LEVEL: 'DEBUG',
					PROFILES_DEFAULT_CONTEXT: 'email',
				})
			).toEqual({
				NODE_ENV: 'production',
				PROFILES_LOG_LEVEL: 'debug',
				PROFILES_DEFAULT_CONTEXT: 'email',
			});
		});

		it('falls back on invalid values', () => {
			const env = readEnv({ NODE_ENV: 'staging', PROFILES_LOG_LEVEL: 'loud', PROFILES_DEFAULT_CONTEXT: '' });

			expect(env.NODE_ENV).toBe('development');
			expect(env.PROFILES_LOG_LEVEL).toBe('info');
			expect(env.PROFILES_DEFAULT_CONTEXT).toBe('default');
		});
	});

	describe('loadProfilesConfig', () => {
		it('uses the environment when no override is given', () => {
			expect(loadProfilesConfig({}, { PROFILES_DEFAULT_CONTEXT: 'editor' })).toEqual({
				defaultContext: 'editor',
			});
		});

		it('prefers explicit overrides', () => {
			expect(
				loadProfilesConfig({ defaultContext: 'email' }, { PROFILES_DEFAULT_CONTEXT: 'editor' })
			).toEqual({ defaultContext: 'email' });
		});

		it('falls back to the built-in default', () => {
			expect(loadProfilesConfig({}, {})).toEqual({ defaultContext: 'default' });
		});

		it('reports schema issues', () => {
			let caught: unknown;
			try {
				loadProfilesConfig({ defaultContext: '   ' }, {});
			} catch (error) {
				caught = error;
			}

			expect(caught).toBeInstanceOf(InvalidConfigurationError);
			expect(caught).toMatchObject({
				errorCode: 'INVALID_CONFIGURATION',
				issues: ['defaultContext: Name must not be blank'],
			});
		});
	});

	describe('ProfilesConfigSchema', () => {
		it('defaults the context name', () => {
			expect(ProfilesConfigSchema.parse({})).toEqual({ defaultContext: 'default' });
		});
	});
});
