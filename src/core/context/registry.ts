/**
 * Context registry
 * Stores contexts, the profiles of each context and which profile is active
 */

import { NameSchema } from '../config/profiles-config.schema.js';
import { InvalidNameError } from '../errors/index.js';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import type { ContextRecord, ProfileCallback, ProfileDescriptor, ProfileRecord } from './types.js';

const noop: ProfileCallback = () => {};

export interface ContextRegistryOptions {
	logger?: Logger;
}

export class ContextRegistry {
	private readonly records = new Map<string, ContextRecord>();
	// Names of defined contexts; a cleared context keeps its record but leaves the index
	private readonly known = new Set<string>();
	private readonly logger: Logger;

	constructor(options: ContextRegistryOptions = {}) {
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * Create an empty context if it does not exist yet
	 */
	defineContext(name: string): void {
		this.ensureContext(validateName('context', name));
	}

	hasContext(name: string): boolean {
		return this.known.has(name);
	}

	listContexts(): string[] {
		return Array.from(this.known);
	}

	/**
	 * Empty a context and drop it from the index of known contexts
	 */
	clearContext(name: string): void {
		const record = this.records.get(name);
		if (record) {
			record.profiles.clear();
			record.active = null;
		}
		if (this.known.delete(name)) {
			this.logger.debug('Context cleared', { context: name });
		}
	}

	clearAllContexts(): void {
		for (const name of this.listContexts()) {
			this.clearContext(name);
		}
	}

	/**
	 * Insert a profile, or replace the callbacks of an existing one in place
	 */
	addProfile(
		contextName: string,
		profileName: string,
		onActivate?: ProfileCallback,
		onDeactivate?: ProfileCallback
	): void {
		const record = this.ensureContext(validateName('context', contextName));
		const name = validateName('profile', profileName);

		const existing = record.profiles.get(name);
		if (existing) {
			existing.onActivate = onActivate ?? noop;
			existing.onDeactivate = onDeactivate ?? noop;
			this.logger.debug('Profile callbacks replaced', { context: record.name, profile: name });
			return;
		}

		const profile: ProfileRecord = {
			name,
			onActivate: onActivate ?? noop,
			onDeactivate: onDeactivate ?? noop,
		};
		record.profiles.set(name, profile);
		this.logger.debug('Profile added', { context: record.name, profile: name });
	}

	/**
	 * Profiles of a context in insertion order. Unknown contexts have none.
	 */
	listProfiles(contextName: string): readonly ProfileDescriptor[] {
		const record = this.records.get(contextName);
		if (!record) {
			return [];
		}
		return Object.freeze(Array.from(record.profiles.values(), toDescriptor));
	}

	getProfile(contextName: string, profileName: string): ProfileDescriptor | undefined {
		const profile = this.records.get(contextName)?.profiles.get(profileName);
		return profile ? toDescriptor(profile) : undefined;
	}

	getActiveProfile(contextName: string): string | null {
		return this.records.get(contextName)?.active ?? null;
	}

	/**
	 * Record the active profile of a context. Used by the switch engine while it
	 * commits each half of a transition. Cleared or unknown contexts, and profiles
	 * the context does not hold, are left untouched.
	 */
	setActiveProfile(contextName: string, profileName: string | null): boolean {
		const record = this.records.get(contextName);
		if (!record || !this.known.has(contextName)) {
			return false;
		}
		if (profileName !== null && !record.profiles.has(profileName)) {
			return false;
		}
		record.active = profileName;
		return true;
	}

	private ensureContext(contextName: string): ContextRecord {
		let record = this.records.get(contextName);
		if (!record) {
			record = { name: contextName, profiles: new Map(), active: null };
			this.records.set(contextName, record);
		}
		if (!this.known.has(contextName)) {
			this.known.add(contextName);
			this.logger.debug('Context defined', { context: contextName });
		}
		return record;
	}
}

function toDescriptor(profile: ProfileRecord): ProfileDescriptor {
	return Object.freeze({
		name: profile.name,
		onActivate: profile.onActivate,
		onDeactivate: profile.onDeactivate,
	});
}

function validateName(kind: 'context' | 'profile', value: unknown): string {
	const result = NameSchema.safeParse(value);
	if (!result.success) {
		throw new InvalidNameError(kind, value);
	}
	return result.data;
}
