/**
 * Profile Manager
 *
 * Public entry point: owns a registry, a hook bus, a switch engine and a
 * context scope. Every operation that takes an optional context name resolves
 * it through the scope.
 */

import {
	loadProfilesConfig,
	type ProfilesConfig,
	type ProfilesConfigInput,
} from '../config/profiles-config.schema.js';
import { ContextScope } from '../context/context-scope.js';
import { ContextRegistry } from '../context/registry.js';
import type { ProfileCallback, ProfileDescriptor } from '../context/types.js';
import { HookBus } from '../hooks/hook-bus.js';
import type {
	HookListener,
	HookListenerOptions,
	Subscription,
	SwitchStage,
	TransitionSnapshot,
} from '../hooks/types.js';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { SwitchEngine } from '../switch/switch-engine.js';

export interface ProfileManagerOptions {
	config?: ProfilesConfigInput;
	logger?: Logger;
	/** Log every published hook stage at debug level */
	traceHooks?: boolean;
}

export class ProfileManager {
	readonly config: ProfilesConfig;
	private readonly logger: Logger;
	private readonly registry: ContextRegistry;
	private readonly hooks: HookBus;
	private readonly engine: SwitchEngine;
	private readonly scope: ContextScope;

	constructor(options: ProfileManagerOptions = {}) {
		this.config = loadProfilesConfig(options.config);
		this.logger = options.logger ?? defaultLogger;
		this.registry = new ContextRegistry({ logger: this.logger });
		this.hooks = new HookBus({ logger: this.logger, enableLogging: options.traceHooks ?? true });
		this.engine = new SwitchEngine({
			registry: this.registry,
			hooks: this.hooks,
			logger: this.logger,
		});
		this.scope = new ContextScope(this.config.defaultContext, this.logger);
	}

	// ===== Registry =====

	defineContext(contextName?: string): void {
		this.registry.defineContext(this.scope.resolve(contextName));
	}

	clearContext(contextName?: string): void {
		this.registry.clearContext(this.scope.resolve(contextName));
	}

	clearAllContexts(): void {
		this.registry.clearAllContexts();
	}

	listContexts(): string[] {
		return this.registry.listContexts();
	}

	addProfile(
		contextName: string | undefined,
		profileName: string,
		onActivate?: ProfileCallback,
		onDeactivate?: ProfileCallback
	): void {
		this.registry.addProfile(this.scope.resolve(contextName), profileName, onActivate, onDeactivate);
	}

	listProfiles(contextName?: string): readonly ProfileDescriptor[] {
		return this.registry.listProfiles(this.scope.resolve(contextName));
	}

	getActiveProfile(contextName?: string): string | null {
		return this.registry.getActiveProfile(this.scope.resolve(contextName));
	}

	// ===== Switching =====

	switchProfile(contextName: string | undefined, profileName: string): void {
		this.engine.activateProfile(this.scope.resolve(contextName), profileName);
	}

	getTransitionState(contextName?: string): TransitionSnapshot | null {
		return this.engine.getTransitionState(this.scope.resolve(contextName));
	}

	// ===== Hooks =====

	subscribe(stage: SwitchStage, listener: HookListener, options?: HookListenerOptions): Subscription {
		return this.hooks.subscribe(stage, listener, options);
	}

	unsubscribe(subscription: Subscription): boolean {
		return this.hooks.unsubscribe(subscription);
	}

	// ===== Scope =====

	/**
	 * Run an operation with `contextName` as the current context
	 */
	withContext<T>(contextName: string, operation: () => T): T {
		return this.scope.run(contextName, operation);
	}

	currentContext(): string {
		return this.scope.current();
	}

	dispose(): void {
		this.hooks.dispose();
		this.registry.clearAllContexts();
	}
}

export const createProfileManager = (options: ProfileManagerOptions = {}): ProfileManager => {
	return new ProfileManager(options);
};
