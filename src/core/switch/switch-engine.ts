/**
 * Switch Engine
 *
 * Runs one profile transition within one context: the outgoing profile is fully
 * deactivated, with its hooks, before the requested profile is activated. Any
 * failure stops the sequence where it happened; whatever was committed to the
 * registry stays committed.
 */

import type { ContextRegistry } from '../context/registry.js';
import type { ProfileCallback } from '../context/types.js';
import {
	CallbackFailureError,
	ContextChangedError,
	ProfileError,
	SwitchInProgressError,
	UnknownProfileError,
	stringifyThrown,
	type ProfilePhase,
} from '../errors/index.js';
import type { HookBus } from '../hooks/hook-bus.js';
import { SwitchStages, type SwitchStage, type TransitionSnapshot } from '../hooks/types.js';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { TransitionState } from './transition-state.js';

const noop: ProfileCallback = () => {};

export interface SwitchEngineOptions {
	registry: ContextRegistry;
	hooks: HookBus;
	logger?: Logger;
}

export class SwitchEngine {
	private readonly registry: ContextRegistry;
	private readonly hooks: HookBus;
	private readonly logger: Logger;
	private readonly inFlight = new Map<string, TransitionState>();

	constructor(options: SwitchEngineOptions) {
		this.registry = options.registry;
		this.hooks = options.hooks;
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * Transition state of the switch running in a context, or null when idle
	 */
	getTransitionState(contextName: string): TransitionSnapshot | null {
		return this.inFlight.get(contextName)?.snapshot() ?? null;
	}

	isSwitching(contextName: string): boolean {
		return this.inFlight.has(contextName);
	}

	/**
	 * Deactivate the active profile of a context and activate the requested one
	 */
	activateProfile(contextName: string, profileName: string): void {
		if (this.inFlight.has(contextName)) {
			throw new SwitchInProgressError(contextName, profileName);
		}

		const incoming = this.registry.getProfile(contextName, profileName);
		if (!incoming) {
			this.logger.warn('Switch rejected: unknown profile', {
				context: contextName,
				profile: profileName,
			});
			throw new UnknownProfileError(contextName, profileName);
		}

		const state = new TransitionState(
			contextName,
			this.registry.getActiveProfile(contextName),
			profileName
		);
		const outgoingName = state.current;
		const outgoing = outgoingName === null ? undefined : this.registry.getProfile(contextName, outgoingName);
		const deactivate = outgoing?.onDeactivate ?? noop;
		const activate = incoming.onActivate;

		this.inFlight.set(contextName, state);

		try {
			this.enter(state, SwitchStages.BEFORE_SWITCH);
			this.enter(state, SwitchStages.BEFORE_DEACTIVATE);
			this.invoke(deactivate, state, outgoingName, 'deactivate');

			state.commitDeactivation();
			this.registry.setActiveProfile(contextName, null);

			this.enter(state, SwitchStages.AFTER_DEACTIVATE);
			this.enter(state, SwitchStages.BEFORE_ACTIVATE);
			this.invoke(activate, state, profileName, 'activate');

			// A callback or listener may have cleared the context meanwhile
			if (
				!this.registry.hasContext(contextName) ||
				!this.registry.getProfile(contextName, profileName)
			) {
				throw new ContextChangedError(contextName, profileName);
			}
			this.registry.setActiveProfile(contextName, profileName);
			state.commitActivation();

			this.enter(state, SwitchStages.AFTER_ACTIVATE);
			this.enter(state, SwitchStages.AFTER_SWITCH);
		} catch (error) {
			this.logger.error('Profile switch aborted', {
				context: contextName,
				from: outgoingName,
				to: profileName,
				stage: state.stage,
				active: this.registry.getActiveProfile(contextName),
				errorCode: error instanceof ProfileError ? error.errorCode : undefined,
				error: error instanceof Error ? error.message : stringifyThrown(error),
			});
			throw error;
		} finally {
			this.inFlight.delete(contextName);
		}

		this.logger.info(
			'Profile switched',
			{ context: contextName, from: outgoingName, to: profileName },
			'green'
		);
	}

	private enter(state: TransitionState, stage: SwitchStage): void {
		state.stage = stage;
		this.hooks.publish(state.snapshot());
	}

	private invoke(
		callback: ProfileCallback,
		state: TransitionState,
		profileName: string | null,
		phase: ProfilePhase
	): void {
		this.logger.debug(`Running ${phase} callback`, { context: state.context, profile: profileName });
		try {
			callback();
		} catch (error) {
			throw new CallbackFailureError(state.context, profileName, phase, error);
		}
	}
}
