/**
 * Profile Errors
 *
 * Error classes for every way a registry, hook or switch operation can fail.
 * Wrapped failures keep the original error as the standard `cause`.
 */

import type { SwitchStage } from '../hooks/types.js';

export type ProfilePhase = 'activate' | 'deactivate';

/**
 * Base class for all profile-related errors
 */
export abstract class ProfileError extends Error {
	public readonly errorCode: string;
	public readonly timestamp: Date;

	constructor(message: string, errorCode: string, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
		this.errorCode = errorCode;
		this.timestamp = new Date();

		// Ensure the prototype chain is correct
		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * Convert error to a serializable object
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			errorCode: this.errorCode,
			timestamp: this.timestamp.toISOString(),
			cause: describeCause(this.cause),
		};
	}
}

/**
 * Thrown when a switch targets a profile that is not registered in the context
 */
export class UnknownProfileError extends ProfileError {
	constructor(
		public readonly contextName: string,
		public readonly profileName: string
	) {
		super(`Profile '${profileName}' is not defined in context '${contextName}'`, 'UNKNOWN_PROFILE');
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), contextName: this.contextName, profileName: this.profileName };
	}
}

/**
 * Thrown when an activate or deactivate callback raises
 */
export class CallbackFailureError extends ProfileError {
	constructor(
		public readonly contextName: string,
		public readonly profileName: string | null,
		public readonly phase: ProfilePhase,
		cause: unknown
	) {
		super(
			`The ${phase} callback of profile '${profileName ?? '<none>'}' in context '${contextName}' failed: ${describeCause(cause)}`,
			'CALLBACK_FAILURE',
			{ cause }
		);
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			contextName: this.contextName,
			profileName: this.profileName,
			phase: this.phase,
		};
	}
}

/**
 * Thrown when a hook listener raises
 */
export class ListenerFailureError extends ProfileError {
	constructor(
		public readonly contextName: string,
		public readonly stage: SwitchStage,
		cause: unknown
	) {
		super(
			`A '${stage}' listener failed while switching context '${contextName}': ${describeCause(cause)}`,
			'LISTENER_FAILURE',
			{ cause }
		);
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), contextName: this.contextName, stage: this.stage };
	}
}

/**
 * Thrown when a switch is requested for a context that is already switching
 */
export class SwitchInProgressError extends ProfileError {
	constructor(
		public readonly contextName: string,
		public readonly profileName: string
	) {
		super(
			`Cannot switch context '${contextName}' to '${profileName}' while another switch of that context is in progress`,
			'SWITCH_IN_PROGRESS'
		);
	}
}

export class UnknownStageError extends ProfileError {
	constructor(public readonly stage: string) {
		super(`Unknown hook stage '${stage}'`, 'UNKNOWN_STAGE');
	}
}

export class InvalidNameError extends ProfileError {
	constructor(
		public readonly kind: 'context' | 'profile',
		public readonly value: unknown
	) {
		super(`Invalid ${kind} name: ${describeValue(value)}`, 'INVALID_NAME');
	}
}

/**
 * Thrown when the context or the requested profile disappears while a switch
 * is running, before the requested profile is committed as active
 */
export class ContextChangedError extends ProfileError {
	constructor(
		public readonly contextName: string,
		public readonly profileName: string
	) {
		super(
			`Context '${contextName}' no longer holds profile '${profileName}'; the switch was not committed`,
			'CONTEXT_CHANGED'
		);
	}
}

export class InvalidConfigurationError extends ProfileError {
	constructor(public readonly issues: string[]) {
		super(`Invalid profiles configuration: ${issues.join('; ')}`, 'INVALID_CONFIGURATION');
	}
}

function describeCause(cause: unknown): string | undefined {
	if (cause === undefined) {
		return undefined;
	}
	return cause instanceof Error ? cause.message : stringifyThrown(cause);
}

/**
 * String form of any thrown value, including objects without a usable toString
 */
export function stringifyThrown(value: unknown): string {
	try {
		return String(value);
	} catch {
		return Object.prototype.toString.call(value);
	}
}

function describeValue(value: unknown): string {
	try {
		return JSON.stringify(value) ?? stringifyThrown(value);
	} catch {
		return stringifyThrown(value);
	}
}
