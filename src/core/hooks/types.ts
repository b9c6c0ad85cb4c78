// Lifecycle stages of a profile switch, in firing order
export const SwitchStages = {
	BEFORE_SWITCH: 'before-switch' as const,
	BEFORE_DEACTIVATE: 'before-deactivate' as const,
	AFTER_DEACTIVATE: 'after-deactivate' as const,
	BEFORE_ACTIVATE: 'before-activate' as const,
	AFTER_ACTIVATE: 'after-activate' as const,
	AFTER_SWITCH: 'after-switch' as const,
};

export type SwitchStage = (typeof SwitchStages)[keyof typeof SwitchStages];

export const SWITCH_STAGE_ORDER: readonly SwitchStage[] = [
	SwitchStages.BEFORE_SWITCH,
	SwitchStages.BEFORE_DEACTIVATE,
	SwitchStages.AFTER_DEACTIVATE,
	SwitchStages.BEFORE_ACTIVATE,
	SwitchStages.AFTER_ACTIVATE,
	SwitchStages.AFTER_SWITCH,
];

export function isSwitchStage(value: unknown): value is SwitchStage {
	return typeof value === 'string' && (SWITCH_STAGE_ORDER as readonly string[]).includes(value);
}

/**
 * Transition state of one switch as seen by a listener.
 */
export interface TransitionSnapshot {
	readonly context: string;
	readonly stage: SwitchStage;
	readonly previous: string | null;
	readonly current: string | null;
	readonly next: string | null;
}

export type HookListener = (snapshot: TransitionSnapshot) => void;

export interface HookListenerOptions {
	signal?: AbortSignal;
	once?: boolean;
}

export interface Subscription {
	readonly id: string;
	readonly stage: SwitchStage;
}
