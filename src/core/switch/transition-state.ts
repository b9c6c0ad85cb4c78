import { SwitchStages, type SwitchStage, type TransitionSnapshot } from '../hooks/types.js';

/**
 * Mutable previous/current/next triple of one switch. Lives only while the
 * switch runs.
 */
export class TransitionState {
	// Last stage entered
	stage: SwitchStage = SwitchStages.BEFORE_SWITCH;
	previous: string | null = null;
	current: string | null;
	next: string | null;

	constructor(
		readonly context: string,
		active: string | null,
		requested: string
	) {
		this.current = active;
		this.next = requested;
	}

	/**
	 * The outgoing profile is no longer active
	 */
	commitDeactivation(): void {
		this.previous = this.current;
		this.current = null;
	}

	/**
	 * The requested profile is now active
	 */
	commitActivation(): void {
		this.current = this.next;
		this.next = null;
	}

	snapshot(): TransitionSnapshot {
		return Object.freeze({
			context: this.context,
			stage: this.stage,
			previous: this.previous,
			current: this.current,
			next: this.next,
		});
	}
}
