import EventEmitter from 'events';
import { v4 as uuidv4 } from 'uuid';
import { logger as defaultLogger, type Logger } from '../logger/index.js';
import { ListenerFailureError, UnknownStageError } from '../errors/index.js';
import {
	isSwitchStage,
	type HookListener,
	type HookListenerOptions,
	type Subscription,
	type SwitchStage,
	type TransitionSnapshot,
} from './types.js';

export interface HookBusOptions {
	maxListeners?: number;
	enableLogging?: boolean;
	logger?: Logger;
}

interface RegisteredListener {
	stage: SwitchStage;
	wrapped: (snapshot: TransitionSnapshot) => void;
	detachAbort?: () => void;
}

/**
 * Publish/subscribe channel for switch lifecycle stages.
 *
 * Listeners of a stage run synchronously in registration order. A listener that
 * throws stops the publish and the error reaches the publisher as a
 * ListenerFailureError.
 */
export class HookBus {
	private emitter = new EventEmitter();
	private readonly enableLogging: boolean;
	private readonly logger: Logger;
	private subscriptions = new Map<string, RegisteredListener>();

	constructor(options: HookBusOptions = {}) {
		this.enableLogging = options.enableLogging ?? true;
		this.logger = options.logger ?? defaultLogger;
		// 0 lifts the emitter's leak warning; any number of listeners per stage is valid
		this.emitter.setMaxListeners(options.maxListeners ?? 0);
	}

	/**
	 * Register a listener for a stage
	 */
	subscribe(stage: SwitchStage, listener: HookListener, options: HookListenerOptions = {}): Subscription {
		if (!isSwitchStage(stage)) {
			throw new UnknownStageError(String(stage));
		}

		const subscription: Subscription = Object.freeze({ id: uuidv4(), stage });
		const wrapped = (snapshot: TransitionSnapshot): void => {
			if (options.once) {
				this.forget(subscription.id);
			}
			try {
				listener(snapshot);
			} catch (error) {
				throw new ListenerFailureError(snapshot.context, stage, error);
			}
		};

		const entry: RegisteredListener = { stage, wrapped };
		this.subscriptions.set(subscription.id, entry);

		if (options.once) {
			this.emitter.once(stage, wrapped);
		} else {
			this.emitter.on(stage, wrapped);
		}

		// Handle AbortController
		if (options.signal) {
			const signal = options.signal;
			if (signal.aborted) {
				this.unsubscribe(subscription);
				return subscription;
			}
			const onAbort = (): void => {
				this.unsubscribe(subscription);
			};
			signal.addEventListener('abort', onAbort, { once: true });
			entry.detachAbort = () => signal.removeEventListener('abort', onAbort);
		}

		return subscription;
	}

	/**
	 * Remove a listener. Returns false when the subscription is no longer registered.
	 */
	unsubscribe(subscription: Subscription): boolean {
		const entry = this.subscriptions.get(subscription.id);
		if (!entry) {
			return false;
		}

		this.emitter.off(entry.stage, entry.wrapped);
		this.forget(subscription.id);
		return true;
	}

	/**
	 * Invoke every listener of the snapshot's stage
	 */
	publish(snapshot: TransitionSnapshot): void {
		if (this.enableLogging) {
			this.logger.debug('Hook stage published', {
				context: snapshot.context,
				stage: snapshot.stage,
				listeners: this.listenerCountFor(snapshot.stage),
			});
		}

		this.emitter.emit(snapshot.stage, snapshot);
	}

	listenerCountFor(stage: SwitchStage): number {
		return this.emitter.listenerCount(stage);
	}

	/**
	 * Remove all listeners of one stage, or of every stage
	 */
	clear(stage?: SwitchStage): void {
		for (const [id, entry] of this.subscriptions) {
			if (stage === undefined || entry.stage === stage) {
				entry.detachAbort?.();
				this.subscriptions.delete(id);
			}
		}

		if (stage) {
			this.emitter.removeAllListeners(stage);
		} else {
			this.emitter.removeAllListeners();
		}
	}

	dispose(): void {
		this.clear();
	}

	private forget(id: string): void {
		const entry = this.subscriptions.get(id);
		if (entry) {
			entry.detachAbort?.();
			this.subscriptions.delete(id);
		}
	}
}
