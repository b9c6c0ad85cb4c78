/**
 * Context name resolution
 * An explicit name wins, then the innermost scoped override, then the default
 */

import { logger as defaultLogger, type Logger } from '../logger/index.js';

export class ContextScope {
	private readonly overrides: string[] = [];
	private readonly logger: Logger;

	constructor(
		private readonly defaultContext: string,
		logger?: Logger
	) {
		this.logger = logger ?? defaultLogger;
	}

	/**
	 * The context operations fall back to when given no explicit name
	 */
	current(): string {
		return this.overrides[this.overrides.length - 1] ?? this.defaultContext;
	}

	/**
	 * Resolve the context an operation works on
	 */
	resolve(explicit?: string | null): string {
		const resolved = explicit ?? this.current();
		this.logger.debug('Context resolved', {
			context: resolved,
			source: explicit != null ? 'explicit' : this.overrides.length > 0 ? 'scope' : 'default',
		});
		return resolved;
	}

	/**
	 * Temporarily use a different current context
	 * @param contextName The context to use temporarily
	 * @param operation The operation to perform with the temporary context
	 * @returns The result of the operation
	 */
	run<T>(contextName: string, operation: () => T): T {
		this.overrides.push(contextName);

		try {
			return operation();
		} finally {
			this.overrides.pop();
		}
	}

	depth(): number {
		return this.overrides.length;
	}
}
