/**
 * Error reporting helpers shared by the environment and its callers.
 */

import type {Logger} from './logger.js';

/**
 * Get a printable message from anything that was thrown.
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Log an error under the given component.
 * Non-Error values are wrapped so the entry always carries a stack.
 *
 * @param component - Component or context name (e.g., 'Environment', 'defineEnv')
 */
export function reportError(
	component: string,
	error: unknown,
	logger: Logger,
	context?: Record<string, unknown>,
): void {
	const message = describeError(error);
	logger.error(
		component,
		message,
		error instanceof Error ? error : new Error(message),
	);
	if (context) {
		logger.debug(component, 'Error context', context);
	}
}
