/**
 * Debug logging for wallet storage.
 *
 * Namespaces in use:
 *   wallet-storage:storage           per-record reads and writes (keys only)
 *   wallet-storage:manager           schema gate, registry, account manager data
 *   wallet-storage:handle            handle lifecycle
 *   wallet-storage:registry          plugin registration and adapter opening
 *   wallet-storage:config            config sources and the merged result
 *   wallet-storage:adapter:<engine>  engine open and close
 *
 * Record values and encryption keys are never passed to a logger.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'wallet-storage';

/**
 * Logger for `wallet-storage:<area>`. Use `.extend('error')` for failures.
 */
export function createLogger(area: string): debug.Debugger {
	return debug(`${ROOT_NAMESPACE}:${area}`);
}

/**
 * Turn logging on for a namespace filter, e.g. `wallet-storage:adapter:*`
 * or `wallet-storage:*,-wallet-storage:storage`.
 * A `sink` replaces the default stderr writer for every namespace.
 */
export function enableLogging(
	filter: string = `${ROOT_NAMESPACE}:*`,
	sink?: (...args: unknown[]) => void
): void {
	if (sink) {
		debug.log = sink;
	}
	debug.enable(filter);
}

export function disableLogging(): void {
	debug.disable();
}

/** `area` is relative to the root namespace, e.g. 'manager'. */
export function isLoggingEnabled(area: string): boolean {
	return debug.enabled(`${ROOT_NAMESPACE}:${area}`);
}
