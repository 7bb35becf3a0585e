import debug from 'debug';

const BASE_NAMESPACE = 'flatplan';

/** `createLogger('decorrelate:driver')` logs under `flatplan:decorrelate:driver`. */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Turns on the namespaces matching `pattern`, e.g. `flatplan:decorrelate:rule:*`
 * for rule applications only. `logFn` replaces the stderr sink and receives
 * debug's unformatted arguments.
 */
export function enableLogging(pattern = `${BASE_NAMESPACE}:*`, logFn?: (...args: unknown[]) => void): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

export function disableLogging(): void {
	debug.disable();
}

/** `namespace` is given without the `flatplan:` prefix. */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
