// ============================================================================
// Logger contract shared by the library packages.
// Libraries take an optional Logger and stay silent without one; the CLI
// passes a console-backed logger.
// ============================================================================

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

const noop = (): void => {};

export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};
