// src/termoweb/logger.ts

/**
 * Printf-style sink shared by the cloud layer. The platform passes the
 * Homebridge logger; standalone use falls back to the console.
 */
export interface TermoWebLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createDefaultLogger(tag: string): TermoWebLogger {
	const prefix = `[${tag}]`;
	return {
		debug: (...args: unknown[]) => console.debug(prefix, ...args),
		info: (...args: unknown[]) => console.info(prefix, ...args),
		warn: (...args: unknown[]) => console.warn(prefix, ...args),
		error: (...args: unknown[]) => console.error(prefix, ...args),
	};
}

// Bearer tokens show up in handshake URLs and in some error bodies.
export function redactToken(text: string): string {
	return text
		.replace(/Bearer\s+[^\s"']+/gi, 'Bearer ***')
		.replace(/([?&]token=)[^&\s"']+/gi, '$1***');
}
