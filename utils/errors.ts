export type SessionErrorKind = 'connection' | 'interaction' | 'unsupportedDevice';

/**
 * Base class for every failure raised by the session core
 */
export abstract class SessionError extends Error {
	abstract readonly kind: SessionErrorKind;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Both connect attempts failed, or the channel refused to disconnect
 */
export class ConnectionFailure extends SessionError {
	readonly kind = 'connection';
}

/**
 * An expected pattern never arrived, or the device answered with something unusable
 */
export class InteractionFailure extends SessionError {
	readonly kind = 'interaction';
}

/**
 * The version banner matched none of the known OS signatures
 */
export class UnsupportedDevice extends SessionError {
	readonly kind = 'unsupportedDevice';
}

export function isSessionError(error: unknown): error is SessionError {
	return error instanceof SessionError;
}
