export type ErrorKind =
	| "UnknownAction"
	| "AmbiguousAction"
	| "InvalidDeviceId"
	| "InvalidRequest"
	| "NoResponse"
	| "AmbiguousOutcome"
	| "ExecutionError"
	| "Transport";

/**
 * Kinds a device may put in a failure reply
 */
export type RemoteErrorKind = Extract<
	ErrorKind,
	"UnknownAction" | "ExecutionError" | "InvalidRequest"
>;

export abstract class OrbError extends Error {
	abstract readonly kind: ErrorKind;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** A token, topic or failure reply names an action that is not registered */
export class UnknownActionError extends OrbError {
	readonly kind = "UnknownAction";
}

/** Two registered actions share a token or a topic path */
export class AmbiguousActionError extends OrbError {
	readonly kind = "AmbiguousAction";
}

export class InvalidDeviceIdError extends OrbError {
	readonly kind = "InvalidDeviceId";

	constructor(id: string) {
		super(
			`Invalid device id '${id}'. Ids must be non-empty and contain no '/', wildcards or whitespace`,
		);
	}
}

/** The device could not make sense of the request */
export class InvalidRequestError extends OrbError {
	readonly kind = "InvalidRequest";
}

/** An addressed query received no reply within the timeout */
export class NoResponseError extends OrbError {
	readonly kind = "NoResponse";
}

/**
 * An addressed command received no reply within the timeout. The command
 * may or may not have been executed.
 */
export class AmbiguousOutcomeError extends OrbError {
	readonly kind = "AmbiguousOutcome";
}

/** The device failed to perform the action */
export class ExecutionError extends OrbError {
	readonly kind = "ExecutionError";
}

/** Publishing, subscribing or decoding failed below the protocol */
export class TransportError extends OrbError {
	readonly kind = "Transport";
}
