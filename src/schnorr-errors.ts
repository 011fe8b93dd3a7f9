export type DecodeErrorReason =
	| "malformed-record"
	| "invalid-hex"
	| "invalid-hex-length"
	| "invalid-point";

export type ProtocolErrorReason = "unexpected-kind" | "unexpected-state";

export type TransportErrorReason = "closed" | "io" | "timeout" | "line-too-long";

export class SchnorrError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "SchnorrError";
	}
}

export interface DecodeErrorOptions extends ErrorOptions {
	reason?: DecodeErrorReason;
}

export class DecodeError extends SchnorrError {
	readonly reason: DecodeErrorReason;

	constructor(message = "Schnorr: malformed record", options?: DecodeErrorOptions) {
		super(message, options);
		this.name = "DecodeError";
		this.reason = options?.reason ?? "malformed-record";
	}
}

export interface ProtocolErrorOptions extends ErrorOptions {
	reason?: ProtocolErrorReason;
}

export class ProtocolError extends SchnorrError {
	readonly reason: ProtocolErrorReason;

	constructor(
		message = "Schnorr: unexpected message",
		options?: ProtocolErrorOptions,
	) {
		super(message, options);
		this.name = "ProtocolError";
		this.reason = options?.reason ?? "unexpected-kind";
	}
}

export interface TransportErrorOptions extends ErrorOptions {
	reason?: TransportErrorReason;
}

export class TransportError extends SchnorrError {
	readonly reason: TransportErrorReason;

	constructor(
		message = "Schnorr: transport failure",
		options?: TransportErrorOptions,
	) {
		super(message, options);
		this.name = "TransportError";
		this.reason = options?.reason ?? "io";
	}
}
