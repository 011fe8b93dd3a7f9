import { cleanObject, describeError } from "./schnorr-validation";

export type AuditLevel = "info" | "warn" | "error" | "security";

export const AUDIT_CODES = Object.freeze({
	SCHNORR_SESSION_CREATED: "SCHNORR_SESSION_CREATED",
	SCHNORR_COMMIT_SENT: "SCHNORR_COMMIT_SENT",
	SCHNORR_COMMIT_RECEIVED: "SCHNORR_COMMIT_RECEIVED",
	SCHNORR_CHALLENGE_SENT: "SCHNORR_CHALLENGE_SENT",
	SCHNORR_CHALLENGE_RECEIVED: "SCHNORR_CHALLENGE_RECEIVED",
	SCHNORR_RESPONSE_SENT: "SCHNORR_RESPONSE_SENT",
	SCHNORR_RESPONSE_RECEIVED: "SCHNORR_RESPONSE_RECEIVED",
	SCHNORR_PROOF_VERIFIED: "SCHNORR_PROOF_VERIFIED",
	SCHNORR_PROOF_REJECTED: "SCHNORR_PROOF_REJECTED",
	SCHNORR_SESSION_ABORTED: "SCHNORR_SESSION_ABORTED",
	SCHNORR_PEER_INVALID: "SCHNORR_PEER_INVALID",
	SCHNORR_CONNECTION_FAILED: "SCHNORR_CONNECTION_FAILED",
} as const);

export type AuditCode = (typeof AUDIT_CODES)[keyof typeof AUDIT_CODES];

/**
 * One structured record of what a session did.
 *
 * `data` only ever holds public protocol values (R, c, s, X) and error
 * metadata; secrets and nonces never reach it.
 */
export type AuditEvent = {
	ts: string;
	sessionId: string;
	level: AuditLevel;
	code: AuditCode;
	/** Human-readable failure text, set for aborts and failed connections. */
	message?: string;
	data?: Record<string, unknown>;
};

export interface AuditLogger {
	audit(event: AuditEvent): void | Promise<void>;
}

/** What a caller supplies; the emitter stamps `ts` and `sessionId`. */
export type AuditEntry = Omit<AuditEvent, "ts" | "sessionId">;

export type AuditEmitter = (entry: AuditEntry) => void;

/**
 * Bind `logger` to one session. Without a logger the emitter is a no-op.
 */
export function createAuditEmitter(
	logger: AuditLogger | undefined,
	sessionId: string,
): AuditEmitter {
	return (entry) => {
		if (!logger) return;
		const data = cleanObject(entry.data);
		void logger.audit({
			ts: new Date().toISOString(),
			sessionId,
			level: entry.level,
			code: entry.code,
			...(entry.message !== undefined ? { message: entry.message } : {}),
			...(data ? { data } : {}),
		});
	};
}

/**
 * Error-level entry for `err`: its text becomes the event message, its
 * class name and `reason` go into `data` next to `extra`.
 */
export function failureEntry(
	code: AuditCode,
	err: unknown,
	extra?: Record<string, unknown>,
): AuditEntry {
	const { message, ...described } = describeError(err);
	return {
		code,
		level: "error",
		message,
		data: { ...extra, ...described },
	};
}
