import { bytesToHex } from "@noble/hashes/utils.js";
import {
	AUDIT_CODES,
	type AuditEmitter,
	type AuditLogger,
	createAuditEmitter,
	failureEntry,
} from "./schnorr-audit";
import { DecodeError, ProtocolError, TransportError } from "./schnorr-errors";
import {
	G_RISTRETTO255,
	type GroupElement,
	type Scalar,
	type SchnorrGroup,
} from "./schnorr-group-ristretto255";
import {
	type ChallengeMessage,
	decodeMessage,
	encodeMessage,
	expectMessageKind,
	type MessageOfKind,
	type ProtocolMessage,
} from "./schnorr-message";
import { generateSessionId } from "./schnorr-validation";
import type { LineStream } from "./transport";

export type VerifierState =
	| "awaiting-commit"
	| "challenging"
	| "awaiting-response"
	| "verified"
	| "rejected"
	| "aborted";

/** Terminal, non-error result of a completed exchange. */
export type VerificationOutcome = "verified" | "rejected";

export type VerifierSessionOptions = {
	/** The prover's public key `X`. */
	publicKey: GroupElement;
	group?: SchnorrGroup;
	audit?: AuditLogger;
	sessionId?: string;
};

export class VerifierSession {
	readonly sessionId: string;
	private readonly publicKey: GroupElement;
	private readonly group: SchnorrGroup;
	private readonly emitAudit: AuditEmitter;

	private currentState: VerifierState = "awaiting-commit";
	private commitment: GroupElement | undefined;
	private challenge: Scalar | undefined;

	constructor(options: VerifierSessionOptions) {
		this.publicKey = options.publicKey;
		this.group = options.group ?? G_RISTRETTO255;
		this.sessionId = options.sessionId ?? generateSessionId();
		this.emitAudit = createAuditEmitter(options.audit, this.sessionId);
		this.emitAudit({
			code: AUDIT_CODES.SCHNORR_SESSION_CREATED,
			level: "info",
			data: {
				role: "verifier",
				group: this.group.name,
				public_key: bytesToHex(this.group.pointToBytes(this.publicKey)),
			},
		});
	}

	get state(): VerifierState {
		return this.currentState;
	}

	/**
	 * Accept the prover's commitment `R` and issue a fresh challenge `c`.
	 *
	 * @throws ProtocolError when called out of order or with a non-commit message.
	 */
	receiveCommit(message: ProtocolMessage): ChallengeMessage {
		this.ensureState("awaiting-commit", "receiveCommit");
		const commitment = this.expectKind(message, "commit").point;
		this.commitment = commitment;
		this.emitAudit({
			code: AUDIT_CODES.SCHNORR_COMMIT_RECEIVED,
			level: "info",
			data: {
				commitment: bytesToHex(this.group.pointToBytes(commitment)),
			},
		});

		const challenge = this.group.randomScalar();
		this.challenge = challenge;
		this.currentState = "challenging";
		return { kind: "challenge", scalar: challenge };
	}

	/**
	 * Record that the challenge reached the transport; only then is a
	 * response accepted.
	 */
	markChallengeSent(): void {
		this.ensureState("challenging", "markChallengeSent");
		const { challenge } = this;
		if (challenge === undefined) {
			const err = new ProtocolError(
				"VerifierSession.markChallengeSent: challenge missing",
				{ reason: "unexpected-state" },
			);
			this.abort(err);
			throw err;
		}
		this.currentState = "awaiting-response";
		this.emitAudit({
			code: AUDIT_CODES.SCHNORR_CHALLENGE_SENT,
			level: "info",
			data: {
				challenge: bytesToHex(this.group.scalarToBytes(challenge)),
			},
		});
	}

	/**
	 * Check `s·G == R + c·X` for the prover's response `s`.
	 *
	 * A failed equation is reported as `"rejected"`, not thrown.
	 * @throws ProtocolError when called out of order or with a non-response message.
	 */
	receiveResponse(message: ProtocolMessage): VerificationOutcome {
		this.ensureState("awaiting-response", "receiveResponse");
		const response = this.expectKind(message, "response").scalar;
		const { commitment, challenge } = this;
		if (commitment === undefined || challenge === undefined) {
			const err = new ProtocolError(
				"VerifierSession.receiveResponse: commitment or challenge missing",
				{ reason: "unexpected-state" },
			);
			this.abort(err);
			throw err;
		}
		this.emitAudit({
			code: AUDIT_CODES.SCHNORR_RESPONSE_RECEIVED,
			level: "info",
			data: {
				response: bytesToHex(this.group.scalarToBytes(response)),
			},
		});

		const left = this.group.multiplyBase(response);
		const right = this.group.addPoints(
			commitment,
			this.group.multiply(this.publicKey, challenge),
		);
		const outcome: VerificationOutcome = this.group.pointsEqual(left, right)
			? "verified"
			: "rejected";

		this.commitment = undefined;
		this.challenge = undefined;
		this.currentState = outcome;
		if (outcome === "verified") {
			this.emitAudit({ code: AUDIT_CODES.SCHNORR_PROOF_VERIFIED, level: "info" });
		} else {
			this.emitAudit({ code: AUDIT_CODES.SCHNORR_PROOF_REJECTED, level: "security" });
		}
		return outcome;
	}

	abort(reason?: unknown): void {
		if (
			this.currentState === "aborted" ||
			this.currentState === "verified" ||
			this.currentState === "rejected"
		) {
			return;
		}
		this.commitment = undefined;
		this.challenge = undefined;
		this.currentState = "aborted";
		if (reason instanceof DecodeError) {
			this.emitAudit({
				code: AUDIT_CODES.SCHNORR_PEER_INVALID,
				level: "warn",
				data: {
					reason: reason.reason,
				},
			});
		}
		this.emitAudit(
			reason === undefined
				? { code: AUDIT_CODES.SCHNORR_SESSION_ABORTED, level: "error" }
				: failureEntry(AUDIT_CODES.SCHNORR_SESSION_ABORTED, reason),
		);
	}

	private expectKind<K extends "commit" | "response">(
		message: ProtocolMessage,
		kind: K,
	): MessageOfKind<K> {
		try {
			return expectMessageKind(message, kind);
		} catch (err) {
			this.abort(err);
			throw err;
		}
	}

	private ensureState(expected: VerifierState, op: string): void {
		if (this.currentState === expected) return;
		const err = new ProtocolError(
			`VerifierSession.${op}: expected state ${expected}, got ${this.currentState}`,
			{ reason: "unexpected-state" },
		);
		this.abort(err);
		throw err;
	}

}

export type VerifierRunResult = {
	sessionId: string;
	outcome: VerificationOutcome;
};

async function readRequiredLine(
	stream: LineStream,
	waitingFor: string,
): Promise<string> {
	const line = await stream.readLine();
	if (line === undefined) {
		throw new TransportError(
			`runVerifier: connection closed before ${waitingFor}`,
			{ reason: "closed" },
		);
	}
	return line;
}

/**
 * Run one verification over `stream` and close it.
 *
 * @throws DecodeError, ProtocolError or TransportError; the session is aborted first.
 */
export async function runVerifier(
	stream: LineStream,
	options: VerifierSessionOptions,
): Promise<VerifierRunResult> {
	const group = options.group ?? G_RISTRETTO255;
	const session = new VerifierSession(options);
	try {
		const commitLine = await readRequiredLine(stream, "commitment");
		const challenge = session.receiveCommit(decodeMessage(commitLine, group));
		await stream.writeLine(encodeMessage(challenge, group));
		session.markChallengeSent();

		const responseLine = await readRequiredLine(stream, "response");
		const outcome = session.receiveResponse(decodeMessage(responseLine, group));
		stream.close();
		return { sessionId: session.sessionId, outcome };
	} catch (err) {
		session.abort(err);
		stream.destroy();
		throw err;
	}
}
