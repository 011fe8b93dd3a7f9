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
import type { KeyPair } from "./schnorr-keys";
import {
	type CommitMessage,
	decodeMessage,
	encodeMessage,
	expectMessageKind,
	type ProtocolMessage,
	type ResponseMessage,
	toWireRecord,
} from "./schnorr-message";
import { generateSessionId } from "./schnorr-validation";
import type { LineStream } from "./transport";

/**
 * `committing` and `responding` hold an outbound message until the transport
 * confirms the write through {@link ProverSession.markSent}.
 */
export type ProverState =
	| "init"
	| "committing"
	| "commit-sent"
	| "responding"
	| "done"
	| "aborted";

export type ProverSessionOptions = {
	keyPair: KeyPair;
	group?: SchnorrGroup;
	audit?: AuditLogger;
	sessionId?: string;
};

/**
 * Prover side of one commit/challenge/response exchange.
 *
 * A session is single use: the nonce drawn in {@link ProverSession.start}
 * answers exactly one challenge and is dropped afterwards.
 */
export class ProverSession {
	readonly sessionId: string;
	private readonly keyPair: KeyPair;
	private readonly group: SchnorrGroup;
	private readonly emitAudit: AuditEmitter;

	private currentState: ProverState = "init";
	private nonce: Scalar | undefined;
	private commitmentValue: GroupElement | undefined;
	private pendingResponse: Scalar | undefined;

	constructor(options: ProverSessionOptions) {
		this.keyPair = options.keyPair;
		this.group = options.group ?? G_RISTRETTO255;
		this.sessionId = options.sessionId ?? generateSessionId();
		this.emitAudit = createAuditEmitter(options.audit, this.sessionId);
		this.emitAudit({
			code: AUDIT_CODES.SCHNORR_SESSION_CREATED,
			level: "info",
			data: {
				role: "prover",
				group: this.group.name,
			},
		});
	}

	get state(): ProverState {
		return this.currentState;
	}

	get commitment(): GroupElement | undefined {
		return this.commitmentValue;
	}

	/**
	 * Draw a fresh nonce `k` and produce the commitment `R = k·G`.
	 *
	 * @throws ProtocolError if the session has already started.
	 */
	start(): CommitMessage {
		this.ensureState("init", "start");
		const k = this.group.randomScalar();
		const commitment = this.group.multiplyBase(k);
		this.nonce = k;
		this.commitmentValue = commitment;
		this.currentState = "committing";
		return { kind: "commit", point: commitment };
	}

	/**
	 * Answer the verifier's challenge with `s = k + c·x mod order`.
	 *
	 * @throws ProtocolError when called out of order or with a non-challenge message.
	 */
	receive(message: ProtocolMessage): ResponseMessage {
		this.ensureState("commit-sent", "receive");
		let challenge: Scalar;
		try {
			challenge = expectMessageKind(message, "challenge").scalar;
		} catch (err) {
			this.abort(err);
			throw err;
		}
		const k = this.nonce;
		if (k === undefined) {
			const err = new ProtocolError("ProverSession.receive: nonce missing", {
				reason: "unexpected-state",
			});
			this.abort(err);
			throw err;
		}
		this.emitAudit({
			code: AUDIT_CODES.SCHNORR_CHALLENGE_RECEIVED,
			level: "info",
			data: {
				challenge: bytesToHex(this.group.scalarToBytes(challenge)),
			},
		});

		const s = this.group.addScalars(
			k,
			this.group.mulScalars(challenge, this.keyPair.secret),
		);
		this.nonce = undefined;
		this.pendingResponse = s;
		this.currentState = "responding";
		return { kind: "response", scalar: s };
	}

	/**
	 * Record that the outbound commit or response reached the transport.
	 *
	 * @throws ProtocolError when nothing is waiting to be sent.
	 */
	markSent(): void {
		if (this.currentState === "committing" && this.commitmentValue) {
			this.currentState = "commit-sent";
			this.emitAudit({
				code: AUDIT_CODES.SCHNORR_COMMIT_SENT,
				level: "info",
				data: {
					commitment: bytesToHex(this.group.pointToBytes(this.commitmentValue)),
				},
			});
			return;
		}
		if (this.currentState === "responding" && this.pendingResponse !== undefined) {
			const s = this.pendingResponse;
			this.pendingResponse = undefined;
			this.currentState = "done";
			this.emitAudit({
				code: AUDIT_CODES.SCHNORR_RESPONSE_SENT,
				level: "info",
				data: {
					response: bytesToHex(this.group.scalarToBytes(s)),
				},
			});
			return;
		}
		const err = new ProtocolError(
			`ProverSession.markSent: nothing to send in state ${this.currentState}`,
			{ reason: "unexpected-state" },
		);
		this.abort(err);
		throw err;
	}

	/**
	 * Move to `aborted` and drop the nonce. Idempotent for finished sessions.
	 */
	abort(reason?: unknown): void {
		if (this.currentState === "aborted" || this.currentState === "done") return;
		this.nonce = undefined;
		this.pendingResponse = undefined;
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

	private ensureState(expected: ProverState, op: string): void {
		if (this.currentState === expected) return;
		const err = new ProtocolError(
			`ProverSession.${op}: expected state ${expected}, got ${this.currentState}`,
			{ reason: "unexpected-state" },
		);
		this.abort(err);
		throw err;
	}

}

export type ProverRunResult = {
	sessionId: string;
	commitment: string;
	response: string;
};

/**
 * Run one full proof over `stream` and close it.
 *
 * @throws DecodeError, ProtocolError or TransportError; the session is aborted first.
 */
export async function runProver(
	stream: LineStream,
	options: ProverSessionOptions,
): Promise<ProverRunResult> {
	const group = options.group ?? G_RISTRETTO255;
	const session = new ProverSession(options);
	try {
		const commit = session.start();
		await stream.writeLine(encodeMessage(commit, group));
		session.markSent();

		const line = await stream.readLine();
		if (line === undefined) {
			throw new TransportError(
				"runProver: connection closed before challenge",
				{ reason: "closed" },
			);
		}
		const response = session.receive(decodeMessage(line, group));
		await stream.writeLine(encodeMessage(response, group));
		session.markSent();
		stream.close();

		return {
			sessionId: session.sessionId,
			commitment: toWireRecord(commit, group).payload,
			response: toWireRecord(response, group).payload,
		};
	} catch (err) {
		session.abort(err);
		stream.destroy();
		throw err;
	}
}
