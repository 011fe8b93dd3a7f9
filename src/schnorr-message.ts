import { bytesToHex, hexToBytes } from "@noble/hashes/utils.js";
import { isHex } from "./bytes";
import { DecodeError, ProtocolError } from "./schnorr-errors";
import {
	G_RISTRETTO255,
	type GroupElement,
	type Scalar,
	type SchnorrGroup,
} from "./schnorr-group-ristretto255";

export const MESSAGE_KINDS = ["commit", "challenge", "response"] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

export type CommitMessage = { kind: "commit"; point: GroupElement };
export type ChallengeMessage = { kind: "challenge"; scalar: Scalar };
export type ResponseMessage = { kind: "response"; scalar: Scalar };

/**
 * Protocol message exchanged between prover and verifier.
 */
export type ProtocolMessage = CommitMessage | ChallengeMessage | ResponseMessage;

export type MessageOfKind<K extends MessageKind> = Extract<
	ProtocolMessage,
	{ kind: K }
>;

/**
 * Wire record, one JSON object per line.
 */
export interface WireRecord {
	kind: MessageKind;
	payload: string;
}

function isMessageKindName(value: string): value is MessageKind {
	return MESSAGE_KINDS.some((kind) => kind === value);
}

function payloadBytes(
	message: ProtocolMessage,
	group: SchnorrGroup,
): Uint8Array {
	switch (message.kind) {
		case "commit":
			return group.pointToBytes(message.point);
		case "challenge":
		case "response":
			return group.scalarToBytes(message.scalar);
	}
}

export function toWireRecord(
	message: ProtocolMessage,
	group: SchnorrGroup = G_RISTRETTO255,
): WireRecord {
	return { kind: message.kind, payload: bytesToHex(payloadBytes(message, group)) };
}

/**
 * Encode a message as a single line (without the trailing newline).
 */
export function encodeMessage(
	message: ProtocolMessage,
	group: SchnorrGroup = G_RISTRETTO255,
): string {
	const record = toWireRecord(message, group);
	// fixed key order keeps the line byte-for-byte deterministic
	return JSON.stringify({ kind: record.kind, payload: record.payload });
}

export function parseWireRecord(line: string): WireRecord {
	let parsed: unknown;
	try {
		parsed = JSON.parse(line);
	} catch (err) {
		throw new DecodeError("decodeMessage: line is not a JSON record", {
			cause: err,
			reason: "malformed-record",
		});
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		throw new DecodeError("decodeMessage: record must be a JSON object", {
			reason: "malformed-record",
		});
	}
	const kind: unknown = "kind" in parsed ? parsed.kind : undefined;
	const payload: unknown = "payload" in parsed ? parsed.payload : undefined;
	if (typeof kind !== "string" || !isMessageKindName(kind)) {
		throw new DecodeError(
			`decodeMessage: unknown record kind ${JSON.stringify(kind ?? null)}`,
			{ reason: "malformed-record" },
		);
	}
	if (typeof payload !== "string") {
		throw new DecodeError("decodeMessage: payload must be a string", {
			reason: "malformed-record",
		});
	}
	return { kind, payload };
}

function decodePayload(payload: string, group: SchnorrGroup): Uint8Array {
	if (!isHex(payload)) {
		throw new DecodeError("decodeMessage: payload is not hex", {
			reason: "invalid-hex",
		});
	}
	const expected = group.encodedLength * 2;
	if (payload.length !== expected) {
		throw new DecodeError(
			`decodeMessage: payload must be ${expected} hex chars, got ${payload.length}`,
			{ reason: "invalid-hex-length" },
		);
	}
	return hexToBytes(payload);
}

/**
 * Decode one line into a typed message.
 *
 * @throws DecodeError on malformed records, bad hex or an invalid commit point.
 */
export function decodeMessage(
	line: string,
	group: SchnorrGroup = G_RISTRETTO255,
): ProtocolMessage {
	const record = parseWireRecord(line);
	const bytes = decodePayload(record.payload, group);
	switch (record.kind) {
		case "commit":
			return { kind: "commit", point: group.pointFromBytes(bytes) };
		case "challenge":
			return { kind: "challenge", scalar: group.scalarFromBytes(bytes) };
		case "response":
			return { kind: "response", scalar: group.scalarFromBytes(bytes) };
	}
}

export function isMessageKind<K extends MessageKind>(
	message: ProtocolMessage,
	kind: K,
): message is MessageOfKind<K> {
	return message.kind === kind;
}

/**
 * @throws ProtocolError when the message is not of the expected kind.
 */
export function expectMessageKind<K extends MessageKind>(
	message: ProtocolMessage,
	kind: K,
): MessageOfKind<K> {
	if (!isMessageKind(message, kind)) {
		throw new ProtocolError(`expected ${kind}, got ${message.kind}`, {
			reason: "unexpected-kind",
		});
	}
	return message;
}
