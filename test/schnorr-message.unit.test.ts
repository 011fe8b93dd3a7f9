import { describe, expect, it } from "vitest";
import { DecodeError, ProtocolError } from "../src/schnorr-errors";
import { G_RISTRETTO255 } from "../src/schnorr-group-ristretto255";
import {
	decodeMessage,
	encodeMessage,
	expectMessageKind,
	isMessageKind,
	parseWireRecord,
	toWireRecord,
} from "../src/schnorr-message";
import { ONE_HEX } from "./helpers";

const group = G_RISTRETTO255;
const BASE_HEX =
	"e2f2ae0a6abc4e71a884a961c500515f58e30b6aa582dd8db6a65945e08d2d76";

function decodeFailure(line: string): DecodeError {
	try {
		decodeMessage(line);
	} catch (err) {
		if (err instanceof DecodeError) return err;
		throw err;
	}
	throw new Error(`expected ${line} to fail decoding`);
}

describe("encodeMessage", () => {
	it("writes one compact record per message", () => {
		expect(encodeMessage({ kind: "challenge", scalar: 1n })).toBe(
			`{"kind":"challenge","payload":"${ONE_HEX}"}`,
		);
		expect(encodeMessage({ kind: "commit", point: group.generator })).toBe(
			`{"kind":"commit","payload":"${BASE_HEX}"}`,
		);
	});

	it("uses lowercase fixed-width hex", () => {
		const record = toWireRecord({ kind: "response", scalar: 0xabn });
		expect(record).toEqual({ kind: "response", payload: `ab${"00".repeat(31)}` });
	});
});

describe("decodeMessage", () => {
	it("round-trips every kind", () => {
		const point = group.multiplyBase(group.randomScalar());
		const scalar = group.randomScalar();

		const commit = decodeMessage(encodeMessage({ kind: "commit", point }));
		expect(commit.kind).toBe("commit");
		if (commit.kind !== "commit") throw new Error("unreachable");
		expect(group.pointsEqual(commit.point, point)).toBe(true);

		expect(decodeMessage(encodeMessage({ kind: "challenge", scalar }))).toEqual({
			kind: "challenge",
			scalar,
		});
		expect(decodeMessage(encodeMessage({ kind: "response", scalar }))).toEqual({
			kind: "response",
			scalar,
		});
	});

	it("accepts records with extra whitespace and uppercase hex", () => {
		const line = `{ "kind": "challenge", "payload": "${ONE_HEX.toUpperCase()}" }`;
		expect(decodeMessage(line)).toEqual({ kind: "challenge", scalar: 1n });
	});

	it("reduces scalar payloads modulo the order", () => {
		const orderHex =
			"edd3f55c1a631258d69cf7a2def9de1400000000000000000000000000000010";
		expect(decodeMessage(`{"kind":"response","payload":"${orderHex}"}`)).toEqual({
			kind: "response",
			scalar: 0n,
		});
	});

	it.each([
		["not json", "hello"],
		["a JSON array", "[]"],
		["JSON null", "null"],
		["an unknown kind", `{"kind":"hello","payload":"${ONE_HEX}"}`],
		["a missing kind", `{"payload":"${ONE_HEX}"}`],
		["a missing payload", `{"kind":"commit"}`],
		["a numeric payload", `{"kind":"challenge","payload":1}`],
	])("rejects %s as a malformed record", (_label, line) => {
		expect(decodeFailure(line).reason).toBe("malformed-record");
	});

	it("rejects payloads with non-hex characters", () => {
		const err = decodeFailure(`{"kind":"challenge","payload":"${"zz".repeat(32)}"}`);
		expect(err.reason).toBe("invalid-hex");
	});

	it.each([0, 62, 63, 66])("rejects a %i-char payload", (length) => {
		const err = decodeFailure(
			`{"kind":"response","payload":"${"a".repeat(length)}"}`,
		);
		expect(err.reason).toBe("invalid-hex-length");
		expect(err.message).toBe(
			`decodeMessage: payload must be 64 hex chars, got ${length}`,
		);
	});

	it("rejects commit payloads that are not group elements", () => {
		const err = decodeFailure(`{"kind":"commit","payload":"${ONE_HEX}"}`);
		expect(err.reason).toBe("invalid-point");
	});

	it("does not apply point validation to scalar payloads", () => {
		expect(decodeMessage(`{"kind":"challenge","payload":"${ONE_HEX}"}`)).toEqual({
			kind: "challenge",
			scalar: 1n,
		});
	});
});

describe("parseWireRecord", () => {
	it("keeps only kind and payload", () => {
		expect(
			parseWireRecord(`{"kind":"commit","payload":"ab","extra":true}`),
		).toEqual({ kind: "commit", payload: "ab" });
	});
});

describe("message kind checks", () => {
	it("narrows matching messages", () => {
		const message = decodeMessage(`{"kind":"challenge","payload":"${ONE_HEX}"}`);
		expect(isMessageKind(message, "challenge")).toBe(true);
		expect(isMessageKind(message, "response")).toBe(false);
		expect(expectMessageKind(message, "challenge").scalar).toBe(1n);
	});

	it("raises a protocol error on the wrong kind", () => {
		const message = decodeMessage(`{"kind":"response","payload":"${ONE_HEX}"}`);
		expect(() => expectMessageKind(message, "challenge")).toThrow(ProtocolError);
		expect(() => expectMessageKind(message, "challenge")).toThrow(
			"expected challenge, got response",
		);
	});
});
