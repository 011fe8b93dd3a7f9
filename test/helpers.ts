import { Duplex, PassThrough } from "node:stream";
import type { AuditEvent, AuditLogger } from "../src/schnorr-audit";
import { Ristretto255Group, type Scalar } from "../src/schnorr-group-ristretto255";
import { createLineStream, type LineStream, type LineStreamOptions } from "../src/transport";

export function expectDefined<T>(value: T | undefined, label = "value"): T {
	if (value === undefined) {
		throw new Error(`Expected ${label} to be defined`);
	}
	return value;
}

export class CollectingAuditLogger implements AuditLogger {
	readonly events: AuditEvent[] = [];

	audit(event: AuditEvent): void {
		this.events.push(event);
	}

	codes(): string[] {
		return this.events.map((event) => event.code);
	}
}

/**
 * ristretto255 whose `randomScalar` replays the given values in order.
 */
export class FixedScalarGroup extends Ristretto255Group {
	private readonly queue: Scalar[];

	constructor(...values: Scalar[]) {
		super();
		this.queue = values;
	}

	override randomScalar(): Scalar {
		const next = this.queue.shift();
		if (next === undefined) {
			throw new Error("FixedScalarGroup: no scalar left");
		}
		return next;
	}
}

/**
 * Two connected in-memory line streams, standing in for a socket pair.
 */
export function createLinePair(
	options: LineStreamOptions = {},
): [LineStream, LineStream] {
	const aToB = new PassThrough();
	const bToA = new PassThrough();
	const a = Duplex.from({ readable: bToA, writable: aToB });
	const b = Duplex.from({ readable: aToB, writable: bToA });
	return [createLineStream(a, options), createLineStream(b, options)];
}

/**
 * A line stream whose `failingWrite`-th write (1-based) errors like a reset
 * socket. `deliver` queues an inbound line; `written` collects what got out.
 */
export function createWriteFailingStream(failingWrite: number): {
	stream: LineStream;
	deliver: (line: string) => void;
	written: string[];
} {
	const written: string[] = [];
	let writes = 0;
	const duplex = new Duplex({
		read() {},
		write(chunk: Buffer, _encoding, callback) {
			writes += 1;
			if (writes === failingWrite) {
				callback(new Error("EPIPE"));
				return;
			}
			written.push(chunk.toString("utf8"));
			callback();
		},
	});
	return {
		stream: createLineStream(duplex),
		deliver: (line) => {
			duplex.push(`${line}\n`);
		},
		written,
	};
}

export function flipBit(bytes: Uint8Array, bit: number): Uint8Array {
	const out = bytes.slice();
	const index = bit >>> 3;
	out[index] = (out[index] ?? 0) ^ (1 << (bit & 7));
	return out;
}

export const ZERO_HEX = "00".repeat(32);
export const ONE_HEX = `01${"00".repeat(31)}`;
