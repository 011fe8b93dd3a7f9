import net from "node:net";
import { afterEach, describe, expect, it, vi } from "vitest";
import { AUDIT_CODES } from "../src/schnorr-audit";
import { TransportError } from "../src/schnorr-errors";
import { deriveKeyPair } from "../src/schnorr-keys";
import { runProver } from "../src/prover-session";
import { connect, type LineServer, listen } from "../src/transport";
import { serveVerifier } from "../src/verifier-server";
import type { VerificationOutcome } from "../src/verifier-session";
import { CollectingAuditLogger } from "./helpers";

const HOST = "127.0.0.1";
const keyPair = deriveKeyPair("tcp-secret");

describe("serveVerifier over loopback TCP", () => {
	const servers: LineServer[] = [];

	afterEach(async () => {
		await Promise.all(servers.splice(0).map((server) => server.close()));
		vi.restoreAllMocks();
	});

	it("keeps verifying after a peer sends garbage", async () => {
		const audit = new CollectingAuditLogger();
		const outcomes: VerificationOutcome[] = [];
		const server = await serveVerifier({
			listen: { host: HOST, port: 0 },
			publicKey: keyPair.publicKey,
			audit,
			onOutcome: ({ outcome }) => outcomes.push(outcome),
		});
		servers.push(server);
		const { port } = server.address();
		expect(port).toBeGreaterThan(0);

		const garbage = await connect({ host: HOST, port });
		await garbage.writeLine("not a record");
		await vi.waitFor(() =>
			expect(audit.codes()).toContain(AUDIT_CODES.SCHNORR_CONNECTION_FAILED),
		);
		garbage.destroy();

		for (let i = 0; i < 3; i += 1) {
			const result = await runProver(await connect({ host: HOST, port }), { keyPair });
			expect(result.response).toMatch(/^[0-9a-f]{64}$/);
		}
		await vi.waitFor(() => expect(outcomes).toEqual(["verified", "verified", "verified"]));
	});

	it("serves concurrent provers independently", async () => {
		const outcomes: VerificationOutcome[] = [];
		const server = await serveVerifier({
			listen: { host: HOST, port: 0 },
			publicKey: keyPair.publicKey,
			onOutcome: ({ outcome }) => outcomes.push(outcome),
		});
		servers.push(server);
		const { port } = server.address();

		const impostor = deriveKeyPair("tcp-impostor");
		await Promise.all([
			connect({ host: HOST, port }).then((stream) => runProver(stream, { keyPair })),
			connect({ host: HOST, port }).then((stream) =>
				runProver(stream, { keyPair: impostor }),
			),
			connect({ host: HOST, port }).then((stream) => runProver(stream, { keyPair })),
		]);
		await vi.waitFor(() => expect(outcomes).toHaveLength(3));
		expect([...outcomes].sort()).toEqual(["rejected", "verified", "verified"]);
	});
});

describe("serveVerifier error reporting", () => {
	const servers: LineServer[] = [];

	afterEach(async () => {
		await Promise.all(servers.splice(0).map((server) => server.close()));
	});

	it("routes an onOutcome exception to onError", async () => {
		const audit = new CollectingAuditLogger();
		const errors: unknown[] = [];
		const server = await serveVerifier({
			listen: { host: HOST, port: 0 },
			publicKey: keyPair.publicKey,
			audit,
			onOutcome: () => {
				throw new Error("report sink down");
			},
			onError: (err) => errors.push(err),
		});
		servers.push(server);

		await runProver(await connect({ host: HOST, port: server.address().port }), {
			keyPair,
		});
		await vi.waitFor(() => expect(errors).toHaveLength(1));
		expect(errors[0]).toHaveProperty("message", "report sink down");
		expect(audit.codes()).not.toContain(AUDIT_CODES.SCHNORR_CONNECTION_FAILED);
	});
});

describe("listen", () => {
	const servers: LineServer[] = [];

	afterEach(async () => {
		await Promise.all(servers.splice(0).map((server) => server.close()));
		vi.restoreAllMocks();
	});

	function createdServer(spy: {
		mock: { results: Array<{ type: string; value: unknown }> };
	}): net.Server {
		const value = spy.mock.results[0]?.value;
		if (!(value instanceof net.Server)) throw new Error("no server was created");
		return value;
	}

	it("fails with a transport error when the port is taken", async () => {
		const first = await listen({ host: HOST, port: 0 }, () => undefined);
		servers.push(first);
		const { port } = first.address();

		const err = await listen({ host: HOST, port }, () => undefined).catch(
			(e: unknown) => e,
		);
		expect(err).toBeInstanceOf(TransportError);
		expect(err).toHaveProperty("reason", "io");
		expect(err).toHaveProperty(
			"message",
			expect.stringContaining(`listen: ${HOST}:${port}:`),
		);
	});

	it("hands errors raised after startup to onError", async () => {
		const createServer = vi.spyOn(net, "createServer");
		const errors: TransportError[] = [];
		const started = await listen(
			{ host: HOST, port: 0, onError: (err) => errors.push(err) },
			() => undefined,
		);
		servers.push(started);
		const server = createdServer(createServer);

		const cause = new Error("EMFILE");
		server.emit("error", cause);
		expect(errors).toHaveLength(1);
		expect(errors[0]?.message).toBe(`listen: ${HOST}:0: EMFILE`);
		expect(errors[0]?.cause).toBe(cause);
		expect(server.listenerCount("error")).toBe(1);
	});

	it("drops its startup error listener once listening", async () => {
		const createServer = vi.spyOn(net, "createServer");
		servers.push(await listen({ host: HOST, port: 0 }, () => undefined));
		expect(createdServer(createServer).listenerCount("error")).toBe(0);
	});
});

describe("connect", () => {
	it("refuses port 0", async () => {
		await expect(connect({ host: HOST, port: 0 })).rejects.toThrow(
			"connect: port must be between 1 and 65535, got 0",
		);
	});

	it("fails with a transport error when nothing listens", async () => {
		const server = await listen({ host: HOST, port: 0 }, () => undefined);
		const { port } = server.address();
		await server.close();

		const err = await connect({ host: HOST, port }).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(TransportError);
		expect(err).toHaveProperty("reason", "io");
	});
});
