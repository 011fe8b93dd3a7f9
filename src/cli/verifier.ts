#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { loadConfig, serverTlsOptions } from "../config";
import { deriveKeyPair, publicKeyFromHex, publicKeyToHex } from "../schnorr-keys";
import { serveVerifier } from "../verifier-server";
import { ConsoleAuditLogger } from "./console-audit";

async function main(): Promise<void> {
	loadDotenv();
	const config = loadConfig();
	// Without SCHNORR_PUBLIC_KEY the verifier re-derives the demo secret from
	// the shared seed and keeps only X.
	const publicKey =
		config.publicKeyHex !== undefined
			? publicKeyFromHex(config.publicKeyHex)
			: deriveKeyPair(config.secretSeed).publicKey;
	console.info(`(Verifier) Expected public key X: ${publicKeyToHex(publicKey)}`);

	const server = await serveVerifier({
		listen: {
			host: config.host,
			port: config.port,
			tls: serverTlsOptions(config),
			readTimeoutMs: config.readTimeoutMs,
		},
		publicKey,
		audit: new ConsoleAuditLogger("Verifier"),
		onOutcome: ({ outcome, remoteAddress }) => {
			if (outcome === "verified") {
				console.info(`(Verifier) PROOF VERIFIED for ${remoteAddress ?? "peer"}: s*G = R + c*X`);
			} else {
				console.warn(`(Verifier) PROOF FAILED for ${remoteAddress ?? "peer"}: s*G != R + c*X`);
			}
		},
		onError: (err) => {
			console.error(
				`(Verifier) ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`,
			);
		},
	});
	const { host, port } = server.address();
	console.info(`(Verifier) Listening on ${host}:${port}`);

	const shutdown = () => {
		server.close().then(
			() => process.exit(0),
			(err: unknown) => {
				console.error(`(Verifier) shutdown failed: ${String(err)}`);
				process.exit(1);
			},
		);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
	console.error(
		`(Verifier) ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`,
	);
	process.exitCode = 1;
});
