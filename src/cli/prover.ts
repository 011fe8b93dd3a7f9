#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { clientTlsOptions, loadConfig } from "../config";
import { deriveKeyPair, publicKeyToHex } from "../schnorr-keys";
import { runProver } from "../prover-session";
import { connect } from "../transport";
import { ConsoleAuditLogger } from "./console-audit";

async function main(): Promise<void> {
	loadDotenv();
	const config = loadConfig();
	const keyPair = deriveKeyPair(config.secretSeed);
	console.info(`(Prover) Public key X: ${publicKeyToHex(keyPair.publicKey)}`);

	const stream = await connect({
		host: config.host,
		port: config.port,
		tls: clientTlsOptions(config),
		readTimeoutMs: config.readTimeoutMs,
	});
	const result = await runProver(stream, {
		keyPair,
		audit: new ConsoleAuditLogger("Prover"),
	});
	console.info(`(Prover) Sent commit R: ${result.commitment}`);
	console.info(`(Prover) Sent response s: ${result.response}`);
}

main().catch((err: unknown) => {
	console.error(
		`(Prover) ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`,
	);
	process.exitCode = 1;
});
