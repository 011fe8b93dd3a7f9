import { readFileSync } from "node:fs";
import type { TlsClientOptions, TlsServerOptions } from "./transport";

export const DEMO_SECRET_SEED = "demo-prover-secret";

export type SchnorrConfig = {
	host: string;
	port: number;
	secretSeed: string;
	/** Verifier-side public key hex; when unset the key is derived from `secretSeed`. */
	publicKeyHex?: string;
	readTimeoutMs: number;
	tls: {
		certPath?: string;
		keyPath?: string;
		caPath?: string;
		servername?: string;
	};
};

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
	return value === undefined || value.trim() === "" ? undefined : value.trim();
}

function parseInteger(
	name: string,
	value: string | undefined,
	fallback: number,
	{ min, max }: { min: number; max: number },
): number {
	const raw = nonEmpty(value);
	if (raw === undefined) return fallback;
	if (!/^\d+$/.test(raw)) {
		throw new Error(`config: ${name} must be an integer, got "${raw}"`);
	}
	const parsed = Number.parseInt(raw, 10);
	if (parsed < min || parsed > max) {
		throw new RangeError(
			`config: ${name} must be between ${min} and ${max}, got ${parsed}`,
		);
	}
	return parsed;
}

function secretSeed(value: string | undefined): string {
	if (value === undefined) return DEMO_SECRET_SEED;
	if (value.trim() === "") {
		throw new Error("config: SCHNORR_SECRET_SEED must not be empty");
	}
	return value;
}

/**
 * Port 0 asks the verifier's listener for an ephemeral port; `connect`
 * rejects it, so a prover needs an explicit one.
 */
export function loadConfig(env: Env = process.env): SchnorrConfig {
	return {
		host: nonEmpty(env.SCHNORR_HOST) ?? "127.0.0.1",
		port: parseInteger("SCHNORR_PORT", env.SCHNORR_PORT, 4000, {
			min: 0,
			max: 65535,
		}),
		secretSeed: secretSeed(env.SCHNORR_SECRET_SEED),
		publicKeyHex: nonEmpty(env.SCHNORR_PUBLIC_KEY),
		readTimeoutMs: parseInteger(
			"SCHNORR_READ_TIMEOUT_MS",
			env.SCHNORR_READ_TIMEOUT_MS,
			30_000,
			{ min: 1, max: 86_400_000 },
		),
		tls: {
			certPath: nonEmpty(env.SCHNORR_TLS_CERT),
			keyPath: nonEmpty(env.SCHNORR_TLS_KEY),
			caPath: nonEmpty(env.SCHNORR_TLS_CA),
			servername: nonEmpty(env.SCHNORR_TLS_SERVERNAME),
		},
	};
}

export function serverTlsOptions(
	config: SchnorrConfig,
): TlsServerOptions | undefined {
	const { certPath, keyPath } = config.tls;
	if (certPath === undefined && keyPath === undefined) return undefined;
	if (certPath === undefined || keyPath === undefined) {
		throw new Error("config: SCHNORR_TLS_CERT and SCHNORR_TLS_KEY must be set together");
	}
	return { cert: readFileSync(certPath), key: readFileSync(keyPath) };
}

export function clientTlsOptions(
	config: SchnorrConfig,
): TlsClientOptions | undefined {
	const { caPath, servername } = config.tls;
	if (caPath === undefined) return undefined;
	return { ca: readFileSync(caPath), servername };
}
