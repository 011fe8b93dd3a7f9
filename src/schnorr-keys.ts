import { mod } from "@noble/curves/abstract/modular.js";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils.js";
import { isHex } from "./bytes";
import { DecodeError } from "./schnorr-errors";
import {
	G_RISTRETTO255,
	type GroupElement,
	type Scalar,
	type SchnorrGroup,
} from "./schnorr-group-ristretto255";

/**
 * Secret scalar `x` and its public element `X = x·G`.
 *
 * Only `publicKey` is ever encoded; `secret` stays inside the prover session.
 */
export interface KeyPair {
	secret: Scalar;
	publicKey: GroupElement;
}

export function keyPairFromSecret(
	secret: Scalar,
	group: SchnorrGroup = G_RISTRETTO255,
): KeyPair {
	const reduced = mod(secret, group.order);
	return { secret: reduced, publicKey: group.multiplyBase(reduced) };
}

/**
 * Derive a key pair from a seed string.
 *
 * Demo convenience: both parties can recompute `x` from the same seed. Real
 * deployments load the secret from key storage.
 */
export function deriveKeyPair(
	seed: string | Uint8Array,
	group: SchnorrGroup = G_RISTRETTO255,
): KeyPair {
	const seedBytes = typeof seed === "string" ? utf8ToBytes(seed) : seed;
	return keyPairFromSecret(group.hashToScalar(seedBytes), group);
}

export function publicKeyToHex(
	publicKey: GroupElement,
	group: SchnorrGroup = G_RISTRETTO255,
): string {
	return bytesToHex(group.pointToBytes(publicKey));
}

export function publicKeyFromHex(
	hex: string,
	group: SchnorrGroup = G_RISTRETTO255,
): GroupElement {
	if (!isHex(hex)) {
		throw new DecodeError("publicKeyFromHex: not a hex string", {
			reason: "invalid-hex",
		});
	}
	if (hex.length !== group.encodedLength * 2) {
		throw new DecodeError(
			`publicKeyFromHex: expected ${group.encodedLength * 2} hex chars, got ${hex.length}`,
			{ reason: "invalid-hex-length" },
		);
	}
	return group.pointFromBytes(hexToBytes(hex));
}
