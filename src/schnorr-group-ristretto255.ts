import { ristretto255 } from "@noble/curves/ed25519.js";
import { mod } from "@noble/curves/abstract/modular.js";
import { bytesToNumberLE, numberToBytesLE } from "@noble/curves/utils.js";
import { sha512 } from "@noble/hashes/sha2.js";
import { randomBytes } from "@noble/hashes/utils.js";
import { equalBytes } from "./bytes";
import { DecodeError } from "./schnorr-errors";

export type Scalar = bigint;
export type GroupElement = typeof ristretto255.Point.BASE;

/**
 * Prime-order group used by the identification protocol.
 *
 * Scalars are reduced representatives in `[0, order)`; every encoding is
 * fixed at {@link SchnorrGroup.encodedLength} bytes.
 */
export interface SchnorrGroup {
	name: string;
	order: bigint;
	encodedLength: number;
	generator: GroupElement;
	identity: GroupElement;
	scalarFromBytes(bytes: Uint8Array): Scalar;
	scalarToBytes(scalar: Scalar): Uint8Array;
	pointFromBytes(bytes: Uint8Array): GroupElement;
	pointToBytes(point: GroupElement): Uint8Array;
	hashToScalar(seed: Uint8Array): Scalar;
	randomScalar(): Scalar;
	addScalars(a: Scalar, b: Scalar): Scalar;
	mulScalars(a: Scalar, b: Scalar): Scalar;
	multiplyBase(scalar: Scalar): GroupElement;
	multiply(point: GroupElement, scalar: Scalar): GroupElement;
	addPoints(a: GroupElement, b: GroupElement): GroupElement;
	pointsEqual(a: GroupElement, b: GroupElement): boolean;
}

// ℓ = 2^252 + 27742317777372353535851937790883648493
const RISTRETTO255_ORDER =
	2n ** 252n + 27742317777372353535851937790883648493n;

export class Ristretto255Group implements SchnorrGroup {
	readonly name = "ristretto255";
	readonly order = RISTRETTO255_ORDER;
	readonly encodedLength = 32;
	readonly generator: GroupElement = ristretto255.Point.BASE;
	readonly identity: GroupElement = ristretto255.Point.ZERO;

	scalarFromBytes(bytes: Uint8Array): Scalar {
		this.assertLength("scalarFromBytes", bytes);
		return mod(bytesToNumberLE(bytes), this.order);
	}

	scalarToBytes(scalar: Scalar): Uint8Array {
		return numberToBytesLE(mod(scalar, this.order), this.encodedLength);
	}

	pointFromBytes(bytes: Uint8Array): GroupElement {
		if (bytes.length !== this.encodedLength) {
			throw new DecodeError(
				`Ristretto255Group.pointFromBytes: expected ${this.encodedLength} bytes, got ${bytes.length}`,
				{ reason: "invalid-hex-length" },
			);
		}
		try {
			return ristretto255.Point.fromBytes(bytes);
		} catch (err) {
			throw new DecodeError(
				"Ristretto255Group.pointFromBytes: bytes do not encode a group element",
				{ cause: err, reason: "invalid-point" },
			);
		}
	}

	pointToBytes(point: GroupElement): Uint8Array {
		return point.toBytes();
	}

	// 512-bit digest reduced mod order, demo key derivation only
	hashToScalar(seed: Uint8Array): Scalar {
		return mod(bytesToNumberLE(sha512(seed)), this.order);
	}

	randomScalar(): Scalar {
		return mod(bytesToNumberLE(randomBytes(64)), this.order);
	}

	addScalars(a: Scalar, b: Scalar): Scalar {
		return mod(a + b, this.order);
	}

	mulScalars(a: Scalar, b: Scalar): Scalar {
		return mod(a * b, this.order);
	}

	multiplyBase(scalar: Scalar): GroupElement {
		return this.multiply(this.generator, scalar);
	}

	multiply(point: GroupElement, scalar: Scalar): GroupElement {
		const reduced = mod(scalar, this.order);
		// noble rejects a zero multiplier
		if (reduced === 0n) return this.identity;
		return point.multiply(reduced);
	}

	addPoints(a: GroupElement, b: GroupElement): GroupElement {
		return a.add(b);
	}

	pointsEqual(a: GroupElement, b: GroupElement): boolean {
		return equalBytes(a.toBytes(), b.toBytes());
	}

	private assertLength(op: string, bytes: Uint8Array): void {
		if (bytes.length !== this.encodedLength) {
			throw new RangeError(
				`Ristretto255Group.${op}: expected ${this.encodedLength} bytes, got ${bytes.length}`,
			);
		}
	}
}

export const G_RISTRETTO255 = new Ristretto255Group();
