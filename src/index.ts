export {
	DecodeError,
	ProtocolError,
	SchnorrError,
	TransportError,
} from "./schnorr-errors";
export {
	type GroupElement,
	G_RISTRETTO255,
	Ristretto255Group,
	type Scalar,
	type SchnorrGroup,
} from "./schnorr-group-ristretto255";
export {
	deriveKeyPair,
	type KeyPair,
	keyPairFromSecret,
	publicKeyFromHex,
	publicKeyToHex,
} from "./schnorr-keys";
export {
	decodeMessage,
	encodeMessage,
	expectMessageKind,
	isMessageKind,
	type ProtocolMessage,
	type WireRecord,
} from "./schnorr-message";
export {
	AUDIT_CODES,
	type AuditCode,
	type AuditEvent,
	type AuditLevel,
	type AuditLogger,
} from "./schnorr-audit";
export { ProverSession, runProver, type ProverState } from "./prover-session";
export {
	runVerifier,
	type VerificationOutcome,
	VerifierSession,
	type VerifierState,
} from "./verifier-session";
export { handleConnection, serveVerifier } from "./verifier-server";
export {
	connect,
	createLineStream,
	type LineServer,
	type LineStream,
	listen,
} from "./transport";
export { loadConfig, type SchnorrConfig } from "./config";
