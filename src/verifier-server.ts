import {
	AUDIT_CODES,
	type AuditLogger,
	createAuditEmitter,
	failureEntry,
} from "./schnorr-audit";
import type { GroupElement, SchnorrGroup } from "./schnorr-group-ristretto255";
import { generateSessionId } from "./schnorr-validation";
import { type LineServer, type LineStream, type ListenOptions, listen } from "./transport";
import { runVerifier, type VerifierRunResult } from "./verifier-session";

export type VerifierServerOptions = {
	listen: ListenOptions;
	publicKey: GroupElement;
	group?: SchnorrGroup;
	audit?: AuditLogger;
	onOutcome?: (result: VerifierRunResult & { remoteAddress?: string }) => void;
	/**
	 * Receives what `onOutcome` throws and listener errors after startup.
	 * Without it those errors are rethrown and left unhandled.
	 */
	onError?: (err: unknown) => void;
};

/**
 * Run a verifier session for one accepted stream.
 *
 * Session failures are audited as `SCHNORR_CONNECTION_FAILED` and resolve to
 * `undefined`; they never reach the listener. `onOutcome` runs only for
 * completed sessions, and whatever it throws propagates to the caller.
 */
export async function handleConnection(
	stream: LineStream,
	options: Omit<VerifierServerOptions, "listen" | "onError">,
): Promise<VerifierRunResult | undefined> {
	const sessionId = generateSessionId();
	let result: VerifierRunResult;
	try {
		result = await runVerifier(stream, {
			publicKey: options.publicKey,
			group: options.group,
			audit: options.audit,
			sessionId,
		});
	} catch (err) {
		createAuditEmitter(options.audit, sessionId)(
			failureEntry(AUDIT_CODES.SCHNORR_CONNECTION_FAILED, err, {
				remote: stream.remoteAddress,
			}),
		);
		return undefined;
	}
	options.onOutcome?.({ ...result, remoteAddress: stream.remoteAddress });
	return result;
}

/**
 * Listen for provers; every connection gets its own isolated session.
 */
export function serveVerifier(options: VerifierServerOptions): Promise<LineServer> {
	const { listen: listenOptions, onError, ...sessionOptions } = options;
	const report = (err: unknown) => {
		if (!onError) throw err;
		onError(err);
	};
	return listen(
		{ ...listenOptions, onError: listenOptions.onError ?? onError },
		(stream) => {
			void handleConnection(stream, sessionOptions).catch(report);
		},
	);
}
