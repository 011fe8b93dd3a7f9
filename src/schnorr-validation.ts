import { bytesToHex, randomBytes } from "@noble/hashes/utils.js";

export function cleanObject(
	data?: Record<string, unknown>,
): Record<string, unknown> | undefined {
	if (!data) return undefined;
	const cleaned: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(data)) {
		if (value === undefined) continue;
		cleaned[key] = value;
	}
	return cleaned;
}

export function generateSessionId(): string {
	return bytesToHex(randomBytes(16));
}

export function describeError(err: unknown): {
	error: string;
	message?: string;
	reason?: string;
} {
	if (!(err instanceof Error)) return { error: "UnknownError" };
	const reason =
		"reason" in err && typeof err.reason === "string" ? err.reason : undefined;
	return {
		error: err.name,
		message: err.message,
		...(reason !== undefined ? { reason } : {}),
	};
}
