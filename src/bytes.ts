export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	let diff = 0;
	for (let i = 0; i < a.length; i += 1) {
		const ai = a[i] ?? 0;
		const bi = b[i] ?? 0;
		diff |= ai ^ bi;
	}
	return diff === 0;
}

const HEX_RE = /^[0-9a-fA-F]*$/;

export function isHex(value: string): boolean {
	return HEX_RE.test(value);
}
