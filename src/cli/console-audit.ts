import type { AuditEvent, AuditLogger } from "../schnorr-audit";

export class ConsoleAuditLogger implements AuditLogger {
	constructor(private readonly label: string) {}

	audit(event: AuditEvent): void {
		const message = event.message !== undefined ? `: ${event.message}` : "";
		const data = event.data ? ` ${JSON.stringify(event.data)}` : "";
		const line = `${event.ts} (${this.label}) [${event.sessionId.slice(0, 8)}] ${event.level} ${event.code}${message}${data}`;
		if (event.level === "error") console.error(line);
		else if (event.level === "warn" || event.level === "security") console.warn(line);
		else console.info(line);
	}
}
