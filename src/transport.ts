import net from "node:net";
import type { Duplex } from "node:stream";
import tls from "node:tls";
import { TransportError } from "./schnorr-errors";

/**
 * Ordered, reliable, newline-framed channel between the two parties.
 */
export interface LineStream {
	readonly remoteAddress?: string;
	/** Resolves with the next line, or `undefined` once the peer has ended the stream. */
	readLine(): Promise<string | undefined>;
	/** Resolves once the line has been handed to the underlying socket. */
	writeLine(line: string): Promise<void>;
	/** Half-close after pending writes flush. */
	close(): void;
	destroy(): void;
}

export type LineStreamOptions = {
	readTimeoutMs?: number;
	maxLineLength?: number;
	remoteAddress?: string;
};

// commit/challenge/response records are ~90 chars
const DEFAULT_MAX_LINE_LENGTH = 4096;

type PendingRead = {
	resolve: (line: string | undefined) => void;
	reject: (err: Error) => void;
};

class DuplexLineStream implements LineStream {
	readonly remoteAddress: string | undefined;
	private readonly maxLineLength: number;
	private readonly readTimeoutMs: number | undefined;
	private buffered = "";
	private readonly lines: string[] = [];
	private readonly pending: PendingRead[] = [];
	private ended = false;
	private failure: TransportError | undefined;

	constructor(
		private readonly duplex: Duplex,
		options: LineStreamOptions,
	) {
		this.remoteAddress = options.remoteAddress;
		this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
		this.readTimeoutMs = options.readTimeoutMs;
		duplex.setEncoding("utf8");
		duplex.on("data", (chunk: string) => this.onData(chunk));
		duplex.on("end", () => this.onEnd());
		duplex.on("close", () => this.onEnd());
		duplex.on("error", (err: Error) =>
			this.fail(
				new TransportError(`LineStream: ${err.message}`, {
					cause: err,
					reason: "io",
				}),
			),
		);
	}

	readLine(): Promise<string | undefined> {
		const line = this.lines.shift();
		if (line !== undefined) return Promise.resolve(line);
		if (this.failure) return Promise.reject(this.failure);
		if (this.ended) return Promise.resolve(undefined);

		return new Promise((resolve, reject) => {
			let timer: NodeJS.Timeout | undefined;
			const entry: PendingRead = {
				resolve: (value) => {
					if (timer) clearTimeout(timer);
					resolve(value);
				},
				reject: (err) => {
					if (timer) clearTimeout(timer);
					reject(err);
				},
			};
			if (this.readTimeoutMs !== undefined) {
				timer = setTimeout(() => {
					this.fail(
						new TransportError(
							`LineStream: no line received within ${this.readTimeoutMs} ms`,
							{ reason: "timeout" },
						),
					);
				}, this.readTimeoutMs);
			}
			this.pending.push(entry);
		});
	}

	writeLine(line: string): Promise<void> {
		if (line.includes("\n")) {
			return Promise.reject(
				new RangeError("LineStream.writeLine: line must not contain a newline"),
			);
		}
		if (this.failure) return Promise.reject(this.failure);
		return new Promise((resolve, reject) => {
			this.duplex.write(`${line}\n`, (err) => {
				if (err) {
					reject(
						new TransportError(`LineStream: write failed: ${err.message}`, {
							cause: err,
							reason: "io",
						}),
					);
					return;
				}
				resolve();
			});
		});
	}

	close(): void {
		this.duplex.end();
	}

	destroy(): void {
		this.duplex.destroy();
	}

	private onData(chunk: string): void {
		this.buffered += chunk;
		let newline = this.buffered.indexOf("\n");
		while (newline !== -1) {
			const raw = this.buffered.slice(0, newline);
			this.buffered = this.buffered.slice(newline + 1);
			this.pushLine(raw.endsWith("\r") ? raw.slice(0, -1) : raw);
			newline = this.buffered.indexOf("\n");
		}
		if (this.buffered.length > this.maxLineLength) {
			this.fail(
				new TransportError(
					`LineStream: line exceeds ${this.maxLineLength} characters`,
					{ reason: "line-too-long" },
				),
			);
		}
	}

	private pushLine(line: string): void {
		if (line.length > this.maxLineLength) {
			this.fail(
				new TransportError(
					`LineStream: line exceeds ${this.maxLineLength} characters`,
					{ reason: "line-too-long" },
				),
			);
			return;
		}
		const waiter = this.pending.shift();
		if (waiter) waiter.resolve(line);
		else this.lines.push(line);
	}

	private onEnd(): void {
		if (this.ended) return;
		this.ended = true;
		// an unterminated trailing line is dropped
		this.buffered = "";
		for (const waiter of this.pending.splice(0)) waiter.resolve(undefined);
	}

	private fail(err: TransportError): void {
		if (this.failure) return;
		this.failure = err;
		for (const waiter of this.pending.splice(0)) waiter.reject(err);
		this.duplex.destroy();
	}
}

export function createLineStream(
	duplex: Duplex,
	options: LineStreamOptions = {},
): LineStream {
	return new DuplexLineStream(duplex, options);
}

export type TlsClientOptions = {
	ca?: string | Buffer;
	servername?: string;
	rejectUnauthorized?: boolean;
};

export type TlsServerOptions = {
	cert: string | Buffer;
	key: string | Buffer;
};

export type ConnectOptions = {
	host: string;
	port: number;
	tls?: TlsClientOptions;
	readTimeoutMs?: number;
};

export type ListenOptions = {
	host: string;
	/** 0 binds an ephemeral port; read it back from {@link LineServer.address}. */
	port: number;
	tls?: TlsServerOptions;
	readTimeoutMs?: number;
	/**
	 * Receives listener errors raised after startup. Without it such an error
	 * is left unhandled, as for any Node server.
	 */
	onError?: (err: TransportError) => void;
};

function formatAddress(host: string | undefined, port: number | undefined): string {
	return `${host ?? "unknown"}:${port ?? 0}`;
}

/**
 * Open a client connection, wrapped in TLS when `tls` is given.
 */
export function connect(options: ConnectOptions): Promise<LineStream> {
	const { host, port, readTimeoutMs } = options;
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		return Promise.reject(
			new RangeError(`connect: port must be between 1 and 65535, got ${port}`),
		);
	}
	return new Promise((resolve, reject) => {
		const socket: net.Socket = options.tls
			? tls.connect({
					host,
					port,
					ca: options.tls.ca,
					servername: options.tls.servername ?? host,
					rejectUnauthorized: options.tls.rejectUnauthorized ?? true,
				})
			: net.connect({ host, port });
		const readyEvent = options.tls ? "secureConnect" : "connect";
		const onError = (err: Error) => {
			reject(
				new TransportError(
					`connect: ${formatAddress(host, port)}: ${err.message}`,
					{ cause: err, reason: "io" },
				),
			);
		};
		socket.once("error", onError);
		socket.once(readyEvent, () => {
			socket.off("error", onError);
			resolve(
				createLineStream(socket, {
					readTimeoutMs,
					remoteAddress: formatAddress(host, port),
				}),
			);
		});
	});
}

export interface LineServer {
	address(): { host: string; port: number };
	close(): Promise<void>;
}

/**
 * Accept connections and hand each one to `onStream` as its own line stream.
 */
export function listen(
	options: ListenOptions,
	onStream: (stream: LineStream) => void,
): Promise<LineServer> {
	const { readTimeoutMs } = options;
	const accept = (socket: net.Socket) => {
		onStream(
			createLineStream(socket, {
				readTimeoutMs,
				remoteAddress: formatAddress(socket.remoteAddress, socket.remotePort),
			}),
		);
	};
	const server: net.Server = options.tls
		? tls.createServer({ cert: options.tls.cert, key: options.tls.key }, accept)
		: net.createServer(accept);

	const wrap = (err: Error) =>
		new TransportError(
			`listen: ${formatAddress(options.host, options.port)}: ${err.message}`,
			{ cause: err, reason: "io" },
		);

	return new Promise((resolve, reject) => {
		const onStartupError = (err: Error) => reject(wrap(err));
		server.once("error", onStartupError);
		server.listen(options.port, options.host, () => {
			server.off("error", onStartupError);
			const { onError } = options;
			if (onError) server.on("error", (err: Error) => onError(wrap(err)));
			resolve({
				address() {
					const info = server.address();
					if (info === null || typeof info === "string") {
						return { host: options.host, port: options.port };
					}
					return { host: info.address, port: info.port };
				},
				close() {
					return new Promise<void>((done, fail) => {
						server.close((err) => (err ? fail(err) : done()));
					});
				},
			});
		});
	});
}
