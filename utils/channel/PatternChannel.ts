/**
 * Which attempt of the connect sequence is being made. `standard` negotiates with the
 * default algorithm lists, `legacy` widens them for older device firmware.
 */
export type ConnectProtocol = 'standard' | 'legacy';

export interface ConnectRequest {
	protocol: ConnectProtocol;
	host: string;
	port: number;
	username: string;
	password?: string;
	privateKey?: string;
	passphrase?: string;
	connectTimeout?: number;
}

export type WaitResult =
	| { matched: true; index: number }
	| { matched: false };

export type ReadResult =
	| { matched: true; index: number; text: string }
	| { matched: false };

/**
 * Bidirectional character channel with blocking pattern-match primitives.
 *
 * Patterns are plain substrings. When several patterns are present in the pending
 * text, the one that completes first wins; patterns completing at the same position
 * are ranked by their order in the list.
 */
export interface PatternChannel {
	connect(request: ConnectRequest): Promise<void>;

	isConnected(): boolean;

	/** Tear the channel down without any further exchange with the device */
	disconnectNow(): Promise<void>;

	send(text: string): Promise<void>;

	/** Consume pending text up to and including the first matching pattern */
	waitForAny(patterns: readonly string[], timeoutMs: number): Promise<WaitResult>;

	/** Like `waitForAny`, but return the text that preceded the match */
	readUntilAny(patterns: readonly string[], timeoutMs: number): Promise<ReadResult>;
}
