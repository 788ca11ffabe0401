import type { SessionLogger } from '../LoggingUtils';
import { LoggingUtils } from '../LoggingUtils';
import type { ConnectRequest, PatternChannel, ReadResult, WaitResult } from './PatternChannel';

interface PatternMatch {
	index: number;
	text: string;
}

interface PendingRead {
	patterns: readonly string[];
	settle: (match: PatternMatch | undefined) => void;
}

/**
 * Pattern matching over an append-only text buffer.
 *
 * Subclasses push device output in with `feed()`; at most one wait or read may be
 * outstanding at a time, mirroring the single-owner contract of a device channel.
 */
export abstract class BufferedChannel implements PatternChannel {
	private buffer = '';
	private pending: PendingRead | undefined;

	protected constructor(protected readonly logger: SessionLogger = LoggingUtils.silent()) {}

	abstract connect(request: ConnectRequest): Promise<void>;
	abstract isConnected(): boolean;
	abstract disconnectNow(): Promise<void>;
	abstract send(text: string): Promise<void>;

	/**
	 * True when no further text can arrive without another `send()`.
	 * An unmatched wait then resolves as a timeout straight away.
	 */
	protected abstract isExhausted(): boolean;

	async waitForAny(patterns: readonly string[], timeoutMs: number): Promise<WaitResult> {
		const match = await this.match(patterns, timeoutMs);
		return match ? { matched: true, index: match.index } : { matched: false };
	}

	async readUntilAny(patterns: readonly string[], timeoutMs: number): Promise<ReadResult> {
		const match = await this.match(patterns, timeoutMs);
		return match ? { matched: true, index: match.index, text: match.text } : { matched: false };
	}

	protected feed(text: string): void {
		this.buffer += text;
		this.settlePending();
	}

	/** Re-check the outstanding wait after the exhaustion state changed */
	protected settlePending(): void {
		const pending = this.pending;
		if (!pending) return;

		const match = this.take(pending.patterns);
		if (match) {
			pending.settle(match);
		} else if (this.isExhausted()) {
			pending.settle(undefined);
		}
	}

	protected clearBuffer(): void {
		this.buffer = '';
	}

	private match(patterns: readonly string[], timeoutMs: number): Promise<PatternMatch | undefined> {
		if (this.pending) {
			return Promise.reject(new Error('A wait is already pending on this channel'));
		}

		const immediate = this.take(patterns);
		if (immediate) return Promise.resolve(immediate);
		if (this.isExhausted()) {
			this.logTimeout(patterns);
			return Promise.resolve(undefined);
		}

		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				this.pending = undefined;
				this.logTimeout(patterns);
				resolve(undefined);
			}, timeoutMs);

			this.pending = {
				patterns,
				settle: (match) => {
					clearTimeout(timer);
					this.pending = undefined;
					if (!match) this.logTimeout(patterns);
					resolve(match);
				},
			};
		});
	}

	/**
	 * Find the pattern that completes earliest in the buffer and consume through it
	 */
	private take(patterns: readonly string[]): PatternMatch | undefined {
		let best: { index: number; start: number; end: number } | undefined;

		for (let index = 0; index < patterns.length; index += 1) {
			const pattern = patterns[index];
			if (pattern.length === 0) continue;
			const start = this.buffer.indexOf(pattern);
			if (start < 0) continue;
			const end = start + pattern.length;
			if (!best || end < best.end) {
				best = { index, start, end };
			}
		}

		if (!best) return undefined;

		const text = this.buffer.slice(0, best.start);
		this.buffer = this.buffer.slice(best.end);
		return { index: best.index, text };
	}

	private logTimeout(patterns: readonly string[]): void {
		this.logger.debug(`No match for ${JSON.stringify(patterns)}`, LoggingUtils.describeBuffer(this.buffer));
	}
}
