import fs from 'fs-extra';

import type { SessionLogger } from '../LoggingUtils';
import { BufferedChannel } from './BufferedChannel';
import type { ConnectProtocol, ConnectRequest } from './PatternChannel';

export interface ScriptStep {
	/** Text that triggers the step, compared against what was sent with one trailing line-feed ignored */
	when: string;
	/** Device output emitted in response */
	reply: string;
	/** Keep the step armed after it fires */
	repeat?: boolean;
	/** Drop the connection after replying */
	closes?: boolean;
}

export interface ChannelScript {
	/** Emitted right after a successful connect */
	banner?: string;
	/** Error text per connect attempt that should fail */
	connectFailures?: Partial<Record<ConnectProtocol, string>>;
	steps: ScriptStep[];
}

export interface ScriptedChannelOptions {
	/** Start as an already-open channel */
	connected?: boolean;
	/** Ignore forced disconnects, for exercising the disconnect retry budget */
	refuseDisconnect?: boolean;
	logger?: SessionLogger;
}

/**
 * Offline stand-in for a device channel. Every `send()` fires the first armed step
 * whose trigger matches and feeds its reply; nothing ever arrives unprompted.
 */
export class ScriptedChannel extends BufferedChannel {
	readonly sent: string[] = [];
	readonly connectAttempts: ConnectRequest[] = [];
	disconnectCalls = 0;

	private connected: boolean;
	private readonly steps: Array<ScriptStep & { fired: boolean }>;

	constructor(private readonly script: ChannelScript, private readonly options: ScriptedChannelOptions = {}) {
		super(options.logger);
		this.connected = options.connected ?? false;
		this.steps = script.steps.map((step) => ({ ...step, fired: false }));
	}

	/**
	 * Load a script from a JSON file shaped like `ChannelScript`
	 */
	static async fromFile(path: string, options: ScriptedChannelOptions = {}): Promise<ScriptedChannel> {
		const data: unknown = await fs.readJson(path);
		return new ScriptedChannel(parseScript(data, path), options);
	}

	async connect(request: ConnectRequest): Promise<void> {
		this.connectAttempts.push(request);
		const failure = this.script.connectFailures?.[request.protocol];
		if (failure !== undefined) {
			throw new Error(failure);
		}
		this.connected = true;
		if (this.script.banner) {
			this.feed(this.script.banner);
		}
	}

	isConnected(): boolean {
		return this.connected;
	}

	async disconnectNow(): Promise<void> {
		this.disconnectCalls += 1;
		if (!this.options.refuseDisconnect) {
			this.connected = false;
		}
	}

	async send(text: string): Promise<void> {
		this.sent.push(text);
		const step = this.steps.find((candidate) => !candidate.fired && triggers(candidate.when, text));
		if (!step) {
			this.logger.debug(`No scripted reply for ${JSON.stringify(text)}`);
			return;
		}
		if (!step.repeat) step.fired = true;
		this.feed(step.reply);
		if (step.closes) {
			this.connected = false;
		}
	}

	/** Steps that never fired */
	unusedSteps(): ScriptStep[] {
		return this.steps.filter((step) => !step.fired && !step.repeat).map(({ fired: _fired, ...step }) => step);
	}

	protected isExhausted(): boolean {
		return true;
	}
}

function triggers(when: string, sent: string): boolean {
	return sent === when || (sent.endsWith('\n') && sent.slice(0, -1) === when);
}

function parseScript(data: unknown, source: string): ChannelScript {
	if (!isRecord(data) || !Array.isArray(data.steps)) {
		throw new Error(`Invalid channel script in ${source}: expected an object with a "steps" array`);
	}

	const steps = data.steps.map((raw: unknown, index: number): ScriptStep => {
		if (!isRecord(raw) || typeof raw.when !== 'string' || typeof raw.reply !== 'string') {
			throw new Error(`Invalid channel script in ${source}: step ${index} needs string "when" and "reply"`);
		}
		return {
			when: raw.when,
			reply: raw.reply,
			repeat: raw.repeat === true,
			closes: raw.closes === true,
		};
	});

	const script: ChannelScript = { steps };
	if (typeof data.banner === 'string') {
		script.banner = data.banner;
	}
	if (isRecord(data.connectFailures)) {
		const failures: Partial<Record<ConnectProtocol, string>> = {};
		for (const protocol of ['standard', 'legacy'] as const) {
			const message = data.connectFailures[protocol];
			if (typeof message === 'string') failures[protocol] = message;
		}
		script.connectFailures = failures;
	}
	return script;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
