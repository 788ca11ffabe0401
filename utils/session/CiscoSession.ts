import { readFile } from 'fs/promises';
import { file as tmpFile } from 'tmp-promise';

import type { SessionLogger } from '../LoggingUtils';
import { LoggingUtils } from '../LoggingUtils';
import type { ConnectProtocol, PatternChannel } from '../channel/PatternChannel';
import { ConnectionFailure, InteractionFailure } from '../errors';
import { generateConnectionSummary, validateSshParams } from '../utilities';
import { sendConfigCommands } from './ConfigPush';
import { DeviceProfile } from './DeviceProfile';
import { runDiscovery } from './Discovery';
import type { LineSink } from './OutputCapture';
import { captureOutput, writeOutputToFile } from './OutputCapture';
import type { SessionContext, SessionSettings } from './SessionContext';
import { resolveSettings, SESSION_TIMEOUTS, sleep } from './SessionContext';
import { applyTerminalMode, restoreTerminalMode } from './TerminalMode';

/**
 * `connected` is an open channel without a usable device profile: after `end()`,
 * or after setup failed part way.
 */
export type SessionState =
	| 'disconnected'
	| 'connecting'
	| 'bannerSync'
	| 'discovering'
	| 'ready'
	| 'capturing'
	| 'configPushing'
	| 'connected'
	| 'disconnecting';

export interface SessionCredentials {
	host: string;
	username: string;
	port?: number;
	password?: string;
	privateKey?: string;
	passphrase?: string;
	connectTimeout?: number;
}

export interface CiscoSessionOptions {
	settings?: Partial<SessionSettings>;
	logger?: SessionLogger;
}

const BANNER_SENTINEL = '!\b';
const CONNECT_SEQUENCE: readonly ConnectProtocol[] = ['standard', 'legacy'];

/**
 * One interactive CLI session with a Cisco IOS, NX-OS or ASA device
 */
export class CiscoSession {
	private currentState: SessionState = 'disconnected';
	private readonly context: SessionContext;

	constructor(channel: PatternChannel, options: CiscoSessionOptions = {}) {
		const settings = resolveSettings(options.settings);
		this.context = {
			channel,
			profile: new DeviceProfile(),
			settings,
			logger: options.logger ?? LoggingUtils.createLogger(settings.verboseLogging),
		};
	}

	get state(): SessionState {
		return this.currentState;
	}

	get profile(): DeviceProfile {
		return this.context.profile;
	}

	get hostname(): string {
		return this.context.profile.hostname;
	}

	/**
	 * Open the channel, wait out the login banner, then discover the device
	 */
	async connect(credentials: SessionCredentials): Promise<void> {
		const { channel, logger } = this.context;
		const port = credentials.port ?? 22;

		if (channel.isConnected()) {
			throw new ConnectionFailure('Session is already connected. Disconnect before connecting again.');
		}

		const problems = validateSshParams(
			credentials.host,
			credentials.username,
			port,
			credentials.password,
			credentials.privateKey,
		);
		if (problems.length > 0) {
			throw new Error(`Invalid connection parameters: ${problems.join('; ')}`);
		}

		logger.info(generateConnectionSummary(credentials.host, credentials.username, port));
		this.currentState = 'connecting';

		let opened = false;
		let lastError = '';
		for (const protocol of CONNECT_SEQUENCE) {
			try {
				await channel.connect({ ...credentials, port, protocol });
				opened = true;
				break;
			} catch (error) {
				lastError = error instanceof Error ? error.message : String(error);
				logger.debug(`Error connecting (${protocol}) to ${credentials.host}: ${lastError}`);
			}
		}
		if (!opened) {
			this.currentState = 'disconnected';
			throw new ConnectionFailure(lastError);
		}

		try {
			this.currentState = 'bannerSync';
			await this.syncBanner();
		} catch (error) {
			this.currentState = 'connected';
			throw error;
		}

		await this.start();
	}

	/**
	 * Discover the device and normalize the terminal on an already-open channel
	 */
	async start(): Promise<void> {
		const ctx = this.context;
		if (!ctx.channel.isConnected()) {
			throw new ConnectionFailure('Channel is not connected.');
		}

		this.currentState = 'discovering';
		try {
			await runDiscovery(ctx);
			await applyTerminalMode(ctx);
		} catch (error) {
			ctx.profile.reset();
			this.currentState = 'connected';
			throw error;
		}
		this.currentState = 'ready';
		ctx.logger.debug(`Session ready on ${ctx.profile.hostname} (${ctx.profile.osFamily})`);
	}

	/**
	 * Restore the terminal and forget the device profile. Safe to call at any time.
	 */
	async end(): Promise<void> {
		const ctx = this.context;
		ctx.logger.debug('Ending session');
		try {
			if (ctx.channel.isConnected()) {
				await restoreTerminalMode(ctx);
			}
		} finally {
			ctx.profile.reset();
			if (this.currentState !== 'disconnected') {
				this.currentState = ctx.channel.isConnected() ? 'connected' : 'disconnected';
			}
		}
	}

	/**
	 * Log out, forcing the channel closed if the device does not drop it.
	 * The channel is closed even when restoring the terminal fails; that error is rethrown afterwards.
	 */
	async disconnect(): Promise<void> {
		try {
			if (this.context.profile.hasPrompt) {
				await this.end();
			}
		} finally {
			await this.closeChannel();
		}
	}

	private async closeChannel(): Promise<void> {
		const { channel, logger } = this.context;
		this.currentState = 'disconnecting';

		if (channel.isConnected()) {
			logger.debug("Sending 'exit' command");
			await channel.send('exit\n');
			await channel.waitForAny(['exit'], SESSION_TIMEOUTS.disconnectEcho);
			await sleep(SESSION_TIMEOUTS.disconnectSettle);
		}

		let attempts = 0;
		while (channel.isConnected() && attempts < SESSION_TIMEOUTS.disconnectAttempts) {
			logger.debug('Not disconnected. Attempting ungraceful disconnect.');
			await channel.disconnectNow();
			await sleep(SESSION_TIMEOUTS.disconnectRetryPause);
			attempts += 1;
		}
		if (channel.isConnected()) {
			throw new ConnectionFailure('Unable to disconnect from session.');
		}
		this.currentState = 'disconnected';
	}

	/**
	 * Stream a command's output into a sink, one line at a time
	 */
	async captureOutput(command: string, sink: LineSink): Promise<number> {
		return this.runWhileReady('capturing', () => captureOutput(this.context, command, sink));
	}

	async writeOutputToFile(command: string, filename: string): Promise<number> {
		return this.runWhileReady('capturing', () => writeOutputToFile(this.context, command, filename));
	}

	/**
	 * Capture a command's output and return it as text. The output is spooled through
	 * a temporary file, which is removed afterwards.
	 */
	async getCommandOutput(command: string): Promise<string> {
		return this.runWhileReady('capturing', async () => {
			const { path, cleanup } = await tmpFile({
				prefix: 'cisco-session-',
				postfix: '.txt',
				discardDescriptor: true,
			});
			try {
				await writeOutputToFile(this.context, command, path);
				return await readFile(path, 'utf8');
			} finally {
				await cleanup();
			}
		});
	}

	async sendConfigCommands(commands: readonly string[], outputFilename: string): Promise<void> {
		return this.runWhileReady('configPushing', () => sendConfigCommands(this.context, commands, outputFilename));
	}

	/**
	 * Copy the running configuration to startup and return what the device printed
	 */
	async saveConfig(): Promise<string> {
		return this.runWhileReady('configPushing', async () => {
			const { channel, profile, logger } = this.context;
			logger.debug('Saving configuration on remote device');
			await channel.send('copy running-config startup-config\n\n');
			const result = await channel.readUntilAny([profile.prompt], SESSION_TIMEOUTS.save);
			if (!result.matched) {
				throw new InteractionFailure('Prompt did not return after saving the configuration');
			}
			logger.debug(`Save results: ${result.text}`);
			return result.text.trim();
		});
	}

	private async runWhileReady<T>(busy: SessionState, operation: () => Promise<T>): Promise<T> {
		if (this.currentState !== 'ready') {
			throw new Error(`Session is not ready (state: ${this.currentState})`);
		}
		this.currentState = busy;
		try {
			return await operation();
		} finally {
			this.currentState = 'ready';
		}
	}

	/**
	 * Wait until the login banner has finished printing. The sentinel only shows up
	 * right after a prompt character once the device is listening for input.
	 */
	private async syncBanner(): Promise<void> {
		const { channel, logger } = this.context;

		await channel.send(BANNER_SENTINEL);
		let result = await channel.waitForAny(
			[`# ${BANNER_SENTINEL}`, `#${BANNER_SENTINEL}`, `>${BANNER_SENTINEL}`],
			SESSION_TIMEOUTS.bannerSync,
		);
		logger.debug(`Banner sync result: ${result.matched ? result.index : 'timeout'}`);

		let retries = 0;
		while (!result.matched) {
			if (retries >= SESSION_TIMEOUTS.bannerRetryLimit) {
				throw new InteractionFailure('Device prompt never appeared after the login banner.');
			}
			retries += 1;
			await channel.send(BANNER_SENTINEL);
			result = await channel.waitForAny([BANNER_SENTINEL], SESSION_TIMEOUTS.bannerRetry);
		}
	}
}
