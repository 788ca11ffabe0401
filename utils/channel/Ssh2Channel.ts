import { NodeSSH } from 'node-ssh';
import type { ClientChannel } from 'ssh2';

import type { SessionLogger } from '../LoggingUtils';
import { LoggingUtils } from '../LoggingUtils';
import { InteractionFailure } from '../errors';
import { buildSshConfig } from '../utilities';
import { BufferedChannel } from './BufferedChannel';
import type { ConnectRequest } from './PatternChannel';

export interface Ssh2ChannelOptions {
	terminalType?: string;
	rows?: number;
	cols?: number;
	logger?: SessionLogger;
}

/**
 * Device channel over an interactive SSH shell
 */
export class Ssh2Channel extends BufferedChannel {
	private ssh: NodeSSH | undefined;
	private shell: ClientChannel | undefined;

	constructor(private readonly options: Ssh2ChannelOptions = {}) {
		super(options.logger ?? LoggingUtils.silent());
	}

	/**
	 * Open the connection and request a PTY shell on it
	 */
	async connect(request: ConnectRequest): Promise<void> {
		const ssh = new NodeSSH();
		this.logger.debug(`Connecting to ${request.host}:${request.port}`, { protocol: request.protocol });

		try {
			await ssh.connect(buildSshConfig(request));
		} catch (error) {
			ssh.dispose();
			throw error;
		}

		let shell: ClientChannel;
		try {
			shell = await ssh.requestShell({
				term: this.options.terminalType ?? 'vt100',
				rows: this.options.rows ?? 24,
				cols: this.options.cols ?? 80,
			});
		} catch (error) {
			ssh.dispose();
			throw new Error(`Failed to open shell: ${error instanceof Error ? error.message : String(error)}`);
		}

		this.clearBuffer();
		// Decode on the stream so multibyte characters split across chunks survive
		shell.setEncoding('utf8');
		shell.stderr.setEncoding('utf8');
		shell.on('data', (data: string) => {
			this.feed(data);
		});
		shell.stderr.on('data', (data: string) => {
			this.feed(data);
		});
		shell.on('close', () => {
			this.logger.debug('Shell stream closed');
			if (this.shell === shell) {
				this.shell = undefined;
			}
			if (this.ssh === ssh) {
				ssh.dispose();
				this.ssh = undefined;
			}
			this.settlePending();
		});
		shell.on('error', (streamErr: Error) => {
			this.logger.warn(`Shell stream error: ${streamErr.message}`);
		});

		this.ssh = ssh;
		this.shell = shell;
		this.logger.debug(`Successfully connected to ${request.host}:${request.port}`);
	}

	isConnected(): boolean {
		return this.shell !== undefined && this.ssh !== undefined && this.ssh.isConnected();
	}

	async disconnectNow(): Promise<void> {
		this.shell?.end();
		this.shell = undefined;
		this.ssh?.dispose();
		this.ssh = undefined;
		this.settlePending();
	}

	async send(text: string): Promise<void> {
		const shell = this.shell;
		if (!shell) {
			throw new InteractionFailure('Cannot send to a closed channel');
		}
		await new Promise<void>((resolve, reject) => {
			shell.write(text, (err?: Error | null) => {
				if (err) {
					reject(new InteractionFailure(`Channel write failed: ${err.message}`));
				} else {
					resolve();
				}
			});
		});
	}

	protected isExhausted(): boolean {
		return this.shell === undefined;
	}
}
