import { describe, expect, it } from 'vitest';

import { LoggingUtils } from '../../LoggingUtils';
import type { ChannelScript, ScriptedChannelOptions } from '../../channel/ScriptedChannel';
import { ScriptedChannel } from '../../channel/ScriptedChannel';
import { ConnectionFailure, InteractionFailure } from '../../errors';
import { CiscoSession } from '../CiscoSession';
import type { SessionCredentials } from '../CiscoSession';
import { LineCollector } from '../OutputCapture';
import { bannerStep, iosDiscoverySteps, reply } from './helpers';

const CREDENTIALS: SessionCredentials = {
	host: '192.0.2.10',
	username: 'netops',
	password: 'test-secret',
};

const LOGIN_BANNER = '\r\n*** Authorized access only ***\r\n';

function iosScript(extra: ChannelScript['steps'] = []): ChannelScript {
	return {
		banner: LOGIN_BANNER,
		steps: [bannerStep(), ...iosDiscoverySteps(), ...extra],
	};
}

function createSession(script: ChannelScript, options: ScriptedChannelOptions = {}) {
	const channel = new ScriptedChannel(script, options);
	const session = new CiscoSession(channel, { logger: LoggingUtils.silent() });
	return { channel, session };
}

describe('CiscoSession.connect', () => {
	it('syncs past the banner, discovers the device and normalizes the terminal', async () => {
		const { channel, session } = createSession(iosScript());

		await session.connect(CREDENTIALS);

		expect(session.state).toBe('ready');
		expect(session.hostname).toBe('Router');
		expect(session.profile.osFamily).toBe('IOS');
		expect(session.profile.savedTerminalLength).toBe('24');
		expect(session.profile.savedTerminalWidth).toBe('80');
		expect(channel.connectAttempts.map((attempt) => attempt.protocol)).toEqual(['standard']);
		expect(channel.connectAttempts[0].port).toBe(22);
		expect(channel.sent).toEqual([
			'!\b',
			'\r\n\r\n',
			'show version | i Cisco\n',
			'show terminal | i Length\n',
			'term length 0\n',
			'term width 0\n',
		]);
	});

	it('falls back to legacy algorithms when the standard handshake fails', async () => {
		const { channel, session } = createSession({
			...iosScript(),
			connectFailures: { standard: 'Handshake failed: no matching cipher' },
		});

		await session.connect({ ...CREDENTIALS, port: 2222 });

		expect(channel.connectAttempts.map((attempt) => attempt.protocol)).toEqual(['standard', 'legacy']);
		expect(channel.connectAttempts[1].port).toBe(2222);
		expect(session.state).toBe('ready');
	});

	it('reports the last error when every attempt fails', async () => {
		const { channel, session } = createSession({
			...iosScript(),
			connectFailures: {
				standard: 'Handshake failed: no matching cipher',
				legacy: 'Timed out while waiting for handshake',
			},
		});

		await expect(session.connect(CREDENTIALS)).rejects.toThrow(
			new ConnectionFailure('Timed out while waiting for handshake'),
		);
		expect(channel.connectAttempts).toHaveLength(2);
		expect(channel.sent).toEqual([]);
		expect(session.state).toBe('disconnected');
	});

	it('refuses to connect an open channel', async () => {
		const { channel, session } = createSession(iosScript(), { connected: true });

		await expect(session.connect(CREDENTIALS)).rejects.toBeInstanceOf(ConnectionFailure);
		expect(channel.connectAttempts).toEqual([]);
	});

	it('rejects incomplete credentials before touching the channel', async () => {
		const { channel, session } = createSession(iosScript());

		await expect(session.connect({ host: '', username: 'netops' })).rejects.toThrow(
			'Invalid connection parameters: Host is required; A password or private key is required',
		);
		expect(channel.connectAttempts).toEqual([]);
	});

	it('keeps probing until a long banner finishes', async () => {
		const { channel, session } = createSession({
			steps: [
				{ when: '!\b', reply: '*** Unauthorized access is prohibited ***\r\n' },
				bannerStep(),
				...iosDiscoverySteps(),
			],
		});

		await session.connect(CREDENTIALS);

		expect(channel.sent.filter((text) => text === '!\b')).toHaveLength(2);
		expect(session.state).toBe('ready');
	});

	it('gives up on the banner after the retry limit', async () => {
		const { channel, session } = createSession({ steps: [] });

		await expect(session.connect(CREDENTIALS)).rejects.toBeInstanceOf(InteractionFailure);
		expect(channel.sent).toHaveLength(51);
		expect(session.state).toBe('connected');
	});

	it('leaves the profile empty when discovery fails', async () => {
		const { session } = createSession({
			steps: [bannerStep('Router>'), { when: '\r\n\r\n', reply: '\r\nRouter>\r\nRouter>' }],
		});

		await expect(session.connect(CREDENTIALS)).rejects.toThrow('Not in enable mode. Cannot continue.');
		expect(session.state).toBe('connected');
		expect(session.profile.hasPrompt).toBe(false);
	});
});

describe('CiscoSession.start', () => {
	it('attaches to a channel that is already open', async () => {
		const channel = new ScriptedChannel({ steps: iosDiscoverySteps() }, { connected: true });
		const session = new CiscoSession(channel, { logger: LoggingUtils.silent() });

		await session.start();

		expect(session.state).toBe('ready');
		expect(session.profile.toJSON()).toEqual({
			osFamily: 'IOS',
			prompt: 'Router#',
			hostname: 'Router',
			savedTerminalLength: '24',
			savedTerminalWidth: '80',
		});
	});

	it('skips terminal changes when modifyTerm is off', async () => {
		const channel = new ScriptedChannel({ steps: iosDiscoverySteps() }, { connected: true });
		const session = new CiscoSession(channel, { settings: { modifyTerm: false }, logger: LoggingUtils.silent() });

		await session.start();

		expect(channel.sent).not.toContain('term length 0\n');
		expect(channel.unusedSteps().map((step) => step.when)).toEqual(['term length 0', 'term width 0']);
	});

	it('needs an open channel', async () => {
		const { session } = createSession({ steps: [] });

		await expect(session.start()).rejects.toThrow(new ConnectionFailure('Channel is not connected.'));
	});
});

describe('CiscoSession operations', () => {
	it('returns command output as text', async () => {
		const { session } = createSession(
			iosScript([reply('show run', 'Building configuration...\r\n\r\nhostname Router\r\n')]),
		);
		await session.connect(CREDENTIALS);

		await expect(session.getCommandOutput('show run')).resolves.toBe('Building configuration...\r\nhostname Router\r\n');
		expect(session.state).toBe('ready');
	});

	it('streams output into a sink', async () => {
		const { session } = createSession(iosScript([reply('show clock', '*10:15:02.123 UTC Mon Mar 1 2021\r\n')]));
		await session.connect(CREDENTIALS);
		const sink = new LineCollector();

		await expect(session.captureOutput('show clock', sink)).resolves.toBe(1);
		expect(sink.lines).toEqual(['*10:15:02.123 UTC Mon Mar 1 2021']);
	});

	it('saves the running configuration', async () => {
		const { channel, session } = createSession(
			iosScript([
				{
					when: 'copy running-config startup-config\n',
					reply:
						'copy running-config startup-config\r\nDestination filename [startup-config]? \r\n' +
						'Building configuration...\r\n[OK]\r\nRouter#',
				},
			]),
		);
		await session.connect(CREDENTIALS);

		await expect(session.saveConfig()).resolves.toBe(
			'copy running-config startup-config\r\nDestination filename [startup-config]? \r\nBuilding configuration...\r\n[OK]',
		);
		expect(channel.sent[channel.sent.length - 1]).toBe('copy running-config startup-config\n\n');
	});

	it('refuses to run before the session is ready', async () => {
		const { session } = createSession(iosScript());

		await expect(session.getCommandOutput('show run')).rejects.toThrow('Session is not ready (state: disconnected)');
		await expect(session.saveConfig()).rejects.toThrow('Session is not ready (state: disconnected)');
	});
});

describe('CiscoSession.end / disconnect', () => {
	it('restores the terminal and logs out', async () => {
		const { channel, session } = createSession(
			iosScript([reply('term length 24'), reply('term width 80'), { when: 'exit', reply: 'exit\r\n', closes: true }]),
		);
		await session.connect(CREDENTIALS);

		await session.disconnect();

		expect(channel.sent.slice(-3)).toEqual(['term length 24\n', 'term width 80\n', 'exit\n']);
		expect(channel.disconnectCalls).toBe(0);
		expect(channel.isConnected()).toBe(false);
		expect(session.state).toBe('disconnected');
		expect(session.profile.hasPrompt).toBe(false);
	});

	it('still logs out when restoring the terminal fails', async () => {
		const { channel, session } = createSession(
			iosScript([
				{ when: 'term length 24', reply: 'term length 24\r\n' },
				{ when: 'exit', reply: 'exit\r\n', closes: true },
			]),
		);
		await session.connect(CREDENTIALS);

		await expect(session.disconnect()).rejects.toThrow(
			new InteractionFailure("Prompt did not return after 'term length 24'"),
		);

		expect(channel.sent.slice(-2)).toEqual(['term length 24\n', 'exit\n']);
		expect(channel.isConnected()).toBe(false);
		expect(session.state).toBe('disconnected');
		expect(session.profile.hasPrompt).toBe(false);
	});

	it('forces the channel closed when the device ignores exit', async () => {
		const channel = new ScriptedChannel({ steps: [] }, { connected: true });
		const session = new CiscoSession(channel, { logger: LoggingUtils.silent() });

		await session.disconnect();

		expect(channel.sent).toEqual(['exit\n']);
		expect(channel.disconnectCalls).toBe(1);
		expect(session.state).toBe('disconnected');
	});

	it('gives up after ten forced attempts', async () => {
		const channel = new ScriptedChannel({ steps: [] }, { connected: true, refuseDisconnect: true });
		const session = new CiscoSession(channel, { logger: LoggingUtils.silent() });

		await expect(session.disconnect()).rejects.toThrow(new ConnectionFailure('Unable to disconnect from session.'));
		expect(channel.disconnectCalls).toBe(10);
	});

	it('only restores the terminal once', async () => {
		const { channel, session } = createSession(iosScript([reply('term length 24'), reply('term width 80')]));
		await session.connect(CREDENTIALS);

		await session.end();
		await session.end();

		expect(channel.sent.filter((text) => text.startsWith('term length 24'))).toHaveLength(1);
		expect(session.state).toBe('connected');
	});

	it('is a no-op on a session that never connected', async () => {
		const { channel, session } = createSession(iosScript());

		await session.end();
		await session.disconnect();

		expect(channel.sent).toEqual([]);
		expect(session.state).toBe('disconnected');
	});
});
