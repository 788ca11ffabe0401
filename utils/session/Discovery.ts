import { InteractionFailure, UnsupportedDevice } from '../errors';
import type { OsFamily } from './DeviceProfile';
import { getOutput } from './OutputCapture';
import type { SessionContext } from './SessionContext';
import { SESSION_TIMEOUTS } from './SessionContext';

const EDGE_CONTROL = /^[\s\x00-\x1f\x7f]+|[\s\x00-\x1f\x7f]+$/g;

/**
 * Check a captured prompt line and return it cleaned. The device must be in
 * enable mode and not inside a configuration sub-mode.
 */
export function validatePrompt(raw: string): string {
	const prompt = raw.replace(EDGE_CONTROL, '');

	if (prompt.endsWith('>')) {
		throw new InteractionFailure('Not in enable mode. Cannot continue.');
	}
	if (prompt.length >= 2 && prompt[prompt.length - 2] === ')') {
		throw new InteractionFailure('Device already in config mode.');
	}
	if (!prompt.endsWith('#')) {
		throw new InteractionFailure('Unable to capture prompt.');
	}
	return prompt;
}

/**
 * Classify `show version` text. The checks run in a fixed order, so firmware
 * strings carrying several signatures resolve to the first one listed.
 */
export function classifyOs(versionText: string): Exclude<OsFamily, 'Unknown'> {
	if (versionText.includes('IOS XE')) return 'IOS';
	if (versionText.includes('Cisco IOS Software') || versionText.includes('Cisco Internetwork Operating System')) {
		return 'IOS';
	}
	if (versionText.includes('Cisco Nexus Operating System')) return 'NXOS';
	if (versionText.includes('Adaptive Security Appliance')) return 'ASA';
	throw new UnsupportedDevice('Unknown or Unsupported device OS.');
}

/** First run of decimal digits, if any */
export function extractNumber(text: string | undefined): string | undefined {
	if (text === undefined) return undefined;
	const match = /\d+/.exec(text);
	return match ? match[0] : undefined;
}

/**
 * Force the prompt to be redrawn and capture it. Resolves `undefined` when the
 * device never answers.
 */
export async function discoverPrompt(ctx: SessionContext): Promise<string | undefined> {
	const { channel, logger } = ctx;
	logger.debug('Attempting to discover device prompt');

	await channel.send('\r\n\r\n');
	const echoed = await channel.waitForAny(['\n'], SESSION_TIMEOUTS.promptDiscovery);
	if (!echoed.matched) {
		logger.debug('Timed out waiting for the prompt to be redrawn');
		return undefined;
	}

	const line = await channel.readUntilAny(['\n'], SESSION_TIMEOUTS.promptDiscovery);
	if (!line.matched) {
		throw new InteractionFailure('Unable to capture prompt.');
	}
	logger.debug(`Prompt discovered: ${JSON.stringify(line.text)}`);
	return validatePrompt(line.text);
}

export async function discoverOs(ctx: SessionContext): Promise<Exclude<OsFamily, 'Unknown'>> {
	const version = await getOutput(ctx, 'show version | i Cisco');
	ctx.logger.debug(`Version string: ${version}`);
	return classifyOs(version);
}

/**
 * Read the current terminal length and width so they can be restored later
 */
export async function discoverTerminalSize(
	ctx: SessionContext,
): Promise<{ length: string | undefined; width: string | undefined }> {
	switch (ctx.profile.osFamily) {
		case 'IOS':
		case 'NXOS': {
			const [lengthPart, widthPart] = (await getOutput(ctx, 'show terminal | i Length')).split(',');
			return { length: extractNumber(lengthPart), width: extractNumber(widthPart) };
		}
		case 'ASA': {
			const pager = await getOutput(ctx, 'show pager');
			const terminal = await getOutput(ctx, 'show terminal');
			return { length: extractNumber(pager), width: extractNumber(terminal) };
		}
		default:
			return { length: undefined, width: undefined };
	}
}

/**
 * Populate the session's device profile: prompt, OS family and terminal size
 */
export async function runDiscovery(ctx: SessionContext): Promise<void> {
	const { profile, logger } = ctx;

	const prompt = await discoverPrompt(ctx);
	if (prompt === undefined) {
		throw new InteractionFailure('Timed out waiting for the device prompt.');
	}
	profile.prompt = prompt;
	logger.debug(`Set prompt: ${profile.prompt}, hostname: ${profile.hostname}`);

	profile.osFamily = await discoverOs(ctx);
	logger.debug(`Discovered OS: ${profile.osFamily}`);

	const { length, width } = await discoverTerminalSize(ctx);
	profile.savedTerminalLength = length;
	profile.savedTerminalWidth = width;
	logger.debug(`Discovered term length: ${length ?? 'unknown'}, term width: ${width ?? 'unknown'}`);
}
