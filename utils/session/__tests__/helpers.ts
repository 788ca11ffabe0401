import { LoggingUtils } from '../../LoggingUtils';
import type { ScriptStep } from '../../channel/ScriptedChannel';
import { ScriptedChannel } from '../../channel/ScriptedChannel';
import { DeviceProfile } from '../DeviceProfile';
import type { OsFamily } from '../DeviceProfile';
import type { SessionContext, SessionSettings } from '../SessionContext';
import { resolveSettings } from '../SessionContext';

export const PROMPT = 'Router#';

export const IOS_VERSION = 'Cisco IOS Software, C2960 Software (C2960-LANBASEK9-M), Version 15.0(2)SE4, RELEASE SOFTWARE (fc1)';

/** Device echoes the command, prints `output`, then redraws the prompt */
export function reply(command: string, output = '', prompt = PROMPT): ScriptStep {
	return { when: command, reply: `${command}\r\n${output}${prompt}` };
}

export function bannerStep(prompt = PROMPT): ScriptStep {
	return { when: '!\b', reply: `${prompt}!\b` };
}

/** Everything `start()` exchanges with an IOS device that reports 24x80 */
export function iosDiscoverySteps(): ScriptStep[] {
	return [
		{ when: '\r\n\r\n', reply: `\r\n${PROMPT}\r\n${PROMPT}` },
		reply('show version | i Cisco', `${IOS_VERSION}\r\n`),
		reply('show terminal | i Length', 'Length: 24 lines, Width: 80 columns\r\n'),
		reply('term length 0'),
		reply('term width 0'),
	];
}

export function profileFor(osFamily: OsFamily, prompt = PROMPT): DeviceProfile {
	const profile = new DeviceProfile();
	profile.osFamily = osFamily;
	profile.prompt = prompt;
	return profile;
}

export function createContext(
	channel: ScriptedChannel,
	profile: DeviceProfile = new DeviceProfile(),
	settings: Partial<SessionSettings> = {},
): SessionContext {
	return {
		channel,
		profile,
		settings: resolveSettings(settings),
		logger: LoggingUtils.silent(),
	};
}

export function openChannel(steps: ScriptStep[]): ScriptedChannel {
	return new ScriptedChannel({ steps }, { connected: true });
}
