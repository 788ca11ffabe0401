import type { SessionLogger } from '../LoggingUtils';
import type { PatternChannel } from '../channel/PatternChannel';
import type { DeviceProfile } from './DeviceProfile';

export interface SessionSettings {
	/** Disable paging and wrapping for the session, restoring them at the end */
	modifyTerm: boolean;
	verboseLogging: boolean;
}

export const DEFAULT_SETTINGS: Readonly<SessionSettings> = {
	modifyTerm: true,
	verboseLogging: false,
};

export function resolveSettings(overrides: Partial<SessionSettings> = {}): SessionSettings {
	return { ...DEFAULT_SETTINGS, ...overrides };
}

/**
 * Per-session state handed to every protocol step
 */
export interface SessionContext {
	readonly channel: PatternChannel;
	readonly profile: DeviceProfile;
	readonly settings: Readonly<SessionSettings>;
	readonly logger: SessionLogger;
}

/** Milliseconds */
export const SESSION_TIMEOUTS = {
	promptDiscovery: 5000,
	commandEcho: 30000,
	captureLine: 30000,
	probe: 10000,
	bannerSync: 2000,
	bannerRetry: 200,
	bannerRetryLimit: 50,
	configCommand: 3000,
	configEnd: 5000,
	disconnectEcho: 5000,
	disconnectSettle: 250,
	disconnectRetryPause: 100,
	disconnectAttempts: 10,
	save: 30000,
} as const;

export const LINE_TERMINATOR = '\r\n';

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
