export type { ConnectProtocol, ConnectRequest, PatternChannel, ReadResult, WaitResult } from './utils/channel/PatternChannel';
export { BufferedChannel } from './utils/channel/BufferedChannel';
export { Ssh2Channel } from './utils/channel/Ssh2Channel';
export type { Ssh2ChannelOptions } from './utils/channel/Ssh2Channel';
export { ScriptedChannel } from './utils/channel/ScriptedChannel';
export type { ChannelScript, ScriptStep, ScriptedChannelOptions } from './utils/channel/ScriptedChannel';

export { CiscoSession } from './utils/session/CiscoSession';
export type { CiscoSessionOptions, SessionCredentials, SessionState } from './utils/session/CiscoSession';
export { DeviceProfile } from './utils/session/DeviceProfile';
export type { OsFamily } from './utils/session/DeviceProfile';
export { DEFAULT_SETTINGS, SESSION_TIMEOUTS, resolveSettings } from './utils/session/SessionContext';
export type { SessionContext, SessionSettings } from './utils/session/SessionContext';
export { classifyOs, validatePrompt } from './utils/session/Discovery';
export { LineCollector, sanitizeLine, stripPagerArtifact } from './utils/session/OutputCapture';
export type { LineSink } from './utils/session/OutputCapture';

export { ConnectionFailure, InteractionFailure, SessionError, UnsupportedDevice, isSessionError } from './utils/errors';
export type { SessionErrorKind } from './utils/errors';
export { LoggingUtils } from './utils/LoggingUtils';
export type { LogMetadata, SessionLogger } from './utils/LoggingUtils';
export { parseCommandList } from './utils/utilities';
