import type {
	IDataObject,
	IExecuteFunctions,
	INodeExecutionData,
	INodeType,
	INodeTypeDescription,
} from 'n8n-workflow';
import { NodeConnectionTypes, NodeOperationError } from 'n8n-workflow';

import { Ssh2Channel } from '../../utils/channel/Ssh2Channel';
import { isSessionError } from '../../utils/errors';
import type { SessionLogger } from '../../utils/LoggingUtils';
import { CiscoSession as CliSession } from '../../utils/session/CiscoSession';
import type { SessionCredentials } from '../../utils/session/CiscoSession';
import type { SessionSettings } from '../../utils/session/SessionContext';
import { parseCommandList } from '../../utils/utilities';

export type CiscoSessionOperation =
	| 'captureToFile'
	| 'getCommandOutput'
	| 'sendConfig'
	| 'saveConfig'
	| 'getDeviceInfo';

function readString(data: IDataObject, key: string): string | undefined {
	const value = data[key];
	return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Map stored credential fields onto connection parameters and session settings
 */
export function credentialsToSession(data: IDataObject): {
	credentials: SessionCredentials;
	settings: Partial<SessionSettings>;
} {
	const port = Number(data.port ?? 22);
	return {
		credentials: {
			host: readString(data, 'host') ?? '',
			username: readString(data, 'username') ?? '',
			port: Number.isFinite(port) ? port : 22,
			password: readString(data, 'password'),
			privateKey: readString(data, 'privateKey'),
			passphrase: readString(data, 'passphrase'),
		},
		settings: {
			modifyTerm: data.modifyTerm !== false,
			verboseLogging: data.verboseLogging === true,
		},
	};
}

/**
 * Run one operation on a connected session and describe the result as item JSON
 */
export async function runOperation(
	session: CliSession,
	operation: CiscoSessionOperation,
	parameters: { command: string; commands: string; filePath: string },
): Promise<IDataObject> {
	switch (operation) {
		case 'captureToFile': {
			const lines = await session.writeOutputToFile(parameters.command, parameters.filePath);
			return { command: parameters.command, filePath: parameters.filePath, lines };
		}
		case 'getCommandOutput': {
			const output = await session.getCommandOutput(parameters.command);
			return {
				command: parameters.command,
				output,
				lines: output.split(/\r?\n/).filter((line) => line !== ''),
			};
		}
		case 'sendConfig': {
			const commands = parseCommandList(parameters.commands);
			await session.sendConfigCommands(commands, parameters.filePath);
			return { commands, transcriptFile: parameters.filePath };
		}
		case 'saveConfig':
			return { output: await session.saveConfig() };
		case 'getDeviceInfo':
			return { ...session.profile.toJSON() };
	}
}

export class CiscoSession implements INodeType {
	description: INodeTypeDescription = {
		displayName: 'Cisco Session',
		name: 'ciscoSession',
		icon: 'fa:network-wired',
		group: ['input'],
		version: 1,
		subtitle: '={{$parameter["operation"]}}',
		description: 'Capture command output from and push configuration to Cisco IOS, NX-OS and ASA devices',
		defaults: {
			name: 'Cisco Session',
		},
		inputs: [NodeConnectionTypes.Main],
		outputs: [NodeConnectionTypes.Main],
		credentials: [
			{
				name: 'ciscoSessionCredentials',
				required: true,
			},
		],
		properties: [
			{
				displayName: 'Operation',
				name: 'operation',
				type: 'options',
				noDataExpression: true,
				options: [
					{
						name: 'Capture Output To File',
						value: 'captureToFile',
						description: 'Run a show command and write its output to a file line by line',
						action: 'Capture output to file',
					},
					{
						name: 'Get Command Output',
						value: 'getCommandOutput',
						description: 'Run a show command and return its output',
						action: 'Get command output',
					},
					{
						name: 'Send Config Commands',
						value: 'sendConfig',
						description: 'Apply configuration commands inside configure terminal / end',
						action: 'Send config commands',
					},
					{
						name: 'Save Config',
						value: 'saveConfig',
						description: 'Copy the running configuration to the startup configuration',
						action: 'Save config',
					},
					{
						name: 'Get Device Info',
						value: 'getDeviceInfo',
						description: 'Return the discovered prompt, hostname, OS and terminal size',
						action: 'Get device info',
					},
				],
				default: 'getCommandOutput',
			},
			{
				displayName: 'Command',
				name: 'command',
				type: 'string',
				displayOptions: {
					show: {
						operation: ['captureToFile', 'getCommandOutput'],
					},
				},
				default: '',
				placeholder: 'show running-config',
				required: true,
			},
			{
				displayName: 'Config Commands',
				name: 'commands',
				type: 'string',
				typeOptions: {
					rows: 8,
				},
				displayOptions: {
					show: {
						operation: ['sendConfig'],
					},
				},
				default: '',
				placeholder: 'interface GigabitEthernet0/1\ndescription uplink\n# comments are ignored',
				description: 'One command per line, without configure terminal or end',
				required: true,
			},
			{
				displayName: 'File Path',
				name: 'filePath',
				type: 'string',
				displayOptions: {
					show: {
						operation: ['captureToFile', 'sendConfig'],
					},
				},
				default: '',
				placeholder: '/data/captures/core-sw1-show-run.txt',
				description: 'Where to write the captured output or the config session transcript',
				required: true,
			},
		],
	};

	async execute(this: IExecuteFunctions): Promise<INodeExecutionData[][]> {
		const items = this.getInputData();
		const returnItems: INodeExecutionData[] = [];
		const operation = this.getNodeParameter('operation', 0) as CiscoSessionOperation;
		const { credentials, settings } = credentialsToSession(await this.getCredentials('ciscoSessionCredentials'));
		const logger: SessionLogger = this.logger;

		for (let i = 0; i < items.length; i++) {
			const parameters = {
				command: operation === 'captureToFile' || operation === 'getCommandOutput'
					? (this.getNodeParameter('command', i) as string)
					: '',
				commands: operation === 'sendConfig' ? (this.getNodeParameter('commands', i) as string) : '',
				filePath: operation === 'captureToFile' || operation === 'sendConfig'
					? (this.getNodeParameter('filePath', i) as string)
					: '',
			};

			const session = new CliSession(new Ssh2Channel({ logger }), { settings, logger });
			try {
				await session.connect(credentials);
				const result = await runOperation(session, operation, parameters);
				returnItems.push({
					json: { ...result, hostname: session.hostname, osFamily: session.profile.osFamily },
					pairedItem: { item: i },
				});
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				const kind = isSessionError(error) ? error.kind : 'unexpected';

				if (this.continueOnFail()) {
					this.logger.warn(`Item ${i} failed: ${message}`);
					returnItems.push({
						json: { error: message, kind, itemIndex: i, operation },
						pairedItem: { item: i },
					});
					continue;
				}

				throw new NodeOperationError(this.getNode(), `Operation failed for item ${i}: ${message}`, {
					itemIndex: i,
					description: `Operation: ${operation}, failure: ${kind}`,
				});
			} finally {
				try {
					await session.disconnect();
				} catch (cleanupError) {
					this.logger.warn(
						`Error during session cleanup: ${cleanupError instanceof Error ? cleanupError.message : String(cleanupError)}`,
					);
				}
			}
		}

		return [returnItems];
	}
}
