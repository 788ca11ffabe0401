import type { ICredentialType, INodeProperties } from 'n8n-workflow';

export class CiscoSessionCredentials implements ICredentialType {
	name = 'ciscoSessionCredentials';

	displayName = 'Cisco Session Credentials';

	documentationUrl = 'https://docs.n8n.io/integrations/builtin/credentials/ssh/';

	properties: INodeProperties[] = [
		{
			displayName: 'Host',
			name: 'host',
			type: 'string',
			default: '',
			placeholder: '192.0.2.10 or core-sw1.example.net',
			required: true,
			description: 'Hostname or IP address of the device',
		},
		{
			displayName: 'Port',
			name: 'port',
			type: 'number',
			default: 22,
			required: true,
			description: 'SSH port number (standard: 22)',
		},
		{
			displayName: 'Username',
			name: 'username',
			type: 'string',
			default: '',
			required: true,
			description: 'User that lands directly in enable mode (prompt ending in #)',
		},
		{
			displayName: 'Password',
			name: 'password',
			type: 'string',
			typeOptions: {
				password: true,
			},
			default: '',
			description: 'Password to use for authentication',
		},
		{
			displayName: 'Private Key',
			name: 'privateKey',
			type: 'string',
			typeOptions: {
				rows: 8,
				password: true,
			},
			default: '',
			description: 'Private key content (PEM format). Used instead of the password when set.',
		},
		{
			displayName: 'Passphrase',
			name: 'passphrase',
			type: 'string',
			typeOptions: {
				password: true,
			},
			default: '',
			description: 'Passphrase for the private key, if it is encrypted',
		},
		{
			displayName: 'Modify Terminal',
			name: 'modifyTerm',
			type: 'boolean',
			default: true,
			description: 'Whether to disable paging and line wrapping for the session and restore them afterwards',
		},
		{
			displayName: 'Verbose Logging',
			name: 'verboseLogging',
			type: 'boolean',
			default: false,
			description: 'Whether to log every protocol step at debug level',
		},
	];
}
