import { writeFile } from 'fs/promises';

import { InteractionFailure } from '../errors';
import type { SessionContext } from './SessionContext';
import { SESSION_TIMEOUTS } from './SessionContext';

const CONFIG_PROMPT_MARKER = ')#';
const BRACKET_COMMANDS = new Set(['configure terminal', 'conf t', 'config t', 'end']);

/**
 * Push configuration commands inside a `configure terminal` / `end` bracket and
 * write the device's responses to `outputFilename`.
 *
 * Each command must be acknowledged with a config-mode prompt. The first command
 * that is not stops the push; commands already applied stay applied.
 */
export async function sendConfigCommands(
	ctx: SessionContext,
	commands: readonly string[],
	outputFilename: string,
): Promise<void> {
	const { channel, profile, logger } = ctx;
	logger.debug(`Preparing to send ${commands.length} config commands`, { commands: [...commands] });

	for (const command of commands) {
		if (BRACKET_COMMANDS.has(command.trim().toLowerCase())) {
			throw new Error(`'${command}' is added automatically and must not be in the command list`);
		}
	}

	let transcript = '';
	for (const command of ['configure terminal', ...commands]) {
		await channel.send(`${command}\n`);
		const result = await channel.readUntilAny([CONFIG_PROMPT_MARKER], SESSION_TIMEOUTS.configCommand);
		if (!result.matched) {
			const error = `Did not receive expected prompt after issuing command: ${command}`;
			logger.debug(error);
			throw new InteractionFailure(error);
		}
		transcript += `${result.text}${CONFIG_PROMPT_MARKER}`;
	}

	await channel.send('end\n');
	const closing = await channel.readUntilAny([profile.prompt], SESSION_TIMEOUTS.configEnd);
	if (!closing.matched) {
		throw new InteractionFailure("Prompt did not return after 'end'");
	}
	transcript += `${closing.text}${profile.prompt}`;

	logger.debug(`Writing config session output to: ${outputFilename}`);
	await writeFile(outputFilename, transcript.replace(/\r/g, ''), 'utf8');
}
