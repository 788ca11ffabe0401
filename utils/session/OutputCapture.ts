import { open } from 'fs/promises';

import { InteractionFailure } from '../errors';
import type { SessionContext } from './SessionContext';
import { LINE_TERMINATOR, SESSION_TIMEOUTS } from './SessionContext';

/**
 * Destination for captured output, one cleaned line at a time
 */
export interface LineSink {
	write(line: string): Promise<void>;
}

/**
 * Sink that keeps every line in memory. Only for outputs known to be small.
 */
export class LineCollector implements LineSink {
	readonly lines: string[] = [];

	async write(line: string): Promise<void> {
		this.lines.push(line);
	}
}

// Erasure the device prints after the pager prompt is answered
const PAGER_ERASURE = /^ \x08+ +\x08+(.*)$/s;

/**
 * Remove the backspace/space erasure that follows a dismissed pager prompt
 */
export function stripPagerArtifact(line: string): string {
	const match = PAGER_ERASURE.exec(line);
	return match ? match[1] : line;
}

/**
 * Drop characters outside 7-bit ASCII along with any surrounding CR/LF
 */
export function sanitizeLine(line: string): string {
	return trimLineEnds(line.replace(/[^\x00-\x7F]/g, ''));
}

function trimLineEnds(text: string): string {
	return text.replace(/^[\r\n]+|[\r\n]+$/g, '');
}

/**
 * Run a command and stream its output into `sink` line by line, answering pager
 * prompts as they appear. Resolves with the number of lines written once the
 * prompt comes back.
 */
export async function captureOutput(ctx: SessionContext, command: string, sink: LineSink): Promise<number> {
	const { channel, profile, logger } = ctx;
	const endings = [LINE_TERMINATOR, profile.pagerToken, profile.prompt];

	await channel.send(`${command}\n`);

	const echo = await channel.waitForAny([command.trim()], SESSION_TIMEOUTS.commandEcho);
	if (!echo.matched) {
		logger.debug(`Echo of '${command}' not seen, reading output anyway`);
	}

	let written = 0;
	for (;;) {
		const result = await channel.readUntilAny(endings, SESSION_TIMEOUTS.captureLine);
		if (!result.matched) {
			throw new InteractionFailure(`Timeout trying to capture output of '${command}'`);
		}

		if (result.index === 0) {
			const raw = trimLineEnds(result.text);
			if (raw === '') continue;
			const line = sanitizeLine(stripPagerArtifact(raw));
			if (line === '') continue;
			await sink.write(line);
			written += 1;
			logger.debug(`Captured line: ${line}`);
		} else if (result.index === 1) {
			await channel.send(' ');
		} else {
			break;
		}
	}

	return written;
}

/**
 * Capture a command's output into `filename`, one line per record
 */
export async function writeOutputToFile(ctx: SessionContext, command: string, filename: string): Promise<number> {
	ctx.logger.debug(`Writing output of '${command}' to ${filename}`);
	const handle = await open(filename, 'w');
	try {
		return await captureOutput(ctx, command, {
			write: async (line) => {
				await handle.write(`${line}${LINE_TERMINATOR}`);
			},
		});
	} finally {
		await handle.close();
	}
}

/**
 * Single-shot command for short, bounded outputs such as version or terminal probes.
 * Returns the text between the command echo and the prompt.
 */
export async function getOutput(ctx: SessionContext, command: string): Promise<string> {
	const { channel, profile } = ctx;
	const trimmed = command.trim();

	await channel.send(`${trimmed}\n`);
	await channel.waitForAny([trimmed], SESSION_TIMEOUTS.commandEcho);

	const result = await channel.readUntilAny([profile.prompt], SESSION_TIMEOUTS.probe);
	if (!result.matched) {
		throw new InteractionFailure(`Prompt did not return after '${trimmed}'`);
	}
	return trimLineEnds(result.text);
}
