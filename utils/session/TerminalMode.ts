import { InteractionFailure } from '../errors';
import type { SessionContext } from './SessionContext';
import { SESSION_TIMEOUTS } from './SessionContext';

/**
 * Commands that turn off paging and wrapping for the discovered OS.
 * Both hinge on a captured length; width is restored only when it was captured.
 */
export function terminalSetupCommands(ctx: SessionContext): string[] {
	const { osFamily, savedTerminalLength } = ctx.profile;
	const commands: string[] = [];

	switch (osFamily) {
		case 'IOS':
			if (savedTerminalLength !== undefined) commands.push('term length 0', 'term width 0');
			break;
		case 'NXOS':
			if (savedTerminalLength !== undefined) commands.push('term length 0', 'term width 511');
			break;
		case 'ASA':
			if (savedTerminalLength !== undefined) commands.push('terminal pager 0');
			break;
		default:
			break;
	}
	return commands;
}

/**
 * Commands that put back the values captured during discovery
 */
export function terminalRestoreCommands(ctx: SessionContext): string[] {
	const { osFamily, savedTerminalLength, savedTerminalWidth } = ctx.profile;
	const commands: string[] = [];

	switch (osFamily) {
		case 'IOS':
		case 'NXOS':
			if (savedTerminalLength !== undefined) commands.push(`term length ${savedTerminalLength}`);
			if (savedTerminalWidth !== undefined) commands.push(`term width ${savedTerminalWidth}`);
			break;
		case 'ASA':
			if (savedTerminalLength !== undefined) commands.push(`terminal pager ${savedTerminalLength}`);
			break;
		default:
			break;
	}
	return commands;
}

async function sendAndAwaitPrompt(ctx: SessionContext, command: string): Promise<void> {
	await ctx.channel.send(`${command}\n`);
	const result = await ctx.channel.waitForAny([ctx.profile.prompt], SESSION_TIMEOUTS.probe);
	if (!result.matched) {
		throw new InteractionFailure(`Prompt did not return after '${command}'`);
	}
}

/**
 * Disable paging and wrapping when the session settings ask for it
 */
export async function applyTerminalMode(ctx: SessionContext): Promise<void> {
	if (!ctx.settings.modifyTerm) return;

	ctx.logger.debug('Adjusting terminal length and width');
	for (const command of terminalSetupCommands(ctx)) {
		await sendAndAwaitPrompt(ctx, command);
	}
}

/**
 * Restore the saved terminal values. Does nothing before a prompt is known.
 */
export async function restoreTerminalMode(ctx: SessionContext): Promise<void> {
	if (!ctx.profile.hasPrompt || !ctx.settings.modifyTerm) return;

	ctx.logger.debug('Returning terminal length and width to normal');
	for (const command of terminalRestoreCommands(ctx)) {
		await sendAndAwaitPrompt(ctx, command);
	}
}
