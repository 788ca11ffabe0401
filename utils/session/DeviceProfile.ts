export type OsFamily = 'IOS' | 'NXOS' | 'ASA' | 'Unknown';

/**
 * What discovery learned about the connected device. Owned by a single session.
 */
export class DeviceProfile {
	osFamily: OsFamily = 'Unknown';
	prompt = '';
	savedTerminalLength: string | undefined;
	savedTerminalWidth: string | undefined;

	/** Prompt without its trailing `#` */
	get hostname(): string {
		return this.prompt.slice(0, -1);
	}

	get hasPrompt(): boolean {
		return this.prompt !== '';
	}

	/** Pager token the device prints when output fills the screen */
	get pagerToken(): string {
		return this.osFamily === 'ASA' ? '<--- More --->' : '--More--';
	}

	reset(): void {
		this.osFamily = 'Unknown';
		this.prompt = '';
		this.savedTerminalLength = undefined;
		this.savedTerminalWidth = undefined;
	}

	toJSON(): Record<string, string | null> {
		return {
			osFamily: this.osFamily,
			prompt: this.prompt,
			hostname: this.hostname,
			savedTerminalLength: this.savedTerminalLength ?? null,
			savedTerminalWidth: this.savedTerminalWidth ?? null,
		};
	}
}
