/** Command parsing utilities */

export interface ParsedCommand {
	/** Command name without the slash or @botname suffix, lower-cased */
	command: string;
	args: string[];
	payload: string;
}

/**
 * Splits a command message into its name, arguments and raw payload.
 *
 * @example
 * parseCommand("/settimer@gatebot 120")
 * // { command: "settimer", args: ["120"], payload: "120" }
 */
export function parseCommand(text: string): ParsedCommand {
	const trimmed = text.trim();
	const match = /^\/([^\s@]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(trimmed);
	if (!match) {
		return { command: "", args: [], payload: trimmed };
	}

	const payload = (match[2] ?? "").trim();
	return {
		command: match[1].toLowerCase(),
		args: payload.length > 0 ? payload.split(/\s+/) : [],
		payload,
	};
}

/** Whether a message text is a bot command */
export function isCommandText(text: string | undefined): boolean {
	return text !== undefined && text.startsWith("/");
}
