/**
 * Command dispatcher for the video gate bot.
 * Routes slash commands to their definitions, enforces admin-only access,
 * and turns validation and authorization failures into replies.
 *
 * @module commands/dispatcher
 */

import type { Context, Telegraf } from "telegraf";
import { AuthorizationError, ValidationError } from "../errors";
import type { AdminGuard } from "../middleware/adminGuard";
import type { MessageContent } from "../services/moderationGateway";
import { parseCommand } from "../utils/commandHelper";
import { fullName } from "../utils/telegramMessage";
import { StructuredLogger } from "../utils/logger";

export interface CommandRequest {
	chatId: number;
	userId: number;
	displayName: string;
	/** Whitespace-separated arguments after the command */
	args: string[];
	/** Raw text after the command, trimmed */
	payload: string;
}

export interface CommandDefinition {
	name: string;
	description: string;
	adminOnly: boolean;
	run(request: CommandRequest): MessageContent | Promise<MessageContent>;
}

export const UNAUTHORIZED_REPLY = "⚠️ Only group admins can change bot settings.";
export const FAILURE_REPLY = "⚠️ Something went wrong while running that command.";

export class CommandDispatcher {
	private readonly commands = new Map<string, CommandDefinition>();

	constructor(
		private readonly guard: AdminGuard,
		definitions: readonly CommandDefinition[],
	) {
		for (const definition of definitions) {
			if (this.commands.has(definition.name)) {
				throw new Error(`Duplicate command definition: /${definition.name}`);
			}
			this.commands.set(definition.name, definition);
		}
	}

	list(): CommandDefinition[] {
		return [...this.commands.values()];
	}

	/**
	 * Runs a command and returns the reply to send.
	 *
	 * @returns The reply, or null for an unknown command
	 */
	async dispatch(
		name: string,
		request: CommandRequest,
	): Promise<MessageContent | null> {
		const command = this.commands.get(name);
		if (!command) return null;

		try {
			if (command.adminOnly) {
				await this.guard(request.chatId, request.userId, name);
			}
			return await command.run(request);
		} catch (error) {
			if (error instanceof AuthorizationError) {
				return UNAUTHORIZED_REPLY;
			}
			if (error instanceof ValidationError) {
				return `⚠️ ${error.message}`;
			}
			StructuredLogger.logError(error, {
				chatId: request.chatId,
				userId: request.userId,
				operation: name,
			});
			return FAILURE_REPLY;
		}
	}
}

/**
 * Registers every dispatcher command with the bot.
 *
 * @example
 * ```typescript
 * const bot = new Telegraf(config.botToken);
 * registerCommands(bot, dispatcher);
 * ```
 */
export function registerCommands(
	bot: Telegraf<Context>,
	dispatcher: CommandDispatcher,
): void {
	for (const command of dispatcher.list()) {
		bot.command(command.name, async (ctx) => {
			const from = ctx.from;
			const chatId = ctx.chat?.id;
			if (!from || chatId === undefined) return;

			const parsed = parseCommand(ctx.message.text);
			const reply = await dispatcher.dispatch(command.name, {
				chatId,
				userId: from.id,
				displayName: fullName(from),
				args: parsed.args,
				payload: parsed.payload,
			});
			if (reply !== null) {
				await ctx.reply(reply);
			}
		});
	}
}
