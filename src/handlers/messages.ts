/**
 * Group message handler: starts the deadline in interaction mode and
 * verifies members who post a video. Runs after the spam filter and the
 * command handlers.
 *
 * @module handlers/messages
 */

import type { Context, Telegraf } from "telegraf";
import type { ModerationService } from "../services/moderationService";
import { isCommandText } from "../utils/commandHelper";
import {
	isGroupChat,
	messageText,
	toIncomingMessage,
} from "../utils/telegramMessage";

export function registerMessageHandlers(
	bot: Telegraf<Context>,
	moderation: ModerationService,
): void {
	bot.on("message", async (ctx, next) => {
		const message = ctx.message;
		if (!isGroupChat(message.chat) || message.from?.is_bot) {
			return next();
		}
		if (
			"new_chat_members" in message ||
			"left_chat_member" in message ||
			isCommandText(messageText(message))
		) {
			return next();
		}

		const incoming = toIncomingMessage(message);
		if (incoming) {
			await moderation.handleActivity(incoming);
		}
		return next();
	});
}
