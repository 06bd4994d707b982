/**
 * @module middleware/messageFilter
 * @description Spam filtering middleware. Screens every non-command group
 * message from members who have not verified yet, and stops the chain when
 * the message was handled as a violation.
 */

import type { Context, MiddlewareFn } from "telegraf";
import type { ModerationService } from "../services/moderationService";
import { isCommandText } from "../utils/commandHelper";
import { logger } from "../utils/logger";
import { isGroupChat, messageText, toIncomingMessage } from "../utils/telegramMessage";

/**
 * Builds the spam filter middleware.
 *
 * Only applies in group chats, never to commands or service messages
 * (joins, leaves), and never to bots.
 *
 * @example
 * ```typescript
 * bot.use(createMessageFilter(moderation));
 * ```
 */
export function createMessageFilter(moderation: ModerationService): MiddlewareFn<Context> {
	return async (ctx, next) => {
		const message = ctx.message;
		if (!message || !ctx.chat || !isGroupChat(ctx.chat)) {
			return next();
		}
		if ("new_chat_members" in message || "left_chat_member" in message) {
			return next();
		}
		if (message.from?.is_bot || isCommandText(messageText(message))) {
			return next();
		}

		const incoming = toIncomingMessage(message);
		if (!incoming) {
			return next();
		}

		let violated: boolean;
		try {
			violated = await moderation.screenMessage(incoming);
		} catch (error) {
			logger.error("Error in spam filter middleware", {
				chatId: incoming.groupId,
				userId: incoming.userId,
				error,
			});
			return next();
		}

		if (violated) {
			return;
		}
		return next();
	};
}
