/**
 * Member join handlers.
 * Telegram reports a join both as a `chat_member` update (when the bot is an
 * admin and asked for them) and as a `new_chat_members` service message.
 * Both feed {@link ModerationService.handleJoin}; a join seen from both
 * sources within a short window is handled once. Removing a member clears
 * their window, so a rejoin right after a kick is a new join.
 *
 * @module handlers/members
 */

import type { Context, Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import type { User } from "telegraf/types";
import type { ModerationService } from "../services/moderationService";
import { memberKey } from "../services/verificationTracker";
import { logger } from "../utils/logger";
import { toJoiningMember } from "../utils/telegramMessage";

export const JOIN_DEDUP_WINDOW_MS = 10_000;

const OUTSIDE_STATUSES = ["left", "kicked"];
const INSIDE_STATUSES = ["member", "administrator", "creator"];

/**
 * Remembers recent joins so the second report of the same join is dropped.
 */
export class JoinDeduplicator {
	private readonly seen = new Map<string, number>();

	constructor(
		private readonly windowMs: number = JOIN_DEDUP_WINDOW_MS,
		private readonly now: () => number = Date.now,
	) {}

	/**
	 * @returns True the first time a join is reported within the window
	 */
	accept(groupId: number, userId: number): boolean {
		const now = this.now();
		for (const [key, at] of this.seen) {
			if (now - at >= this.windowMs) this.seen.delete(key);
		}

		const key = memberKey(groupId, userId);
		if (this.seen.has(key)) return false;
		this.seen.set(key, now);
		return true;
	}

	forget(groupId: number, userId: number): void {
		this.seen.delete(memberKey(groupId, userId));
	}
}

/**
 * Whether a chat member status change means the user just joined.
 */
export function isJoinTransition(oldStatus: string, newStatus: string): boolean {
	return (
		OUTSIDE_STATUSES.includes(oldStatus) && INSIDE_STATUSES.includes(newStatus)
	);
}

/**
 * Registers the join handlers.
 *
 * @example
 * ```typescript
 * registerMemberHandlers(bot, moderation);
 * ```
 */
export function registerMemberHandlers(
	bot: Telegraf<Context>,
	moderation: ModerationService,
	dedup: JoinDeduplicator = new JoinDeduplicator(),
): void {
	moderation.onMemberRemoved(({ groupId, userId }) => {
		dedup.forget(groupId, userId);
	});

	const handleJoin = async (chatId: number, user: User): Promise<void> => {
		if (!dedup.accept(chatId, user.id)) {
			logger.debug("Duplicate join report ignored", { chatId, userId: user.id });
			return;
		}
		await moderation.handleJoin(toJoiningMember(chatId, user));
	};

	bot.on("chat_member", async (ctx, next) => {
		const update = ctx.chatMember;
		const oldStatus = update.old_chat_member.status;
		const newStatus = update.new_chat_member.status;

		if (isJoinTransition(oldStatus, newStatus)) {
			await handleJoin(update.chat.id, update.new_chat_member.user);
		}
		return next();
	});

	bot.on(message("new_chat_members"), async (ctx, next) => {
		for (const user of ctx.message.new_chat_members) {
			await handleJoin(ctx.message.chat.id, user);
		}
		return next();
	});
}
