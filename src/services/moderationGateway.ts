/**
 * Moderation action gateway module.
 * The only place that calls the Telegram API for moderation: removals,
 * notices, message deletion and role lookups. Failures surface as
 * {@link GatewayError}.
 *
 * @module services/moderationGateway
 */

import type { Telegram } from "telegraf";
import type { FmtString } from "telegraf/format";
import { GatewayError } from "../errors";
import type { MemberRole } from "../types";

export type MessageContent = string | FmtString;

export interface ModerationGateway {
	/** Kick: ban then unban immediately, so the member may rejoin. */
	removeMember(groupId: number, userId: number): Promise<void>;
	sendMessage(
		groupId: number,
		text: MessageContent,
		silent: boolean,
	): Promise<void>;
	deleteMessage(groupId: number, messageId: number): Promise<void>;
	getMemberRole(groupId: number, userId: number): Promise<MemberRole>;
}

export function toMemberRole(status: string): MemberRole {
	switch (status) {
		case "administrator":
			return "admin";
		case "creator":
			return "creator";
		case "member":
			return "member";
		default:
			return "other";
	}
}

async function call<T>(operation: string, action: () => Promise<T>): Promise<T> {
	try {
		return await action();
	} catch (error) {
		throw new GatewayError(operation, error);
	}
}

/**
 * {@link ModerationGateway} backed by Telegraf's Telegram client.
 *
 * @example
 * ```typescript
 * const bot = new Telegraf(config.botToken);
 * const gateway = new TelegramGateway(bot.telegram);
 * await gateway.removeMember(-100123456789, 42);
 * ```
 */
export class TelegramGateway implements ModerationGateway {
	constructor(private readonly telegram: Telegram) {}

	async removeMember(groupId: number, userId: number): Promise<void> {
		await call("removeMember", async () => {
			await this.telegram.banChatMember(groupId, userId);
			await this.telegram.unbanChatMember(groupId, userId);
		});
	}

	async sendMessage(
		groupId: number,
		text: MessageContent,
		silent: boolean,
	): Promise<void> {
		await call("sendMessage", () =>
			this.telegram.sendMessage(groupId, text, {
				disable_notification: silent,
			}),
		);
	}

	async deleteMessage(groupId: number, messageId: number): Promise<void> {
		await call("deleteMessage", () =>
			this.telegram.deleteMessage(groupId, messageId),
		);
	}

	async getMemberRole(groupId: number, userId: number): Promise<MemberRole> {
		const member = await call("getMemberRole", () =>
			this.telegram.getChatMember(groupId, userId),
		);
		return toMemberRole(member.status);
	}
}
