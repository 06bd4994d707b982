/** Conversions from Telegram update payloads to domain types */

import type { Chat, Message, User } from "telegraf/types";
import type { IncomingMessage, JoiningMember } from "../types";

/** First and last name joined, the way Telegram clients show a member */
export function fullName(user: Pick<User, "first_name" | "last_name">): string {
	return [user.first_name, user.last_name].filter(Boolean).join(" ");
}

export function isGroupChat(chat: Pick<Chat, "type">): boolean {
	return chat.type === "group" || chat.type === "supergroup";
}

/**
 * Videos, round video notes, and files sent with a video MIME type.
 */
export function isVideoMessage(message: Message): boolean {
	if ("video" in message || "video_note" in message) {
		return true;
	}
	if ("document" in message) {
		return message.document.mime_type?.startsWith("video/") ?? false;
	}
	return false;
}

/** Message text, or the caption of a media message */
export function messageText(message: Message): string | undefined {
	if ("text" in message) return message.text;
	if ("caption" in message) return message.caption;
	return undefined;
}

/**
 * Builds the platform-neutral view of a group message.
 * Returns null for messages without a sender, e.g. channel posts.
 */
export function toIncomingMessage(message: Message): IncomingMessage | null {
	const from = message.from;
	if (!from) return null;

	return {
		groupId: message.chat.id,
		userId: from.id,
		messageId: message.message_id,
		username: from.username,
		displayName: fullName(from),
		text: messageText(message),
		isVideo: isVideoMessage(message),
	};
}

export function toJoiningMember(chatId: number, user: User): JoiningMember {
	return {
		groupId: chatId,
		userId: user.id,
		displayName: fullName(user),
		isBot: user.is_bot,
	};
}
