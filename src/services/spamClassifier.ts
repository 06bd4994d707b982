/**
 * Spam classification for messages from members who have not verified.
 * Pure functions of the current settings and the message.
 *
 * @module services/spamClassifier
 */

import type { IncomingMessage, Settings, SpamVerdict, Violation } from "../types";

export const LINK_PATTERNS: readonly string[] = ["http", "www.", ".com", ".org", "t.me"];

export const SUSPICIOUS_PATTERNS: readonly string[] = [
	"crypto",
	"bitcoin",
	"forex",
	"investment",
	"profit",
	"earn",
	"casino",
	"betting",
	"loan",
	"pharmacy",
	"pills",
];

const CLEAN: SpamVerdict = { kind: "clean" };

/** Sender identity as seen by the classifier */
export type SenderIdentity = Pick<IncomingMessage, "username" | "displayName">;

export function containsLink(text: string): boolean {
	const lower = text.toLowerCase();
	return LINK_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Returns the first banned phrase found in the text, if any.
 */
export function findBannedWord(text: string, bannedWords: readonly string[]): string | undefined {
	const lower = text.toLowerCase();
	return bannedWords.find((word) => lower.includes(word.toLowerCase()));
}

export function isSuspiciousIdentity(sender: SenderIdentity): boolean {
	const combined = `${sender.username ?? ""} ${sender.displayName}`.toLowerCase();
	return SUSPICIOUS_PATTERNS.some((pattern) => combined.includes(pattern));
}

/**
 * Classifies a message. Checks run in priority order and stop at the first
 * match: links, then banned words, then the sender's identity.
 *
 * @param settings - Current settings (anti-spam flag and banned words)
 * @param message - Text (or caption) and sender identity
 * @param senderVerified - Verified members are never classified as spam
 *
 * @example
 * ```typescript
 * classifyMessage(settings, { text: 'see www.example.org', displayName: 'Sam' }, false);
 * // { kind: 'violation', reason: 'link', counter: 'linksBlocked' }
 * ```
 */
export function classifyMessage(
	settings: Pick<Settings, "antiSpam" | "bannedWords">,
	message: SenderIdentity & { text?: string },
	senderVerified: boolean,
): SpamVerdict {
	if (!settings.antiSpam || senderVerified) {
		return CLEAN;
	}

	const text = message.text;
	if (text) {
		if (containsLink(text)) {
			return { kind: "violation", reason: "link", counter: "linksBlocked" };
		}

		const word = findBannedWord(text, settings.bannedWords);
		if (word !== undefined) {
			return { kind: "violation", reason: "banned_word", word, counter: "spamBlocked" };
		}
	}

	if (isSuspiciousIdentity(message)) {
		return { kind: "violation", reason: "suspicious_identity", counter: "suspiciousKicked" };
	}

	return CLEAN;
}

/**
 * User-facing reason shown in the removal notice.
 */
export function describeViolation(violation: Violation): string {
	switch (violation.reason) {
		case "link":
			return "posting links";
		case "banned_word":
			return `using banned word: ${violation.word}`;
		case "suspicious_identity":
			return "suspicious username";
	}
}
