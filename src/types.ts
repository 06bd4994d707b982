/** Domain types shared by the tracker, classifier, ledger and dispatcher */

/** A member of one group. Verification and points are tracked per key. */
export interface MemberKey {
	groupId: number;
	userId: number;
}

export type PendingState = "pending_join" | "pending_interaction";

export type VerificationState = "idle" | PendingState | "verified" | "expired";

export interface PendingEntry extends MemberKey {
	name: string;
	startedAt: number; // epoch ms
	state: PendingState;
}

export type WelcomeAction =
	| { kind: "paused" }
	| { kind: "already_verified" }
	| { kind: "awaiting_interaction" }
	| { kind: "timer_started"; timeoutSeconds: number };

export type InteractionResult =
	| { kind: "timer_started"; timeoutSeconds: number }
	| { kind: "ignored" };

export type VerificationOutcome =
	| { kind: "verified"; entry: PendingEntry; elapsedMs: number }
	| { kind: "expired"; entry: PendingEntry }
	| { kind: "ignored" };

export type MemberRole = "admin" | "creator" | "member" | "other";

export interface ActiveHours {
	start: number;
	end: number;
}

export interface Settings {
	timeoutSeconds: number;
	paused: boolean;
	interactionMode: boolean;
	antiSpam: boolean;
	rewardsEnabled: boolean;
	scheduledMode: boolean;
	activeHours: ActiveHours;
	welcomeTemplate: string;
	bannedWords: string[];
}

export type StatCounter =
	| "totalJoins"
	| "usersVerified"
	| "usersKicked"
	| "spamBlocked"
	| "linksBlocked"
	| "suspiciousKicked";

export type Stats = Record<StatCounter, number>;

export type SpamVerdict =
	| { kind: "clean" }
	| { kind: "violation"; reason: "link"; counter: "linksBlocked" }
	| {
			kind: "violation";
			reason: "banned_word";
			word: string;
			counter: "spamBlocked";
	  }
	| {
			kind: "violation";
			reason: "suspicious_identity";
			counter: "suspiciousKicked";
	  };

export type Violation = Extract<SpamVerdict, { kind: "violation" }>;

/** Platform-neutral view of a group message */
export interface IncomingMessage extends MemberKey {
	messageId: number;
	username?: string;
	displayName: string;
	text?: string;
	isVideo: boolean;
}

export interface JoiningMember extends MemberKey {
	displayName: string;
	isBot: boolean;
}

export interface LeaderboardRow extends MemberKey {
	name: string;
	points: number;
}
