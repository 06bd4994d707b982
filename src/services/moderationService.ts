/**
 * Moderation service module.
 * Turns group events (joins, messages, verification deadlines) into state
 * changes and moderation actions.
 *
 * Each handler first commits its state change through the synchronous
 * tracker, ledger and stats calls, then performs gateway calls. Gateway
 * calls are best effort: a failure is logged and the committed state stays.
 * The spam screen awaits a role lookup, so it checks the member's state again
 * before acting on its verdict.
 *
 * @module services/moderationService
 */

import { GatewayError } from "../errors";
import type {
	IncomingMessage,
	JoiningMember,
	MemberKey,
	PendingEntry,
	Violation,
	WelcomeAction,
} from "../types";
import { type LogContext, StructuredLogger } from "../utils/logger";
import {
	interactionReminder,
	interactionWelcome,
	pausedWelcome,
	renderWelcome,
	returningWelcome,
	spamRemovalNotice,
	timeoutRemovalNotice,
	verifiedNotice,
} from "../utils/messages";
import type { MessageContent, ModerationGateway } from "./moderationGateway";
import type { RewardLedger } from "./rewardLedger";
import type { SettingsStore } from "./settingsStore";
import { classifyMessage, describeViolation } from "./spamClassifier";
import type { StatsService } from "./statsService";
import type { VerificationTracker } from "./verificationTracker";

export interface ModerationServiceDeps {
	settings: SettingsStore;
	tracker: VerificationTracker;
	ledger: RewardLedger;
	stats: StatsService;
	gateway: ModerationGateway;
	now?: () => number;
}

export type ActivityResult = "verified" | "timer_started" | "ignored";

export type RemovalListener = (member: MemberKey) => void;

export class ModerationService {
	private readonly settings: SettingsStore;
	private readonly tracker: VerificationTracker;
	private readonly ledger: RewardLedger;
	private readonly stats: StatsService;
	private readonly gateway: ModerationGateway;
	private readonly now: () => number;
	private readonly removalListeners: RemovalListener[] = [];

	constructor(deps: ModerationServiceDeps) {
		this.settings = deps.settings;
		this.tracker = deps.tracker;
		this.ledger = deps.ledger;
		this.stats = deps.stats;
		this.gateway = deps.gateway;
		this.now = deps.now ?? Date.now;

		this.tracker.setExpiryListener((entry) => this.handleExpired(entry));
	}

	/**
	 * Registers a listener called when a member is removed for spam or for
	 * missing the deadline. It runs synchronously, before the kick is sent.
	 */
	onMemberRemoved(listener: RemovalListener): void {
		this.removalListeners.push(listener);
	}

	/**
	 * A member joined. Counts the join, starts verification where the
	 * settings require it, and posts the matching welcome.
	 */
	async handleJoin(member: JoiningMember): Promise<WelcomeAction | null> {
		if (member.isBot) return null;

		this.stats.increment("totalJoins");
		const action = this.tracker.onJoin(
			member.groupId,
			member.userId,
			member.displayName,
		);

		StructuredLogger.logUserAction("Member joined", {
			chatId: member.groupId,
			userId: member.userId,
			username: member.displayName,
			operation: action.kind,
		});

		await this.send(member.groupId, this.welcomeFor(action, member.displayName), {
			chatId: member.groupId,
			userId: member.userId,
			operation: "welcome",
		});
		return action;
	}

	/**
	 * Screens a message for spam. On a violation the pending verification is
	 * dropped, the counter incremented, the message deleted and the sender
	 * kicked.
	 *
	 * @returns True if the message was handled as a violation
	 */
	async screenMessage(message: IncomingMessage): Promise<boolean> {
		const { groupId, userId } = message;
		if (!this.settings.isEnforcing(new Date(this.now()))) {
			return false;
		}

		const verdict = classifyMessage(
			this.settings.snapshot(),
			message,
			this.tracker.isVerified(groupId, userId),
		);
		if (verdict.kind === "clean") {
			return false;
		}

		const session = this.tracker.sessionOf(groupId, userId);
		if (await this.isGroupAdmin(groupId, userId)) {
			StructuredLogger.logDebug("Spam rule matched a group admin, ignoring", {
				chatId: groupId,
				userId,
				reason: verdict.reason,
			});
			return false;
		}

		if (this.tracker.isVerified(groupId, userId)) {
			StructuredLogger.logDebug("Sender verified during role lookup, ignoring", {
				chatId: groupId,
				userId,
				reason: verdict.reason,
			});
			return false;
		}

		if (
			session !== undefined &&
			this.tracker.sessionOf(groupId, userId) !== session
		) {
			await this.dropMessage(message, describeViolation(verdict));
			return true;
		}

		await this.handleViolation(message, verdict);
		return true;
	}

	/**
	 * Handles a non-command message that passed the spam screen: starts the
	 * deadline in interaction mode and verifies members who post a video.
	 */
	async handleActivity(message: IncomingMessage): Promise<ActivityResult> {
		const { groupId, userId, displayName } = message;
		let result: ActivityResult = "ignored";

		const interaction = this.tracker.onFirstInteraction(
			groupId,
			userId,
			displayName,
		);
		if (interaction.kind === "timer_started") {
			result = "timer_started";
			if (!message.isVideo) {
				await this.send(
					groupId,
					interactionReminder(displayName, interaction.timeoutSeconds),
					{ chatId: groupId, userId, operation: "interaction_reminder" },
				);
			}
		}

		if (!message.isVideo) {
			return result;
		}

		const outcome = this.tracker.onVideoPosted(
			groupId,
			userId,
			displayName,
			this.now(),
		);
		if (outcome.kind !== "verified") {
			return result;
		}

		this.stats.increment("usersVerified");
		const points = this.ledger.awardFor(message, displayName, outcome.elapsedMs);
		const total = this.ledger.totalFor(message);

		await this.send(
			groupId,
			verifiedNotice(displayName, outcome.elapsedMs, points, total),
			{ chatId: groupId, userId, operation: "verified_notice" },
		);
		return "verified";
	}

	/**
	 * Expiry listener registered on the tracker. The entry is already gone
	 * from the pending map when this runs.
	 */
	async handleExpired(entry: PendingEntry): Promise<void> {
		const timeoutSeconds = this.settings.timeout;
		this.stats.increment("usersKicked");
		this.notifyRemoved(entry);

		const context: LogContext = {
			chatId: entry.groupId,
			userId: entry.userId,
			username: entry.name,
			operation: "timeout_kick",
		};

		const removed = await this.attempt(
			() => this.gateway.removeMember(entry.groupId, entry.userId),
			context,
		);
		if (!removed) return;

		StructuredLogger.logSecurityEvent("Removed member without video", context);
		await this.send(
			entry.groupId,
			timeoutRemovalNotice(entry.name, timeoutSeconds),
			context,
		);
	}

	/**
	 * Cancels every outstanding deadline.
	 */
	shutdown(): void {
		this.tracker.shutdown();
	}

	private async handleViolation(
		message: IncomingMessage,
		violation: Violation,
	): Promise<void> {
		const { groupId, userId, displayName } = message;
		const reason = describeViolation(violation);
		const context: LogContext = {
			chatId: groupId,
			userId,
			username: displayName,
			operation: "spam_kick",
			reason,
		};

		this.tracker.discard(groupId, userId);
		this.stats.increment(violation.counter);
		this.notifyRemoved(message);
		StructuredLogger.logSecurityEvent("Spam violation", context);

		await this.attempt(
			() => this.gateway.deleteMessage(groupId, message.messageId),
			{ ...context, operation: "delete_spam" },
		);
		const removed = await this.attempt(
			() => this.gateway.removeMember(groupId, userId),
			context,
		);
		if (removed) {
			await this.send(groupId, spamRemovalNotice(displayName, reason), context);
		}
	}

	/**
	 * The sender's pending session ended while the role lookup ran, and that
	 * ending already produced its outcome. Only the message goes.
	 */
	private async dropMessage(
		message: IncomingMessage,
		reason: string,
	): Promise<void> {
		const context: LogContext = {
			chatId: message.groupId,
			userId: message.userId,
			username: message.displayName,
			operation: "delete_spam",
			reason,
		};
		StructuredLogger.logSecurityEvent(
			"Spam message from a member whose session already ended",
			context,
		);
		await this.attempt(
			() => this.gateway.deleteMessage(message.groupId, message.messageId),
			context,
		);
	}

	private notifyRemoved({ groupId, userId }: MemberKey): void {
		for (const listener of this.removalListeners) {
			listener({ groupId, userId });
		}
	}

	private welcomeFor(action: WelcomeAction, name: string): string {
		switch (action.kind) {
			case "paused":
				return pausedWelcome(name);
			case "already_verified":
				return returningWelcome(name);
			case "awaiting_interaction":
				return interactionWelcome(name);
			case "timer_started":
				return renderWelcome(
					this.settings.snapshot().welcomeTemplate,
					name,
					action.timeoutSeconds,
				);
		}
	}

	private async isGroupAdmin(groupId: number, userId: number): Promise<boolean> {
		try {
			const role = await this.gateway.getMemberRole(groupId, userId);
			return role === "admin" || role === "creator";
		} catch (error) {
			StructuredLogger.logError(error, {
				chatId: groupId,
				userId,
				operation: "role_lookup",
			});
			return false;
		}
	}

	private async send(
		groupId: number,
		text: MessageContent,
		context: LogContext,
	): Promise<boolean> {
		return this.attempt(
			() => this.gateway.sendMessage(groupId, text, true),
			context,
		);
	}

	/**
	 * Runs one gateway call. Gateway failures are logged and reported as
	 * false; any other error propagates.
	 */
	private async attempt(
		action: () => Promise<void>,
		context: LogContext,
	): Promise<boolean> {
		try {
			await action();
			return true;
		} catch (error) {
			if (!(error instanceof GatewayError)) throw error;
			StructuredLogger.logError(error, {
				...context,
				gatewayOperation: error.operation,
			});
			return false;
		}
	}
}
