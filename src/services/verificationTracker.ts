/**
 * Verification tracker module.
 * Owns the per-member verification state: pending entries with their
 * deadline timers, and the set of members who already verified.
 *
 * Every public method is synchronous and never awaits, so the event loop
 * runs each one to completion before any other handler or timer callback
 * touches the map. A video post and a deadline for the same member are
 * therefore serialized: whichever runs first removes the entry, and the
 * other finds nothing and returns `ignored`.
 *
 * Each armed entry is its own session. A timer only expires the session that
 * armed it: a stale timer whose cancel lost the race finds a different (or
 * no) session under the key and does nothing. The resulting expiry is handed
 * to the listener outside the tracker.
 *
 * @module services/verificationTracker
 */

import type {
	InteractionResult,
	MemberKey,
	PendingEntry,
	PendingState,
	VerificationOutcome,
	VerificationState,
	WelcomeAction,
} from "../types";
import { StructuredLogger } from "../utils/logger";
import type { SettingsStore } from "./settingsStore";
import {
	NodeTimerService,
	type TimerHandle,
	type TimerService,
} from "./timerService";

export type ExpiryListener = (entry: PendingEntry) => Promise<void>;

export interface VerificationTrackerOptions {
	settings: SettingsStore;
	timers?: TimerService;
	/** Epoch milliseconds; injectable for tests */
	now?: () => number;
}

interface TrackedEntry {
	session: number;
	entry: PendingEntry;
	timer: TimerHandle;
}

export function memberKey(groupId: number, userId: number): string {
	return `${groupId}:${userId}`;
}

export class VerificationTracker {
	private readonly settings: SettingsStore;
	private readonly timers: TimerService;
	private readonly now: () => number;
	private readonly pending = new Map<string, TrackedEntry>();
	private readonly verified = new Set<string>();
	private expiryListener: ExpiryListener | null = null;
	private nextSession = 1;

	constructor(options: VerificationTrackerOptions) {
		this.settings = options.settings;
		this.timers = options.timers ?? new NodeTimerService();
		this.now = options.now ?? Date.now;
	}

	/**
	 * Registers the handler that performs the removal once a deadline passes.
	 */
	setExpiryListener(listener: ExpiryListener): void {
		this.expiryListener = listener;
	}

	get pendingCount(): number {
		return this.pending.size;
	}

	get verifiedCount(): number {
		return this.verified.size;
	}

	isPending(groupId: number, userId: number): boolean {
		return this.pending.has(memberKey(groupId, userId));
	}

	isVerified(groupId: number, userId: number): boolean {
		return this.verified.has(memberKey(groupId, userId));
	}

	getEntry(groupId: number, userId: number): PendingEntry | undefined {
		const tracked = this.pending.get(memberKey(groupId, userId));
		return tracked ? { ...tracked.entry } : undefined;
	}

	/**
	 * Identifies the current pending session for a member. Changes whenever
	 * the entry is consumed or replaced.
	 */
	sessionOf(groupId: number, userId: number): number | undefined {
		return this.pending.get(memberKey(groupId, userId))?.session;
	}

	getState(groupId: number, userId: number): VerificationState {
		const key = memberKey(groupId, userId);
		const tracked = this.pending.get(key);
		if (tracked) return tracked.entry.state;
		if (this.verified.has(key)) return "verified";
		return "idle";
	}

	/**
	 * A member joined the group.
	 *
	 * Not enforcing (paused or outside the active window) and interaction mode
	 * arm nothing. Members who verified before are never timed again.
	 * Otherwise any previous entry for the key is cancelled and replaced.
	 */
	onJoin(groupId: number, userId: number, name: string): WelcomeAction {
		if (!this.settings.isEnforcing(new Date(this.now()))) {
			return { kind: "paused" };
		}

		const key = memberKey(groupId, userId);
		if (this.verified.has(key)) {
			return { kind: "already_verified" };
		}

		if (this.settings.isInteractionMode) {
			return { kind: "awaiting_interaction" };
		}

		const previous = this.pending.get(key);
		if (previous) {
			previous.timer.cancel();
			this.pending.delete(key);
			StructuredLogger.logDebug("Replaced pending verification on rejoin", {
				chatId: groupId,
				userId,
			});
		}

		const timeoutSeconds = this.arm({ groupId, userId }, name, "pending_join");
		return { kind: "timer_started", timeoutSeconds };
	}

	/**
	 * First message from a member while interaction mode is on.
	 * Arms a deadline only for members neither pending nor verified, so
	 * repeated messages arm exactly one timer.
	 */
	onFirstInteraction(
		groupId: number,
		userId: number,
		name: string,
	): InteractionResult {
		if (
			!this.settings.isInteractionMode ||
			!this.settings.isEnforcing(new Date(this.now()))
		) {
			return { kind: "ignored" };
		}

		const key = memberKey(groupId, userId);
		if (this.pending.has(key) || this.verified.has(key)) {
			return { kind: "ignored" };
		}

		const timeoutSeconds = this.arm(
			{ groupId, userId },
			name,
			"pending_interaction",
		);
		return { kind: "timer_started", timeoutSeconds };
	}

	/**
	 * A member posted a video. Consumes the pending entry if one exists.
	 *
	 * @param now - Time of the post in epoch ms (defaults to the tracker clock)
	 */
	onVideoPosted(
		groupId: number,
		userId: number,
		name: string,
		now: number = this.now(),
	): VerificationOutcome {
		const key = memberKey(groupId, userId);
		const tracked = this.pending.get(key);
		if (!tracked) {
			return { kind: "ignored" };
		}

		tracked.timer.cancel();
		this.pending.delete(key);
		this.verified.add(key);

		const entry = { ...tracked.entry, name };
		const elapsedMs = Math.max(0, now - entry.startedAt);
		StructuredLogger.logUserAction("Member verified", {
			chatId: groupId,
			userId,
			username: name,
			operation: "verify",
			elapsedMs,
		});
		return { kind: "verified", entry, elapsedMs };
	}

	/**
	 * A deadline passed. Consumes the pending entry if a video post has not
	 * already done so.
	 */
	onTimerFire(groupId: number, userId: number): VerificationOutcome {
		const key = memberKey(groupId, userId);
		const tracked = this.pending.get(key);
		if (!tracked) {
			return { kind: "ignored" };
		}

		this.pending.delete(key);
		StructuredLogger.logSecurityEvent("Verification deadline passed", {
			chatId: groupId,
			userId,
			username: tracked.entry.name,
			operation: "expire",
		});
		return { kind: "expired", entry: { ...tracked.entry } };
	}

	/**
	 * Drops a pending entry without a terminal outcome, e.g. when the member
	 * is removed for spam.
	 *
	 * @returns True if an entry was removed
	 */
	discard(groupId: number, userId: number): boolean {
		const key = memberKey(groupId, userId);
		const tracked = this.pending.get(key);
		if (!tracked) return false;

		tracked.timer.cancel();
		this.pending.delete(key);
		return true;
	}

	/**
	 * @throws {ValidationError} Unless seconds is an integer in [10, 600]
	 */
	setTimeout(seconds: number): void {
		this.settings.setTimeoutSeconds(seconds);
	}

	/**
	 * Cancels every outstanding deadline. Called on process shutdown.
	 */
	shutdown(): void {
		for (const tracked of this.pending.values()) {
			tracked.timer.cancel();
		}
		const cancelled = this.pending.size;
		this.pending.clear();
		StructuredLogger.logDebug("Verification tracker shut down", {
			operation: "shutdown",
			cancelled,
		});
	}

	private arm(key: MemberKey, name: string, state: PendingState): number {
		const timeoutSeconds = this.settings.timeout;
		const { groupId, userId } = key;

		const tracked: TrackedEntry = {
			session: this.nextSession++,
			entry: { groupId, userId, name, startedAt: this.now(), state },
			timer: this.timers.schedule(timeoutSeconds * 1000, () => {
				this.handleTimerFired(tracked);
			}),
		};
		this.pending.set(memberKey(groupId, userId), tracked);

		StructuredLogger.logUserAction("Verification timer started", {
			chatId: groupId,
			userId,
			username: name,
			operation: state,
			timeoutSeconds,
		});
		return timeoutSeconds;
	}

	private handleTimerFired(tracked: TrackedEntry): void {
		const { groupId, userId } = tracked.entry;
		if (this.pending.get(memberKey(groupId, userId)) !== tracked) {
			StructuredLogger.logDebug("Stale verification timer ignored", {
				chatId: groupId,
				userId,
				session: tracked.session,
			});
			return;
		}

		const outcome = this.onTimerFire(groupId, userId);
		if (outcome.kind !== "expired") return;

		const listener = this.expiryListener;
		if (!listener) {
			StructuredLogger.logDebug("Deadline passed with no expiry listener", {
				chatId: groupId,
				userId,
			});
			return;
		}

		listener(outcome.entry).catch((error: unknown) => {
			StructuredLogger.logError(error, {
				chatId: groupId,
				userId,
				operation: "expire",
			});
		});
	}
}
