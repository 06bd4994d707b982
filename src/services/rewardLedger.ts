/**
 * Reward ledger module.
 * Converts verification latency into points and keeps per-member totals.
 * Totals only grow; nothing is ever deducted or reset.
 *
 * @module services/rewardLedger
 */

import type { LeaderboardRow, MemberKey } from "../types";
import { StructuredLogger } from "../utils/logger";
import type { SettingsStore } from "./settingsStore";
import { memberKey } from "./verificationTracker";

/** Point tiers by verification latency */
export const REWARD_TIERS = [
	{ maxSeconds: 10, points: 100 },
	{ maxSeconds: 30, points: 50 },
] as const;

export const BASE_REWARD_POINTS = 25;

/**
 * Points earned for verifying after `elapsedMs`.
 */
export function pointsFor(elapsedMs: number): number {
	const seconds = elapsedMs / 1000;
	for (const tier of REWARD_TIERS) {
		if (seconds <= tier.maxSeconds) return tier.points;
	}
	return BASE_REWARD_POINTS;
}

export class RewardLedger {
	// Map iteration follows insertion order, which breaks ties on the leaderboard
	private readonly totals = new Map<string, LeaderboardRow>();

	constructor(private readonly settings: SettingsStore) {}

	/**
	 * Awards points for a verification and adds them to the member's total.
	 *
	 * @returns Points awarded, or 0 with no ledger change when rewards are off
	 */
	awardFor(key: MemberKey, name: string, elapsedMs: number): number {
		if (!this.settings.areRewardsEnabled) {
			return 0;
		}

		const points = pointsFor(elapsedMs);
		const id = memberKey(key.groupId, key.userId);
		const row = this.totals.get(id);
		if (row) {
			row.points += points;
			row.name = name;
		} else {
			this.totals.set(id, { groupId: key.groupId, userId: key.userId, name, points });
		}

		StructuredLogger.logUserAction("Points awarded", {
			chatId: key.groupId,
			userId: key.userId,
			username: name,
			operation: "reward",
			points,
		});
		return points;
	}

	totalFor(key: MemberKey): number {
		return this.totals.get(memberKey(key.groupId, key.userId))?.points ?? 0;
	}

	get size(): number {
		return this.totals.size;
	}

	/**
	 * Top members by points, highest first. Equal totals keep the order in
	 * which members first earned points. Recomputed on every call.
	 *
	 * @param limit - Maximum rows to yield
	 * @param groupId - Only rank members of this group
	 */
	*leaderboard(limit: number, groupId?: number): Generator<LeaderboardRow> {
		const rows = [...this.totals.values()]
			.filter((row) => groupId === undefined || row.groupId === groupId)
			.sort((a, b) => b.points - a.points);

		for (const row of rows.slice(0, Math.max(0, limit))) {
			yield { ...row };
		}
	}
}
