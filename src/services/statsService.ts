/**
 * Monotonic moderation counters for /status, /stats and /report.
 *
 * @module services/statsService
 */

import type { StatCounter, Stats } from "../types";

export class StatsService {
	private readonly counters: Stats = {
		totalJoins: 0,
		usersVerified: 0,
		usersKicked: 0,
		spamBlocked: 0,
		linksBlocked: 0,
		suspiciousKicked: 0,
	};

	increment(counter: StatCounter): void {
		this.counters[counter] += 1;
	}

	snapshot(): Readonly<Stats> {
		return { ...this.counters };
	}

	/** Removals for missing videos plus every spam action */
	protectionActions(): number {
		const { usersKicked, spamBlocked, linksBlocked, suspiciousKicked } = this.counters;
		return usersKicked + spamBlocked + linksBlocked + suspiciousKicked;
	}

	/** Verified members as a percentage of joins */
	successRate(): number {
		return (this.counters.usersVerified / Math.max(this.counters.totalJoins, 1)) * 100;
	}

	/** Protection actions as a percentage of joins */
	protectionRate(): number {
		return (this.protectionActions() / Math.max(this.counters.totalJoins, 1)) * 100;
	}
}
