/**
 * Informational commands: /help, /status, /leaderboard (anyone) and
 * /stats, /report (admins).
 *
 * @module commands/info
 */

import type { RewardLedger } from "../services/rewardLedger";
import type { SettingsStore } from "../services/settingsStore";
import type { StatsService } from "../services/statsService";
import type { VerificationTracker } from "../services/verificationTracker";
import {
	helpText,
	leaderboardText,
	reportText,
	statsText,
	statusText,
} from "../utils/messages";
import type { CommandDefinition } from "./dispatcher";

export const LEADERBOARD_SIZE = 10;

export interface InfoCommandDeps {
	settings: SettingsStore;
	tracker: VerificationTracker;
	ledger: RewardLedger;
	stats: StatsService;
}

export function createInfoCommands(deps: InfoCommandDeps): CommandDefinition[] {
	const { settings, tracker, ledger, stats } = deps;

	return [
		{
			name: "help",
			description: "Show commands and current settings",
			adminOnly: false,
			run: () => helpText(settings.snapshot()),
		},
		{
			name: "status",
			description: "Bot status",
			adminOnly: false,
			run: () =>
				statusText({
					settings: settings.snapshot(),
					stats: stats.snapshot(),
					pending: tracker.pendingCount,
					verified: tracker.verifiedCount,
				}),
		},
		{
			name: "stats",
			description: "Show statistics",
			adminOnly: true,
			run: () =>
				statsText({
					settings: settings.snapshot(),
					stats: stats.snapshot(),
					pending: tracker.pendingCount,
					successRate: stats.successRate(),
				}),
		},
		{
			name: "report",
			description: "Protection report",
			adminOnly: true,
			run: () =>
				reportText({
					settings: settings.snapshot(),
					stats: stats.snapshot(),
					protectionActions: stats.protectionActions(),
					successRate: stats.successRate(),
					protectionRate: stats.protectionRate(),
				}),
		},
		{
			// Ranked per group: points are earned per group membership
			name: "leaderboard",
			description: "Top video posters in this group",
			adminOnly: false,
			run: (request) =>
				leaderboardText(ledger.leaderboard(LEADERBOARD_SIZE, request.chatId)),
		},
	];
}
