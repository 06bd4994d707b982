/**
 * Admin commands that change the bot's settings.
 *
 * Commands:
 * - /settimer <seconds> - Verification timeout (10-600)
 * - /pause, /resume - Stop or restart verification and spam filtering
 * - /interaction - Toggle starting the timer on the first message
 * - /antispam - Toggle spam filtering
 * - /setwelcome <text> - Welcome template with {name} and {timer}
 * - /rewards - Toggle the point system
 * - /schedule toggle | <start> <end> - Active hours
 * - /banword, /unbanword <phrase> - Banned-word list
 *
 * @module commands/settings
 */

import { ValidationError } from "../errors";
import type { SettingsStore } from "../services/settingsStore";
import type { VerificationTracker } from "../services/verificationTracker";
import { StructuredLogger } from "../utils/logger";
import { renderWelcome } from "../utils/messages";
import type { CommandDefinition, CommandRequest } from "./dispatcher";

export interface SettingsCommandDeps {
	settings: SettingsStore;
	tracker: VerificationTracker;
}

function parseInteger(value: string): number | null {
	if (!/^-?\d+$/.test(value)) return null;
	return Number(value);
}

function logChange(request: CommandRequest, setting: string, value: unknown): void {
	StructuredLogger.logUserAction("Setting changed", {
		chatId: request.chatId,
		userId: request.userId,
		operation: setting,
		value,
	});
}

/**
 * Builds the admin-only settings commands.
 *
 * @example
 * ```typescript
 * const dispatcher = new CommandDispatcher(guard, [
 *   ...createSettingsCommands({ settings, tracker }),
 * ]);
 * ```
 */
export function createSettingsCommands(
	deps: SettingsCommandDeps,
): CommandDefinition[] {
	const { settings, tracker } = deps;

	return [
		{
			name: "settimer",
			description: "Change the verification timer",
			adminOnly: true,
			run: (request) => {
				if (request.args.length !== 1) {
					throw new ValidationError(
						"Usage: /settimer <seconds>\nExample: /settimer 120 (for 2 minutes)",
					);
				}
				const seconds = parseInteger(request.args[0]);
				if (seconds === null) {
					throw new ValidationError("Please enter a valid number of seconds.");
				}
				tracker.setTimeout(seconds);
				logChange(request, "timeout", seconds);
				return `✅ Timer updated to ${seconds} seconds!`;
			},
		},
		{
			name: "pause",
			description: "Pause verification",
			adminOnly: true,
			run: (request) => {
				settings.setPaused(true);
				logChange(request, "paused", true);
				return "⏸️ Bot paused! New members won't be kicked until you use /resume";
			},
		},
		{
			name: "resume",
			description: "Resume verification",
			adminOnly: true,
			run: (request) => {
				settings.setPaused(false);
				logChange(request, "paused", false);
				return "▶️ Bot resumed! Video verification is now active.";
			},
		},
		{
			name: "interaction",
			description: "Toggle interaction mode",
			adminOnly: true,
			run: (request) => {
				const enabled = settings.toggleInteractionMode();
				logChange(request, "interactionMode", enabled);
				return enabled
					? "🔄 Interaction mode ON! Timer now starts when users send their first message (better for offline users)"
					: "⏰ Interaction mode OFF! Timer starts immediately when users join (default behavior)";
			},
		},
		{
			name: "antispam",
			description: "Toggle spam protection",
			adminOnly: true,
			run: (request) => {
				const enabled = settings.toggleAntiSpam();
				logChange(request, "antiSpam", enabled);
				return enabled
					? "🛡️ Anti-spam protection ON! Now blocking links, banned words, and suspicious users"
					: "⚠️ Anti-spam protection OFF! Only video verification is active";
			},
		},
		{
			name: "setwelcome",
			description: "Custom welcome message",
			adminOnly: true,
			run: (request) => {
				if (request.payload.length === 0) {
					const current = settings
						.snapshot()
						.welcomeTemplate.replaceAll("{name}", "[NAME]")
						.replaceAll("{timer}", "[TIMER]");
					return `Current welcome message:\n\n${current}\n\nUse: /setwelcome Your custom message here\nUse {name} for user name and {timer} for timer seconds`;
				}

				settings.setWelcomeTemplate(request.payload);
				logChange(request, "welcomeTemplate", request.payload);
				const preview = renderWelcome(
					request.payload,
					request.displayName,
					settings.timeout,
				);
				return `✅ Welcome message updated!\n\nPreview:\n${preview}`;
			},
		},
		{
			name: "rewards",
			description: "Toggle the point system",
			adminOnly: true,
			run: (request) => {
				const enabled = settings.toggleRewards();
				logChange(request, "rewardsEnabled", enabled);
				return enabled
					? "🏆 Reward system ON! Users earn points for posting videos quickly:\n• 10s or less: 100 points\n• 30s or less: 50 points\n• Regular: 25 points"
					: "📝 Reward system OFF! No points will be awarded for videos";
			},
		},
		{
			// /schedule 8 22 sets 8:00 - 22:00; start > end wraps past midnight
			name: "schedule",
			description: "Set active hours",
			adminOnly: true,
			run: (request) => {
				const { activeHours, scheduledMode } = settings.snapshot();

				if (request.args.length === 0) {
					return `Scheduled mode: ${scheduledMode ? "ON" : "OFF"}\nActive hours: ${activeHours.start}:00 - ${activeHours.end}:00\n\nUsage:\n/schedule toggle - Enable/disable\n/schedule 8 22 - Set hours (8 AM to 10 PM)`;
				}

				if (request.args.length === 1 && request.args[0].toLowerCase() === "toggle") {
					const enabled = settings.toggleScheduledMode();
					logChange(request, "scheduledMode", enabled);
					return enabled
						? `⏰ Scheduled mode ON! Bot only active ${activeHours.start}:00-${activeHours.end}:00`
						: "⏰ Scheduled mode OFF!";
				}

				if (request.args.length !== 2) {
					throw new ValidationError(
						"Usage: /schedule toggle or /schedule <start> <end>",
					);
				}

				const start = parseInteger(request.args[0]);
				const end = parseInteger(request.args[1]);
				if (start === null || end === null) {
					throw new ValidationError("Please provide valid hour numbers");
				}
				settings.setActiveHours(start, end);
				logChange(request, "activeHours", { start, end });
				return `✅ Active hours set to ${start}:00 - ${end}:00`;
			},
		},
		{
			name: "banword",
			description: "Add a banned word or phrase",
			adminOnly: true,
			run: (request) => {
				if (request.payload.length === 0) {
					const words = settings.snapshot().bannedWords;
					return words.length === 0
						? "No banned words configured.\n\nUsage: /banword <word or phrase>"
						: `🚫 Banned words: ${words.join(", ")}\n\nUsage: /banword <word or phrase>`;
				}

				const word = request.payload.toLowerCase();
				if (!settings.addBannedWord(word)) {
					return `"${word}" is already banned.`;
				}
				logChange(request, "bannedWords", word);
				return `✅ Added "${word}" to the banned words.`;
			},
		},
		{
			name: "unbanword",
			description: "Remove a banned word or phrase",
			adminOnly: true,
			run: (request) => {
				if (request.payload.length === 0) {
					throw new ValidationError("Usage: /unbanword <word or phrase>");
				}

				const word = request.payload.toLowerCase();
				if (!settings.removeBannedWord(word)) {
					return `"${word}" is not in the banned words.`;
				}
				logChange(request, "bannedWords", `-${word}`);
				return `✅ Removed "${word}" from the banned words.`;
			},
		},
	];
}
