/**
 * Texts the bot posts to groups and sends as command replies.
 *
 * @module utils/messages
 */

import { bold, fmt, type FmtString } from "telegraf/format";
import type { LeaderboardRow, Settings, Stats } from "../types";

const onOff = (flag: boolean): string => (flag ? "ON" : "OFF");

/**
 * Fills the {name} and {timer} placeholders of a welcome template.
 */
export function renderWelcome(
	template: string,
	name: string,
	timeoutSeconds: number,
): string {
	return template
		.replaceAll("{name}", name)
		.replaceAll("{timer}", String(timeoutSeconds));
}

export function pausedWelcome(name: string): string {
	return `👋 Welcome ${name}!\n\n🔴 Bot is currently paused - no video verification required right now.\nEnjoy the group!`;
}

export function interactionWelcome(name: string): string {
	return `👋 Welcome ${name}!\n\n📹 To stay in this group, please post a video after your first message.\n⏰ Timer will start when you interact with the group!`;
}

export function returningWelcome(name: string): string {
	return `👋 Welcome back ${name}! You already verified with a video here.`;
}

export function interactionReminder(name: string, timeoutSeconds: number): string {
	return `⏰ Hi ${name}! You have ${timeoutSeconds} seconds to post a video to stay in the group!`;
}

export function verifiedNotice(
	name: string,
	elapsedMs: number,
	points: number,
	total: number,
): string {
	const seconds = (elapsedMs / 1000).toFixed(1);
	const base = `✅ Great job ${name}! You posted a video in ${seconds} seconds. Welcome to the group! 🎉`;
	if (points <= 0) return base;
	return `${base}\n🏆 You earned ${points} points! Total: ${total} points`;
}

export function timeoutRemovalNotice(name: string, timeoutSeconds: number): string {
	return `⚠️ ${name} was removed for not posting a video within ${timeoutSeconds} seconds.`;
}

export function spamRemovalNotice(name: string, reason: string): string {
	return `⚠️ ${name} was removed for ${reason}`;
}

export function helpText(settings: Readonly<Settings>): string {
	return [
		"🎮 Video Gate Bot Commands:",
		"",
		"📊 Basic Controls:",
		"/help - Show commands",
		"/status - Bot status",
		"/settimer 300 - Change timer",
		"/pause - Stop kicking",
		"/resume - Start kicking",
		"",
		"🛡️ Protection Features:",
		"/antispam - Toggle spam protection",
		"/banword <phrase> - Add a banned word",
		"/unbanword <phrase> - Remove a banned word",
		"/interaction - Toggle interaction mode",
		"/stats - Show statistics",
		"/report - Daily protection report",
		"",
		"🎉 Interactive Features:",
		"/setwelcome - Custom welcome message",
		"/rewards - Toggle point system",
		"/leaderboard - Top video posters",
		"/schedule - Set active hours",
		"",
		"⚙️ Current Settings:",
		`Timer: ${settings.timeoutSeconds}s | Interaction: ${onOff(settings.interactionMode)} | Anti-spam: ${onOff(settings.antiSpam)}`,
		`Rewards: ${onOff(settings.rewardsEnabled)} | Schedule: ${onOff(settings.scheduledMode)}`,
	].join("\n");
}

export interface StatusView {
	settings: Readonly<Settings>;
	stats: Readonly<Stats>;
	pending: number;
	verified: number;
}

export function statusText(view: StatusView): FmtString {
	const { settings, stats } = view;
	return fmt`🤖 ${bold("Video Gate Bot Status")}

⏱️ Timer: ${settings.timeoutSeconds} seconds
▶️ Status: ${settings.paused ? "Paused" : "Active"}
👥 Pending verification: ${view.pending}
✅ Verified members: ${view.verified}

📊 ${bold("Statistics")}
• Total joins: ${stats.totalJoins}
• Users verified: ${stats.usersVerified}
• Users kicked: ${stats.usersKicked}`;
}

export interface StatsView {
	settings: Readonly<Settings>;
	stats: Readonly<Stats>;
	pending: number;
	successRate: number;
}

export function statsText(view: StatsView): FmtString {
	const { settings, stats } = view;
	const minutes = Math.floor(settings.timeoutSeconds / 60);
	const seconds = settings.timeoutSeconds % 60;
	return fmt`📊 ${bold("Detailed Bot Statistics")}

⏱️ Current timer: ${settings.timeoutSeconds} seconds
📈 Success rate: ${view.successRate.toFixed(1)}%

${bold("Activity:")}
👥 Total joins: ${stats.totalJoins}
✅ Users verified: ${stats.usersVerified}
❌ Users kicked: ${stats.usersKicked}
🛡️ Spam blocked: ${stats.spamBlocked}
🔗 Links blocked: ${stats.linksBlocked}
⚠️ Suspicious kicked: ${stats.suspiciousKicked}
⏳ Currently pending: ${view.pending}

${bold("Settings:")}
Status: ${settings.paused ? "🔴 Paused" : "🟢 Active"}
Anti-spam: ${settings.antiSpam ? "🟢 ON" : "🔴 OFF"}
Timer: ${settings.timeoutSeconds}s (${minutes}min ${seconds}s)`;
}

export interface ReportView {
	settings: Readonly<Settings>;
	stats: Readonly<Stats>;
	protectionActions: number;
	successRate: number;
	protectionRate: number;
}

export function reportText(view: ReportView): string {
	const { settings, stats } = view;
	return `📈 Daily Protection Report

🛡️ Total Protection Actions: ${view.protectionActions}
👥 New Members: ${stats.totalJoins}
✅ Verified: ${stats.usersVerified}
❌ Kicked (no video): ${stats.usersKicked}
🚫 Spam blocked: ${stats.spamBlocked}
🔗 Links blocked: ${stats.linksBlocked}
⚠️ Suspicious users: ${stats.suspiciousKicked}

📊 Success Rate: ${view.successRate.toFixed(1)}%
🔒 Protection Rate: ${view.protectionRate.toFixed(1)}%

Settings:
Timer: ${settings.timeoutSeconds}s
Anti-spam: ${onOff(settings.antiSpam)}
Status: ${settings.paused ? "Paused" : "Active"}`;
}

const MEDALS = ["🥇", "🥈", "🥉"];

export function leaderboardText(rows: Iterable<LeaderboardRow>): string {
	const lines: string[] = [];
	let rank = 0;
	for (const row of rows) {
		rank += 1;
		const marker = MEDALS[rank - 1] ?? `${rank}.`;
		lines.push(`${marker} ${row.name}: ${row.points} points`);
	}

	if (lines.length === 0) {
		return "🏆 No points awarded yet! Reward system may be disabled.";
	}
	return `🏆 Group Leaderboard - Top Video Posters:\n\n${lines.join("\n")}`;
}
