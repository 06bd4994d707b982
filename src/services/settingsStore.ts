/**
 * Settings store module.
 * Holds the admin-adjustable policy read by the verification tracker,
 * the spam classifier and the reward ledger.
 *
 * Every mutation is a single synchronous call, so the event loop makes it
 * atomic. Last writer wins.
 *
 * @module services/settingsStore
 */

import {
	DEFAULT_TIMEOUT_SECONDS,
	MAX_TIMEOUT_SECONDS,
	MIN_TIMEOUT_SECONDS,
} from "../config";
import { ValidationError } from "../errors";
import type { ActiveHours, Settings } from "../types";

export const DEFAULT_WELCOME_TEMPLATE =
	"👋 Welcome {name}! 📹 Post a video within {timer} seconds to stay in the group!";

export const DEFAULT_BANNED_WORDS: readonly string[] = [
	"spam",
	"promotion",
	"advertisement",
	"buy now",
	"click here",
];

const DEFAULT_ACTIVE_HOURS: ActiveHours = { start: 8, end: 22 };

function isHour(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 23;
}

export class SettingsStore {
	private timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS;
	private paused = false;
	private interactionMode = false;
	private antiSpam = true;
	private rewardsEnabled = true;
	private scheduledMode = false;
	private activeHours: ActiveHours = { ...DEFAULT_ACTIVE_HOURS };
	private welcomeTemplate = DEFAULT_WELCOME_TEMPLATE;
	private bannedWords: string[] = [...DEFAULT_BANNED_WORDS];

	/**
	 * @param initial - Values supplied at process start; each goes through its setter
	 * @throws {ValidationError} If an initial value is out of range
	 */
	constructor(initial: Partial<Settings> = {}) {
		if (initial.timeoutSeconds !== undefined) {
			this.setTimeoutSeconds(initial.timeoutSeconds);
		}
		if (initial.paused !== undefined) this.paused = initial.paused;
		if (initial.interactionMode !== undefined) {
			this.interactionMode = initial.interactionMode;
		}
		if (initial.antiSpam !== undefined) this.antiSpam = initial.antiSpam;
		if (initial.rewardsEnabled !== undefined) {
			this.rewardsEnabled = initial.rewardsEnabled;
		}
		if (initial.scheduledMode !== undefined) {
			this.scheduledMode = initial.scheduledMode;
		}
		if (initial.activeHours !== undefined) {
			this.setActiveHours(initial.activeHours.start, initial.activeHours.end);
		}
		if (initial.welcomeTemplate !== undefined) {
			this.setWelcomeTemplate(initial.welcomeTemplate);
		}
		if (initial.bannedWords !== undefined) {
			this.bannedWords = [];
			for (const word of initial.bannedWords) this.addBannedWord(word);
		}
	}

	/**
	 * Read-only copy of the current settings.
	 */
	snapshot(): Readonly<Settings> {
		return {
			timeoutSeconds: this.timeoutSeconds,
			paused: this.paused,
			interactionMode: this.interactionMode,
			antiSpam: this.antiSpam,
			rewardsEnabled: this.rewardsEnabled,
			scheduledMode: this.scheduledMode,
			activeHours: { ...this.activeHours },
			welcomeTemplate: this.welcomeTemplate,
			bannedWords: [...this.bannedWords],
		};
	}

	get timeout(): number {
		return this.timeoutSeconds;
	}

	get isPaused(): boolean {
		return this.paused;
	}

	get isInteractionMode(): boolean {
		return this.interactionMode;
	}

	get isAntiSpamEnabled(): boolean {
		return this.antiSpam;
	}

	get areRewardsEnabled(): boolean {
		return this.rewardsEnabled;
	}

	/**
	 * @throws {ValidationError} Unless seconds is an integer in [10, 600]
	 */
	setTimeoutSeconds(seconds: number): void {
		if (
			!Number.isInteger(seconds) ||
			seconds < MIN_TIMEOUT_SECONDS ||
			seconds > MAX_TIMEOUT_SECONDS
		) {
			throw new ValidationError(
				`Timer must be between ${MIN_TIMEOUT_SECONDS} seconds and 10 minutes (${MAX_TIMEOUT_SECONDS} seconds).`,
			);
		}
		this.timeoutSeconds = seconds;
	}

	setPaused(paused: boolean): void {
		this.paused = paused;
	}

	toggleInteractionMode(): boolean {
		this.interactionMode = !this.interactionMode;
		return this.interactionMode;
	}

	toggleAntiSpam(): boolean {
		this.antiSpam = !this.antiSpam;
		return this.antiSpam;
	}

	toggleRewards(): boolean {
		this.rewardsEnabled = !this.rewardsEnabled;
		return this.rewardsEnabled;
	}

	toggleScheduledMode(): boolean {
		this.scheduledMode = !this.scheduledMode;
		return this.scheduledMode;
	}

	/**
	 * @throws {ValidationError} Unless both hours are integers in [0, 23]
	 */
	setActiveHours(start: number, end: number): void {
		if (!isHour(start) || !isHour(end)) {
			throw new ValidationError("Hours must be between 0-23");
		}
		this.activeHours = { start, end };
	}

	/**
	 * @throws {ValidationError} If the template is blank
	 */
	setWelcomeTemplate(template: string): void {
		if (template.trim().length === 0) {
			throw new ValidationError("Welcome message cannot be empty");
		}
		this.welcomeTemplate = template;
	}

	/**
	 * Adds a banned phrase. Returns false if it was already listed.
	 *
	 * @throws {ValidationError} If the phrase is blank
	 */
	addBannedWord(word: string): boolean {
		const normalized = word.trim().toLowerCase();
		if (normalized.length === 0) {
			throw new ValidationError("Banned word cannot be empty");
		}
		if (this.bannedWords.includes(normalized)) return false;
		this.bannedWords.push(normalized);
		return true;
	}

	removeBannedWord(word: string): boolean {
		const normalized = word.trim().toLowerCase();
		const index = this.bannedWords.indexOf(normalized);
		if (index === -1) return false;
		this.bannedWords.splice(index, 1);
		return true;
	}

	/**
	 * Whether the local hour of `date` falls in the active window.
	 * The window is [start, end); start > end wraps past midnight and
	 * start === end covers the whole day.
	 */
	isWithinActiveHours(date: Date): boolean {
		const { start, end } = this.activeHours;
		const hour = date.getHours();
		if (start === end) return true;
		if (start < end) return hour >= start && hour < end;
		return hour >= start || hour < end;
	}

	/**
	 * Whether verification and spam filtering apply at `date`.
	 */
	isEnforcing(date: Date): boolean {
		if (this.paused) return false;
		return !this.scheduledMode || this.isWithinActiveHours(date);
	}
}
