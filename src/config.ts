/**
 * Configuration module for the video gate bot.
 * Loads environment variables and the optional JSON config file, and
 * provides a typed configuration object validated on startup.
 *
 * @module config
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { logger } from "./utils/logger";

dotenv.config({ path: resolve(__dirname, "../.env") });

/** Bounds for the verification timeout, in seconds */
export const MIN_TIMEOUT_SECONDS = 10;
export const MAX_TIMEOUT_SECONDS = 600;
export const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
export interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/** User IDs allowed to run admin commands in any chat */
	adminIds: number[];

	/** Initial verification timeout in seconds */
	timeoutSeconds: number;

	/** Initial banned-word list (defaults apply when unset) */
	bannedWords?: string[];

	/** Initial welcome template with {name} and {timer} placeholders */
	welcomeTemplate?: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;
}

/**
 * Keys accepted in the JSON config file.
 */
export interface FileConfig {
	bot_token?: string;
	timeout_seconds?: number;
	banned_words?: string[];
	welcome_message?: string;
}

function isStringArray(value: unknown): value is string[] {
	return (
		Array.isArray(value) && value.every((item) => typeof item === "string")
	);
}

/**
 * Checks parsed JSON against {@link FileConfig}. Returns the list of problems.
 */
function validateFileConfig(
	raw: unknown,
): { config: FileConfig; issues: string[] } {
	const issues: string[] = [];
	const config: FileConfig = {};

	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		return { config, issues: ["top-level value must be an object"] };
	}

	const record = new Map<string, unknown>(Object.entries(raw));

	const token = record.get("bot_token");
	if (token !== undefined) {
		if (typeof token === "string") config.bot_token = token;
		else issues.push("bot_token must be a string");
	}

	const timeout = record.get("timeout_seconds");
	if (timeout !== undefined) {
		if (typeof timeout === "number") config.timeout_seconds = timeout;
		else issues.push("timeout_seconds must be a number");
	}

	const words = record.get("banned_words");
	if (words !== undefined) {
		if (isStringArray(words)) config.banned_words = words;
		else issues.push("banned_words must be an array of strings");
	}

	const welcome = record.get("welcome_message");
	if (welcome !== undefined) {
		if (typeof welcome === "string") config.welcome_message = welcome;
		else issues.push("welcome_message must be a string");
	}

	return { config, issues };
}

/**
 * Reads the optional JSON config file. A missing, unreadable or invalid file
 * yields an empty config.
 *
 * @param filePath - Absolute or relative path to the JSON file
 */
export function loadFileConfig(filePath: string): FileConfig {
	if (!existsSync(filePath)) {
		logger.info(`Config file ${filePath} not found, using environment variables and defaults`);
		return {};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(filePath, "utf8"));
	} catch (error) {
		logger.error(`Error parsing config file ${filePath}`, { error });
		return {};
	}

	const { config, issues } = validateFileConfig(raw);
	if (issues.length > 0) {
		logger.error(`Ignoring invalid config file ${filePath}`, { issues });
		return {};
	}
	return config;
}

function parseIdList(value: string | undefined): number[] {
	return (value || "")
		.split(",")
		.map((id) => parseInt(id.trim(), 10))
		.filter((id) => !Number.isNaN(id));
}

function parseWordList(value: string | undefined): string[] | undefined {
	if (!value) return undefined;
	const words = value
		.split(",")
		.map((word) => word.trim())
		.filter((word) => word.length > 0);
	return words.length > 0 ? words : undefined;
}

/**
 * Builds the configuration from environment variables and file values.
 * Environment values take precedence.
 */
export function buildConfig(
	env: NodeJS.ProcessEnv,
	file: FileConfig = {},
): Config {
	const envTimeout = env.TIMEOUT_SECONDS
		? Number(env.TIMEOUT_SECONDS)
		: undefined;

	return {
		botToken: env.BOT_TOKEN || env.TELEGRAM_BOT_TOKEN || file.bot_token || "",
		adminIds: parseIdList(env.ADMIN_IDS),
		timeoutSeconds:
			envTimeout ?? file.timeout_seconds ?? DEFAULT_TIMEOUT_SECONDS,
		bannedWords: parseWordList(env.BANNED_WORDS) ?? file.banned_words,
		welcomeTemplate: file.welcome_message,
		logLevel: env.LOG_LEVEL || "info",
	};
}

/**
 * Main configuration object populated at import time.
 *
 * @constant config
 */
export const config: Config = buildConfig(
	process.env,
	loadFileConfig(
		process.env.CONFIG_FILE || resolve(__dirname, "../config.json"),
	),
);

/**
 * Validates the configuration before the bot starts.
 *
 * @throws {Error} If no bot token is configured
 * @throws {Error} If the initial timeout is not an integer in [10, 600]
 */
export function validateConfig(cfg: Config = config): void {
	if (!cfg.botToken) {
		throw new Error(
			"BOT_TOKEN (or TELEGRAM_BOT_TOKEN) is required in environment variables or config.json",
		);
	}
	if (
		!Number.isInteger(cfg.timeoutSeconds) ||
		cfg.timeoutSeconds < MIN_TIMEOUT_SECONDS ||
		cfg.timeoutSeconds > MAX_TIMEOUT_SECONDS
	) {
		throw new Error(
			`Timeout must be an integer between ${MIN_TIMEOUT_SECONDS} and ${MAX_TIMEOUT_SECONDS} seconds, got ${cfg.timeoutSeconds}`,
		);
	}
	if (cfg.adminIds.length === 0) {
		logger.warn(
			"ADMIN_IDS not set - only group admins can change settings, and only from inside a group",
		);
	}
}
