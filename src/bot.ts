/**
 * Main entry point for the video gate bot.
 * Builds the settings store, tracker, ledger and gateway, registers the
 * middleware and handlers, and manages launch and graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { CommandDispatcher, registerCommands } from "./commands/dispatcher";
import { createInfoCommands } from "./commands/info";
import { createSettingsCommands } from "./commands/settings";
import { type Config, config, validateConfig } from "./config";
import { registerMemberHandlers } from "./handlers/members";
import { registerMessageHandlers } from "./handlers/messages";
import { createAdminGuard } from "./middleware/adminGuard";
import { createMessageFilter } from "./middleware/messageFilter";
import {
	type ModerationGateway,
	TelegramGateway,
} from "./services/moderationGateway";
import { ModerationService } from "./services/moderationService";
import { RewardLedger } from "./services/rewardLedger";
import { SettingsStore } from "./services/settingsStore";
import { StatsService } from "./services/statsService";
import type { TimerService } from "./services/timerService";
import { VerificationTracker } from "./services/verificationTracker";
import { logger } from "./utils/logger";

export interface AppOptions {
	config: Config;
	gateway: ModerationGateway;
	timers?: TimerService;
	now?: () => number;
}

export interface App {
	settings: SettingsStore;
	tracker: VerificationTracker;
	ledger: RewardLedger;
	stats: StatsService;
	moderation: ModerationService;
	dispatcher: CommandDispatcher;
}

/**
 * Wires the components together. Shared by the entry point and the tests.
 */
export function createApp(options: AppOptions): App {
	const { config: cfg, gateway } = options;

	const settings = new SettingsStore({
		timeoutSeconds: cfg.timeoutSeconds,
		bannedWords: cfg.bannedWords,
		welcomeTemplate: cfg.welcomeTemplate,
	});
	const tracker = new VerificationTracker({
		settings,
		timers: options.timers,
		now: options.now,
	});
	const ledger = new RewardLedger(settings);
	const stats = new StatsService();
	const moderation = new ModerationService({
		settings,
		tracker,
		ledger,
		stats,
		gateway,
		now: options.now,
	});
	const dispatcher = new CommandDispatcher(
		createAdminGuard(gateway, cfg.adminIds),
		[
			...createInfoCommands({ settings, tracker, ledger, stats }),
			...createSettingsCommands({ settings, tracker }),
		],
	);

	return { settings, tracker, ledger, stats, moderation, dispatcher };
}

/**
 * Startup sequence:
 * 1. Validate configuration
 * 2. Create the Telegraf instance and the Telegram gateway
 * 3. Register the spam filter, join handlers, commands and message handler
 * 4. Install shutdown hooks that cancel pending deadlines
 * 5. Launch long polling
 */
async function main(): Promise<void> {
	try {
		validateConfig();

		const bot = new Telegraf(config.botToken);
		const app = createApp({
			config,
			gateway: new TelegramGateway(bot.telegram),
		});

		bot.use(createMessageFilter(app.moderation));
		registerMemberHandlers(bot, app.moderation);
		registerCommands(bot, app.dispatcher);
		registerMessageHandlers(bot, app.moderation);

		bot.catch((err, ctx) => {
			logger.error("Bot error", { error: err, update: ctx.update });
		});

		const shutdown = (signal: string) => {
			logger.info(`Received ${signal}, shutting down`);
			app.moderation.shutdown();
			bot.stop(signal);
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));

		logger.info(`Starting video gate bot (timeout ${config.timeoutSeconds}s)`);
		await bot.launch(
			{
				allowedUpdates: ["message", "chat_member"],
				dropPendingUpdates: true,
			},
			() => logger.info("Bot started successfully"),
		);
	} catch (error) {
		logger.error("Failed to start bot", { error });
		process.exit(1);
	}
}

if (require.main === module) {
	void main();
}
