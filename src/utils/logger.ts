/**
 * Logger utility module for the video gate bot.
 * Provides structured logging with Winston, including file rotation,
 * console output, and specialized handlers for errors and rejections.
 *
 * @module utils/logger
 */

import * as winston from "winston";
import * as path from "path";
import * as fs from "fs";

/**
 * Directory path for log files.
 * Logs are stored in the 'logs' directory at the project root.
 */
const logDir = path.join(__dirname, "../../logs");

if (!fs.existsSync(logDir)) {
	fs.mkdirSync(logDir, { recursive: true });
}

const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.errors({ stack: true }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
		if (Object.keys(meta).length > 0 && meta.stack) {
			msg += `\n${meta.stack}`;
		} else if (Object.keys(meta).length > 0) {
			msg += ` ${JSON.stringify(meta)}`;
		}
		return msg;
	})
);

/**
 * Reads the log level straight from process.env to avoid a circular import
 * with the config module.
 */
const getLogLevel = (): string => {
	return process.env.LOG_LEVEL || "info";
};

/**
 * Main Winston logger instance.
 *
 * - Console output with color coding
 * - Combined and error-only log files, 10MB rotation, 5 files max
 * - Separate files for uncaught exceptions and unhandled rejections
 *
 * @example
 * ```typescript
 * logger.info('Member joined', { chatId: -100123, userId: 42 });
 * logger.error('Kick failed', { error });
 * ```
 */
export const logger = winston.createLogger({
	level: getLogLevel(),
	format: logFormat,
	transports: [
		new winston.transports.Console({
			format: winston.format.combine(
				winston.format.colorize(),
				logFormat
			)
		}),
		new winston.transports.File({
			filename: path.join(logDir, "combined.log"),
			maxsize: 10485760, // 10MB
			maxFiles: 5,
			tailable: true
		}),
		new winston.transports.File({
			filename: path.join(logDir, "error.log"),
			level: "error",
			maxsize: 10485760, // 10MB
			maxFiles: 5,
			tailable: true
		})
	],
	exceptionHandlers: [
		new winston.transports.File({
			filename: path.join(logDir, "exceptions.log"),
			maxsize: 10485760,
			maxFiles: 3
		})
	],
	rejectionHandlers: [
		new winston.transports.File({
			filename: path.join(logDir, "rejections.log"),
			maxsize: 10485760,
			maxFiles: 3
		})
	]
});

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
	/** Telegram chat ID of the group */
	chatId?: number;
	/** Telegram user ID */
	userId?: number;
	/** Username or display name */
	username?: string;
	/** Operation type */
	operation?: string;
	/** Why a moderation action was taken */
	reason?: string;
	[key: string]: unknown;
}

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
	/**
	 * Logs a member action (join, verification, settings change).
	 *
	 * @example
	 * ```typescript
	 * StructuredLogger.logUserAction('Member verified', {
	 *   chatId: -100123,
	 *   userId: 42,
	 *   operation: 'verify'
	 * });
	 * ```
	 */
	static logUserAction(action: string, context: LogContext): void {
		logger.info(action, this.sanitizeContext(context));
	}

	/**
	 * Logs a security event (removals, spam violations, rejected commands).
	 */
	static logSecurityEvent(event: string, context: LogContext): void {
		logger.warn(`[SECURITY] ${event}`, this.sanitizeContext(context));
	}

	/**
	 * Logs an error with full context and stack trace.
	 */
	static logError(error: unknown, context: LogContext = {}): void {
		if (error instanceof Error) {
			logger.error(error.message, { ...this.sanitizeContext(context), stack: error.stack });
		} else {
			logger.error(String(error), this.sanitizeContext(context));
		}
	}

	static logDebug(message: string, context: LogContext = {}): void {
		logger.debug(message, this.sanitizeContext(context));
	}

	/**
	 * Masks fields that must never reach the log files.
	 */
	private static sanitizeContext(context: LogContext): LogContext {
		const sanitized = { ...context };

		const sensitiveKeys = ["token", "botToken", "secret", "password"];

		for (const key of sensitiveKeys) {
			if (key in sanitized) {
				sanitized[key] = "[REDACTED]";
			}
		}

		return sanitized;
	}
}
