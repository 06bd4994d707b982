/** Error types raised by settings, commands and the moderation gateway */

export class VideoGateError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "VideoGateError";
	}
}

/** Out-of-range or malformed input. The message is shown to the caller as is. */
export class ValidationError extends VideoGateError {
	constructor(message: string) {
		super(message);
		this.name = "ValidationError";
	}
}

export class AuthorizationError extends VideoGateError {
	constructor(
		public readonly userId: number,
		public readonly command: string,
	) {
		super(`User ${userId} is not allowed to run /${command}`);
		this.name = "AuthorizationError";
	}
}

/** A Telegram API call failed. Already-committed state is never rolled back. */
export class GatewayError extends VideoGateError {
	constructor(
		public readonly operation: string,
		cause: unknown,
	) {
		const detail = cause instanceof Error ? cause.message : String(cause);
		super(`Gateway ${operation} failed: ${detail}`, { cause });
		this.name = "GatewayError";
	}
}
