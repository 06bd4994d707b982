/** Authorization for settings commands */

import { AuthorizationError } from "../errors";
import type { ModerationGateway } from "../services/moderationGateway";
import type { MemberRole } from "../types";
import { StructuredLogger } from "../utils/logger";

/**
 * Resolves when the user may run the admin command, rejects with
 * {@link AuthorizationError} otherwise.
 */
export type AdminGuard = (chatId: number, userId: number, command: string) => Promise<void>;

/**
 * Builds the guard used by the command dispatcher. A user passes if listed
 * in `adminIds` (any chat) or if they are an administrator or the creator of
 * the chat the command was sent in. A failed role lookup counts as a
 * rejection.
 *
 * @example
 * ```typescript
 * const guard = createAdminGuard(gateway, config.adminIds);
 * await guard(ctx.chat.id, ctx.from.id, 'pause'); // throws for plain members
 * ```
 */
export function createAdminGuard(gateway: ModerationGateway, adminIds: readonly number[]): AdminGuard {
	return async (chatId, userId, command) => {
		if (adminIds.includes(userId)) {
			return;
		}

		let role: MemberRole;
		try {
			role = await gateway.getMemberRole(chatId, userId);
		} catch (error) {
			StructuredLogger.logError(error, { chatId, userId, operation: "admin_check" });
			throw new AuthorizationError(userId, command);
		}

		if (role === "admin" || role === "creator") {
			return;
		}

		StructuredLogger.logSecurityEvent("Rejected admin command", {
			chatId,
			userId,
			operation: command,
		});
		throw new AuthorizationError(userId, command);
	};
}
