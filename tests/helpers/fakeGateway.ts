/**
 * In-process stand-in for the Telegram moderation gateway.
 * Records every call; selected operations can be made to fail.
 */

import { GatewayError } from '../../src/errors';
import type { MessageContent, ModerationGateway } from '../../src/services/moderationGateway';
import type { MemberRole } from '../../src/types';

export type GatewayOperation = 'removeMember' | 'sendMessage' | 'deleteMessage' | 'getMemberRole';

export interface SentMessage {
  groupId: number;
  text: string;
  silent: boolean;
}

export function contentText(content: MessageContent): string {
  return typeof content === 'string' ? content : content.text;
}

export class FakeGateway implements ModerationGateway {
  readonly removed: Array<{ groupId: number; userId: number }> = [];
  readonly sent: SentMessage[] = [];
  readonly deleted: Array<{ groupId: number; messageId: number }> = [];
  readonly roleLookups: Array<{ groupId: number; userId: number }> = [];
  readonly failing = new Set<GatewayOperation>();
  private readonly roles = new Map<string, MemberRole>();
  private roleGate: Promise<void> | null = null;

  setRole(groupId: number, userId: number, role: MemberRole): void {
    this.roles.set(`${groupId}:${userId}`, role);
  }

  fail(operation: GatewayOperation): void {
    this.failing.add(operation);
  }

  /**
   * Role lookups made from now on stay unresolved until the returned
   * function is called.
   */
  holdRoleLookups(): () => void {
    let release: () => void = () => undefined;
    this.roleGate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.roleGate = null;
      release();
    };
  }

  async removeMember(groupId: number, userId: number): Promise<void> {
    this.check('removeMember');
    this.removed.push({ groupId, userId });
  }

  async sendMessage(groupId: number, text: MessageContent, silent: boolean): Promise<void> {
    this.check('sendMessage');
    this.sent.push({ groupId, text: contentText(text), silent });
  }

  async deleteMessage(groupId: number, messageId: number): Promise<void> {
    this.check('deleteMessage');
    this.deleted.push({ groupId, messageId });
  }

  async getMemberRole(groupId: number, userId: number): Promise<MemberRole> {
    this.roleLookups.push({ groupId, userId });
    if (this.roleGate) {
      await this.roleGate;
    }
    this.check('getMemberRole');
    return this.roles.get(`${groupId}:${userId}`) ?? 'member';
  }

  sentTexts(): string[] {
    return this.sent.map((message) => message.text);
  }

  private check(operation: GatewayOperation): void {
    if (this.failing.has(operation)) {
      throw new GatewayError(operation, new Error('Bad Request: not enough rights'));
    }
  }
}
