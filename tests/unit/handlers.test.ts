/**
 * Tests for the Telegraf wiring: join handlers, the spam filter middleware
 * and the group message handler, driven through bot.handleUpdate.
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Telegraf } from 'telegraf';
import { createApp, type App } from '../../src/bot';
import { JoinDeduplicator, isJoinTransition, registerMemberHandlers } from '../../src/handlers/members';
import { registerMessageHandlers } from '../../src/handlers/messages';
import { createMessageFilter } from '../../src/middleware/messageFilter';
import { FakeGateway } from '../helpers/fakeGateway';
import { ManualTimerService } from '../helpers/manualTimers';
import {
  TEST_GROUP_ID,
  chatMemberUpdate,
  createTestBot,
  newMembersUpdate,
  privateChat,
  testUser,
  textUpdate,
  videoUpdate,
} from '../helpers/mockUpdates';

const alice = testUser(301, 'Alice');
const helperBot = testUser(302, 'Helper', { is_bot: true });

describe('isJoinTransition', () => {
  it.each([
    ['left', 'member', true],
    ['kicked', 'member', true],
    ['left', 'administrator', true],
    ['member', 'member', false],
    ['member', 'left', false],
    ['restricted', 'member', false],
  ])('%s -> %s is %s', (from, to, expected) => {
    expect(isJoinTransition(from, to)).toBe(expected);
  });
});

describe('JoinDeduplicator', () => {
  it('accepts a join once per window', () => {
    let clock = 0;
    const dedup = new JoinDeduplicator(10_000, () => clock);

    expect(dedup.accept(-1, 1)).toBe(true);
    expect(dedup.accept(-1, 1)).toBe(false);
    expect(dedup.accept(-1, 2)).toBe(true);
    expect(dedup.accept(-2, 1)).toBe(true);

    clock = 9_999;
    expect(dedup.accept(-1, 1)).toBe(false);
    clock = 10_000;
    expect(dedup.accept(-1, 1)).toBe(true);
  });

  it('accepts a join again once the member is forgotten', () => {
    const dedup = new JoinDeduplicator(10_000, () => 0);

    expect(dedup.accept(-1, 1)).toBe(true);
    dedup.forget(-1, 1);
    expect(dedup.accept(-1, 1)).toBe(true);
    expect(dedup.accept(-1, 1)).toBe(false);
  });
});

describe('bot wiring', () => {
  let gateway: FakeGateway;
  let clock: number;
  let timers: ManualTimerService;
  let app: App;
  let bot: Telegraf;

  beforeEach(() => {
    gateway = new FakeGateway();
    timers = new ManualTimerService();
    clock = 1_000_000;
    app = createApp({
      config: { botToken: 'test-bot-token', adminIds: [], timeoutSeconds: 30, logLevel: 'error' },
      gateway,
      timers,
      now: () => clock,
    });
    bot = createTestBot();
    bot.use(createMessageFilter(app.moderation));
    registerMemberHandlers(bot, app.moderation, new JoinDeduplicator(10_000, () => clock));
    registerMessageHandlers(bot, app.moderation);
  });

  describe('joins', () => {
    it('handles a join reported by both update kinds once', async () => {
      await bot.handleUpdate(chatMemberUpdate(alice, 'left', 'member'));
      await bot.handleUpdate(newMembersUpdate([alice]));

      expect(app.stats.snapshot().totalJoins).toBe(1);
      expect(app.tracker.isPending(TEST_GROUP_ID, alice.id)).toBe(true);
      expect(gateway.sentTexts()).toEqual([
        '👋 Welcome Alice! 📹 Post a video within 30 seconds to stay in the group!',
      ]);
    });

    it('ignores member updates that are not joins', async () => {
      await bot.handleUpdate(chatMemberUpdate(alice, 'member', 'left'));
      expect(app.stats.snapshot().totalJoins).toBe(0);
    });

    it('treats a ban lifted into membership as a join', async () => {
      await bot.handleUpdate(chatMemberUpdate(alice, 'kicked', 'member'));
      expect(app.tracker.isPending(TEST_GROUP_ID, alice.id)).toBe(true);
    });

    it('treats a rejoin right after a spam removal as a new join', async () => {
      await bot.handleUpdate(chatMemberUpdate(alice, 'left', 'member'));
      clock += 2_000;
      await bot.handleUpdate(textUpdate(alice, 'cheap deals at t.me/dealsdeals'));
      expect(gateway.removed).toEqual([{ groupId: TEST_GROUP_ID, userId: alice.id }]);

      clock += 3_000;
      await bot.handleUpdate(chatMemberUpdate(alice, 'left', 'member'));

      expect(app.tracker.isPending(TEST_GROUP_ID, alice.id)).toBe(true);
      expect(app.stats.snapshot().totalJoins).toBe(2);
      expect(gateway.sentTexts()).toEqual([
        '👋 Welcome Alice! 📹 Post a video within 30 seconds to stay in the group!',
        '⚠️ Alice was removed for posting links',
        '👋 Welcome Alice! 📹 Post a video within 30 seconds to stay in the group!',
      ]);
    });

    it('treats a rejoin right after a deadline removal as a new join', async () => {
      await bot.handleUpdate(newMembersUpdate([alice]));
      clock += 5_000;
      timers.fire(0);
      await vi.waitFor(() => expect(gateway.sent).toHaveLength(2));

      await bot.handleUpdate(newMembersUpdate([alice]));

      expect(app.tracker.isPending(TEST_GROUP_ID, alice.id)).toBe(true);
      expect(app.stats.snapshot().totalJoins).toBe(2);
    });

    it('skips bots among new members', async () => {
      await bot.handleUpdate(newMembersUpdate([helperBot, alice]));

      expect(app.stats.snapshot().totalJoins).toBe(1);
      expect(app.tracker.pendingCount).toBe(1);
    });
  });

  describe('messages', () => {
    it('verifies a pending member who posts a video', async () => {
      await bot.handleUpdate(newMembersUpdate([alice]));
      clock += 20_000;
      await bot.handleUpdate(videoUpdate(alice));

      expect(app.tracker.isVerified(TEST_GROUP_ID, alice.id)).toBe(true);
      expect(gateway.sentTexts()[1]).toBe(
        '✅ Great job Alice! You posted a video in 20.0 seconds. Welcome to the group! 🎉\n🏆 You earned 50 points! Total: 50 points',
      );
    });

    it('stops the chain after a spam removal', async () => {
      app.settings.toggleInteractionMode();
      const update = textUpdate(alice, 'cheap deals at t.me/dealsdeals');

      await bot.handleUpdate(update);

      expect(app.tracker.pendingCount).toBe(0);
      expect(gateway.removed).toEqual([{ groupId: TEST_GROUP_ID, userId: alice.id }]);
      expect(gateway.sentTexts()).toEqual(['⚠️ Alice was removed for posting links']);
    });

    it('starts the interaction deadline on a plain group message', async () => {
      app.settings.toggleInteractionMode();
      await bot.handleUpdate(textUpdate(alice, 'hi everyone'));

      expect(app.tracker.getState(TEST_GROUP_ID, alice.id)).toBe('pending_interaction');
    });

    it('ignores private chats, commands and bots', async () => {
      app.settings.toggleInteractionMode();

      await bot.handleUpdate(textUpdate(alice, 'hello', privateChat(alice)));
      await bot.handleUpdate(textUpdate(alice, '/help'));
      await bot.handleUpdate(textUpdate(helperBot, 'www.example.org'));

      expect(app.tracker.pendingCount).toBe(0);
      expect(gateway.sent).toEqual([]);
      expect(gateway.removed).toEqual([]);
    });

    it('lets the message through when the spam check throws', async () => {
      await bot.handleUpdate(newMembersUpdate([alice]));
      vi.spyOn(app.moderation, 'screenMessage').mockRejectedValue(new Error('screen failed'));

      await bot.handleUpdate(videoUpdate(alice));

      expect(app.tracker.isVerified(TEST_GROUP_ID, alice.id)).toBe(true);
    });
  });
});
