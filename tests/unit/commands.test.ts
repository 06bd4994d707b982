/**
 * Unit Tests for the Command Dispatcher and the bot commands
 *
 * Tests cover:
 * - Admin-only access (configured admin ids, group admins, plain members)
 * - Settings commands and their validation replies
 * - Informational commands (/help, /status, /stats, /report, /leaderboard)
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { createApp, type App } from '../../src/bot';
import { CommandDispatcher, FAILURE_REPLY, UNAUTHORIZED_REPLY, type CommandRequest } from '../../src/commands/dispatcher';
import type { Config } from '../../src/config';
import type { MessageContent } from '../../src/services/moderationGateway';
import { contentText, FakeGateway } from '../helpers/fakeGateway';
import { ManualTimerService } from '../helpers/manualTimers';

const GROUP = -2002;
const OWNER_ID = 7;
const ADMIN_ID = 8;
const MEMBER_ID = 9;

const testConfig: Config = {
  botToken: 'test-bot-token',
  adminIds: [OWNER_ID],
  timeoutSeconds: 30,
  logLevel: 'error',
};

describe('commands', () => {
  let gateway: FakeGateway;
  let app: App;

  beforeEach(() => {
    gateway = new FakeGateway();
    gateway.setRole(GROUP, ADMIN_ID, 'admin');
    app = createApp({ config: testConfig, gateway, timers: new ManualTimerService(), now: () => 0 });
  });

  async function run(name: string, payload = '', userId = OWNER_ID, displayName = 'Olivia'): Promise<string | null> {
    const request: CommandRequest = {
      chatId: GROUP,
      userId,
      displayName,
      args: payload.length > 0 ? payload.split(/\s+/) : [],
      payload,
    };
    const reply: MessageContent | null = await app.dispatcher.dispatch(name, request);
    return reply === null ? null : contentText(reply);
  }

  describe('CommandDispatcher', () => {
    it('returns null for unknown commands', async () => {
      expect(await run('nosuchcommand')).toBeNull();
    });

    it('rejects duplicate definitions', () => {
      const definition = { name: 'x', description: 'x', adminOnly: false, run: () => 'x' };
      expect(() => new CommandDispatcher(async () => {}, [definition, definition])).toThrow(
        'Duplicate command definition: /x',
      );
    });

    it('turns unexpected errors into a generic reply', async () => {
      const dispatcher = new CommandDispatcher(async () => {}, [
        {
          name: 'boom',
          description: 'fails',
          adminOnly: false,
          run: () => {
            throw new Error('kaboom');
          },
        },
      ]);
      const reply = await dispatcher.dispatch('boom', {
        chatId: GROUP,
        userId: MEMBER_ID,
        displayName: 'M',
        args: [],
        payload: '',
      });
      expect(reply).toBe(FAILURE_REPLY);
    });
  });

  describe('authorization', () => {
    it('lets configured admins run settings commands from any chat', async () => {
      expect(await run('pause')).toBe("⏸️ Bot paused! New members won't be kicked until you use /resume");
      expect(app.settings.isPaused).toBe(true);
      expect(gateway.roleLookups).toEqual([]);
    });

    it('lets group admins run settings commands', async () => {
      expect(await run('settimer', '45', ADMIN_ID)).toBe('✅ Timer updated to 45 seconds!');
      expect(app.settings.timeout).toBe(45);
    });

    it('rejects plain members without changing anything', async () => {
      expect(await run('settimer', '45', MEMBER_ID)).toBe(UNAUTHORIZED_REPLY);
      expect(await run('antispam', '', MEMBER_ID)).toBe(UNAUTHORIZED_REPLY);
      expect(await run('stats', '', MEMBER_ID)).toBe(UNAUTHORIZED_REPLY);
      expect(app.settings.timeout).toBe(30);
      expect(app.settings.isAntiSpamEnabled).toBe(true);
    });

    it('rejects when the role lookup fails', async () => {
      gateway.fail('getMemberRole');
      expect(await run('pause', '', ADMIN_ID)).toBe(UNAUTHORIZED_REPLY);
      expect(app.settings.isPaused).toBe(false);
    });

    it('lets anyone run the public commands', async () => {
      expect(await run('leaderboard', '', MEMBER_ID)).toBe('🏆 No points awarded yet! Reward system may be disabled.');
      expect(gateway.roleLookups).toEqual([]);
    });
  });

  describe('/settimer', () => {
    it('requires exactly one argument', async () => {
      expect(await run('settimer')).toBe('⚠️ Usage: /settimer <seconds>\nExample: /settimer 120 (for 2 minutes)');
      expect(await run('settimer', '10 20')).toBe('⚠️ Usage: /settimer <seconds>\nExample: /settimer 120 (for 2 minutes)');
    });

    it('rejects non-numbers', async () => {
      expect(await run('settimer', 'soon')).toBe('⚠️ Please enter a valid number of seconds.');
      expect(await run('settimer', '12.5')).toBe('⚠️ Please enter a valid number of seconds.');
    });

    it('rejects values out of range', async () => {
      expect(await run('settimer', '5')).toBe('⚠️ Timer must be between 10 seconds and 10 minutes (600 seconds).');
      expect(app.settings.timeout).toBe(30);
    });
  });

  describe('toggles', () => {
    it('/pause and /resume', async () => {
      await run('pause');
      expect(await run('resume')).toBe('▶️ Bot resumed! Video verification is now active.');
      expect(app.settings.isPaused).toBe(false);
    });

    it('/interaction', async () => {
      expect(await run('interaction')).toBe(
        '🔄 Interaction mode ON! Timer now starts when users send their first message (better for offline users)',
      );
      expect(await run('interaction')).toBe(
        '⏰ Interaction mode OFF! Timer starts immediately when users join (default behavior)',
      );
    });

    it('/antispam', async () => {
      expect(await run('antispam')).toBe('⚠️ Anti-spam protection OFF! Only video verification is active');
      expect(app.settings.isAntiSpamEnabled).toBe(false);
    });

    it('/rewards', async () => {
      expect(await run('rewards')).toBe('📝 Reward system OFF! No points will be awarded for videos');
      expect(app.settings.areRewardsEnabled).toBe(false);
    });
  });

  describe('/setwelcome', () => {
    it('shows the current template with placeholders marked', async () => {
      expect(await run('setwelcome')).toBe(
        'Current welcome message:\n\n👋 Welcome [NAME]! 📹 Post a video within [TIMER] seconds to stay in the group!\n\nUse: /setwelcome Your custom message here\nUse {name} for user name and {timer} for timer seconds',
      );
    });

    it('stores the template and previews it with the caller name', async () => {
      expect(await run('setwelcome', 'Hi {name}! {timer}s to post a video.')).toBe(
        '✅ Welcome message updated!\n\nPreview:\nHi Olivia! 30s to post a video.',
      );
      expect(app.settings.snapshot().welcomeTemplate).toBe('Hi {name}! {timer}s to post a video.');
    });
  });

  describe('/schedule', () => {
    it('shows the current schedule', async () => {
      expect(await run('schedule')).toBe(
        'Scheduled mode: OFF\nActive hours: 8:00 - 22:00\n\nUsage:\n/schedule toggle - Enable/disable\n/schedule 8 22 - Set hours (8 AM to 10 PM)',
      );
    });

    it('toggles scheduled mode', async () => {
      expect(await run('schedule', 'toggle')).toBe('⏰ Scheduled mode ON! Bot only active 8:00-22:00');
      expect(await run('schedule', 'TOGGLE')).toBe('⏰ Scheduled mode OFF!');
    });

    it('sets the active hours', async () => {
      expect(await run('schedule', '22 6')).toBe('✅ Active hours set to 22:00 - 6:00');
      expect(app.settings.snapshot().activeHours).toEqual({ start: 22, end: 6 });
    });

    it('validates the hours', async () => {
      expect(await run('schedule', '9 25')).toBe('⚠️ Hours must be between 0-23');
      expect(await run('schedule', 'nine ten')).toBe('⚠️ Please provide valid hour numbers');
      expect(await run('schedule', '1 2 3')).toBe('⚠️ Usage: /schedule toggle or /schedule <start> <end>');
      expect(app.settings.snapshot().activeHours).toEqual({ start: 8, end: 22 });
    });
  });

  describe('/banword and /unbanword', () => {
    it('lists the banned words', async () => {
      expect(await run('banword')).toBe(
        '🚫 Banned words: spam, promotion, advertisement, buy now, click here\n\nUsage: /banword <word or phrase>',
      );
    });

    it('adds and removes phrases', async () => {
      expect(await run('banword', 'Free Money')).toBe('✅ Added "free money" to the banned words.');
      expect(await run('banword', 'free money')).toBe('"free money" is already banned.');
      expect(await run('unbanword', 'free money')).toBe('✅ Removed "free money" from the banned words.');
      expect(await run('unbanword', 'free money')).toBe('"free money" is not in the banned words.');
    });

    it('requires a phrase to remove', async () => {
      expect(await run('unbanword')).toBe('⚠️ Usage: /unbanword <word or phrase>');
    });
  });

  describe('informational commands', () => {
    it('/help lists the current settings', async () => {
      const reply = await run('help', '', MEMBER_ID);
      expect(reply?.split('\n').slice(-2)).toEqual([
        'Timer: 30s | Interaction: OFF | Anti-spam: ON',
        'Rewards: ON | Schedule: OFF',
      ]);
    });

    it('/status reports counters and tracker sizes', async () => {
      await app.moderation.handleJoin({ groupId: GROUP, userId: 100, displayName: 'New', isBot: false });

      expect(await run('status', '', MEMBER_ID)).toBe(
        '🤖 Video Gate Bot Status\n\n⏱️ Timer: 30 seconds\n▶️ Status: Active\n👥 Pending verification: 1\n✅ Verified members: 0\n\n📊 Statistics\n• Total joins: 1\n• Users verified: 0\n• Users kicked: 0',
      );
    });

    it('/report summarizes protection actions', async () => {
      const reply = await run('report');
      expect(reply?.split('\n').slice(0, 3)).toEqual(['📈 Daily Protection Report', '', '🛡️ Total Protection Actions: 0']);
      expect(reply).toContain('📊 Success Rate: 0.0%');
    });

    it('/stats includes the timer breakdown', async () => {
      await run('settimer', '125');
      const reply = await run('stats');
      expect(reply?.split('\n').at(-1)).toBe('Timer: 125s (2min 5s)');
    });

    it('/leaderboard ranks this group only', async () => {
      app.ledger.awardFor({ groupId: GROUP, userId: 1 }, 'Ann', 5_000);
      app.ledger.awardFor({ groupId: GROUP, userId: 2 }, 'Ben', 45_000);
      app.ledger.awardFor({ groupId: GROUP, userId: 3 }, 'Cat', 15_000);
      app.ledger.awardFor({ groupId: GROUP, userId: 4 }, 'Dan', 50_000);
      app.ledger.awardFor({ groupId: -1, userId: 5 }, 'Elsewhere', 1_000);

      expect(await run('leaderboard', '', MEMBER_ID)).toBe(
        '🏆 Group Leaderboard - Top Video Posters:\n\n🥇 Ann: 100 points\n🥈 Cat: 50 points\n🥉 Ben: 25 points\n4. Dan: 25 points',
      );
    });
  });
});
