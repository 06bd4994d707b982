/**
 * Unit Tests for the Reward Ledger and Stats counters
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { RewardLedger, pointsFor } from '../../src/services/rewardLedger';
import { SettingsStore } from '../../src/services/settingsStore';
import { StatsService } from '../../src/services/statsService';

const GROUP = -100;
const key = (userId: number, groupId: number = GROUP) => ({ groupId, userId });

describe('pointsFor', () => {
  it.each([
    [0, 100],
    [5_000, 100],
    [10_000, 100],
    [10_001, 50],
    [15_000, 50],
    [30_000, 50],
    [30_001, 25],
    [45_000, 25],
  ])('%i ms -> %i points', (elapsedMs, points) => {
    expect(pointsFor(elapsedMs)).toBe(points);
  });
});

describe('RewardLedger', () => {
  let settings: SettingsStore;
  let ledger: RewardLedger;

  beforeEach(() => {
    settings = new SettingsStore();
    ledger = new RewardLedger(settings);
  });

  it('accumulates points per member', () => {
    expect(ledger.awardFor(key(1), 'Ann', 5_000)).toBe(100);
    expect(ledger.awardFor(key(1), 'Ann', 15_000)).toBe(50);
    expect(ledger.totalFor(key(1))).toBe(150);
    expect(ledger.totalFor(key(2))).toBe(0);
  });

  it('awards nothing and records nothing when rewards are off', () => {
    settings.toggleRewards();

    expect(ledger.awardFor(key(1), 'Ann', 5_000)).toBe(0);
    expect(ledger.totalFor(key(1))).toBe(0);
    expect(ledger.size).toBe(0);
  });

  describe('leaderboard', () => {
    it('ranks by points and keeps first-earned order for ties', () => {
      ledger.awardFor(key(1), 'A', 5_000);
      ledger.awardFor(key(2), 'B', 5_000);
      ledger.awardFor(key(3), 'C', 15_000);

      expect([...ledger.leaderboard(10)].map((row) => [row.name, row.points])).toEqual([
        ['A', 100],
        ['B', 100],
        ['C', 50],
      ]);
    });

    it('limits the number of rows', () => {
      for (let id = 1; id <= 12; id += 1) {
        ledger.awardFor(key(id), `User ${id}`, 45_000);
      }
      expect([...ledger.leaderboard(10)]).toHaveLength(10);
      expect([...ledger.leaderboard(0)]).toEqual([]);
    });

    it('filters by group', () => {
      ledger.awardFor(key(1, -1), 'One', 5_000);
      ledger.awardFor(key(2, -2), 'Two', 5_000);

      expect([...ledger.leaderboard(10, -2)]).toEqual([{ groupId: -2, userId: 2, name: 'Two', points: 100 }]);
    });

    it('reflects awards made after an earlier listing', () => {
      ledger.awardFor(key(1), 'A', 45_000);
      expect([...ledger.leaderboard(10)][0].name).toBe('A');

      ledger.awardFor(key(2), 'B', 5_000);
      expect([...ledger.leaderboard(10)].map((row) => row.name)).toEqual(['B', 'A']);
    });

    it('yields copies of the rows', () => {
      ledger.awardFor(key(1), 'A', 5_000);
      for (const row of ledger.leaderboard(10)) {
        row.points = 0;
      }
      expect(ledger.totalFor(key(1))).toBe(100);
    });
  });
});

describe('StatsService', () => {
  it('counts and derives rates', () => {
    const stats = new StatsService();
    for (let i = 0; i < 4; i += 1) stats.increment('totalJoins');
    stats.increment('usersVerified');
    stats.increment('usersKicked');
    stats.increment('linksBlocked');

    expect(stats.snapshot()).toEqual({
      totalJoins: 4,
      usersVerified: 1,
      usersKicked: 1,
      spamBlocked: 0,
      linksBlocked: 1,
      suspiciousKicked: 0,
    });
    expect(stats.protectionActions()).toBe(2);
    expect(stats.successRate()).toBe(25);
    expect(stats.protectionRate()).toBe(50);
  });

  it('does not divide by zero before any join', () => {
    const stats = new StatsService();
    expect(stats.successRate()).toBe(0);
    expect(stats.protectionRate()).toBe(0);
  });
});
