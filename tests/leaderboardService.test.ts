import assert from 'node:assert/strict';
import test from 'node:test';

import type { ScoreRecord } from '../src/domain/scoring.js';
import { AnalyticsProjector } from '../src/services/analyticsService.js';
import { LeaderboardAggregator } from '../src/services/leaderboardService.js';
import { deferred } from './support/deferred.js';
import { InMemoryGameStore } from './support/inMemoryGameStore.js';

function scoreRecord(sessionId: string, userId: string, deviationMs: number, minute = 0): ScoreRecord {
  const startedAt = `2025-01-01T00:${String(minute).padStart(2, '0')}:00.000Z`;
  return {
    sessionId,
    userId,
    elapsedMs: 10000 - deviationMs,
    deviationMs,
    score: 1000 - deviationMs / 10,
    startedAt,
    recordedAt: startedAt
  };
}

function seed(store: InMemoryGameStore, records: ScoreRecord[]): void {
  for (const record of records) {
    store.scores.set(record.sessionId, record);
  }
}

test('LeaderboardAggregator: 最初の読み出しでストアから一度だけ読み込む', async () => {
  const store = new InMemoryGameStore();
  seed(store, [scoreRecord('s1', 'alice', 100), scoreRecord('s2', 'bob', 50)]);
  const leaderboard = new LeaderboardAggregator(store);

  const page = await leaderboard.rank(10);
  assert.deepEqual(page.entries.map((entry) => entry.userId), ['bob', 'alice']);
  assert.equal(page.total, 2);
  await leaderboard.rank(1, 1);
  assert.equal(store.loadCalls, 1);
});

test('LeaderboardAggregator: 同じセッションの記録は二重に数えない', async () => {
  const store = new InMemoryGameStore();
  const record = scoreRecord('s1', 'alice', 100);
  seed(store, [record]);
  const leaderboard = new LeaderboardAggregator(store);

  leaderboard.record(record);
  leaderboard.record(record);
  const entry = await leaderboard.entryFor('alice');
  assert.equal(entry?.gamesPlayed, 1);
  assert.equal(entry?.meanDeviationMs, 100);
});

test('LeaderboardAggregator: 新しい記録で順位が入れ替わる', async () => {
  const store = new InMemoryGameStore();
  seed(store, [scoreRecord('s1', 'alice', 100), scoreRecord('s2', 'bob', 200)]);
  const leaderboard = new LeaderboardAggregator(store);
  assert.equal((await leaderboard.entryFor('bob'))?.rank, 2);

  leaderboard.record(scoreRecord('s3', 'bob', 0, 1));
  const bob = await leaderboard.entryFor('bob');
  assert.equal(bob?.rank, 1);
  assert.equal(bob?.meanDeviationMs, 100);
  assert.equal(bob?.gamesPlayed, 2);
  assert.equal(await leaderboard.entryFor('nobody'), null);
});

test('LeaderboardAggregator: 読み込みに失敗したら次の読み出しで再試行する', async () => {
  const store = new InMemoryGameStore();
  seed(store, [scoreRecord('s1', 'alice', 100)]);
  let failures = 1;
  const leaderboard = new LeaderboardAggregator({
    loadScoreRecords: async (userId?: string) => {
      if (failures > 0) {
        failures -= 1;
        throw new Error('db down');
      }
      return store.loadScoreRecords(userId);
    }
  });
  await assert.rejects(leaderboard.rank(10), /db down/);
  const page = await leaderboard.rank(10);
  assert.equal(page.total, 1);
});

test('LeaderboardAggregator: refresh 中に届いた記録は失われない', async () => {
  const load = deferred<ScoreRecord[]>();
  let calls = 0;
  const leaderboard = new LeaderboardAggregator({
    loadScoreRecords: () => {
      calls += 1;
      return calls === 1 ? Promise.resolve([]) : load.promise;
    }
  });
  assert.equal((await leaderboard.rank(10)).total, 0);

  const refreshing = leaderboard.refresh();
  leaderboard.record(scoreRecord('late', 'carol', 10, 5));
  load.resolve([scoreRecord('s1', 'alice', 100)]);
  await refreshing;

  const page = await leaderboard.rank(10);
  assert.deepEqual(page.entries.map((entry) => entry.userId), ['carol', 'alice']);
  assert.equal(calls, 2);
});

test('LeaderboardAggregator: 不正なページ指定は ValidationError', async () => {
  const leaderboard = new LeaderboardAggregator(new InMemoryGameStore());
  await assert.rejects(leaderboard.rank(0), { name: 'ValidationError' });
  await assert.rejects(leaderboard.rank(10, -1), { name: 'ValidationError' });
});

test('AnalyticsProjector: 本人の記録だけを要約する', async () => {
  const store = new InMemoryGameStore();
  seed(store, [
    scoreRecord('s1', 'alice', 300, 1),
    scoreRecord('s2', 'alice', 100, 2),
    scoreRecord('s3', 'bob', 0, 3)
  ]);
  const analytics = new AnalyticsProjector(store);
  const summary = await analytics.summarize('alice');
  assert.equal(summary.stats?.gamesPlayed, 2);
  assert.equal(summary.stats?.meanDeviationMs, 200);
  assert.deepEqual(summary.trend, {
    window: 1,
    recentMeanDeviationMs: 100,
    previousMeanDeviationMs: 300,
    direction: 'improving'
  });
  assert.deepEqual([...summary.history].map((record) => record.sessionId), ['s1', 's2']);
});
