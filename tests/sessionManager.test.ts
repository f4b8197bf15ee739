import assert from 'node:assert/strict';
import test from 'node:test';

import { pino } from 'pino';

import {
  ConflictError,
  ForbiddenError,
  InternalInconsistencyError,
  InvalidStateError,
  NotFoundError
} from '../src/domain/errors.js';
import type { ScoreRecord } from '../src/domain/scoring.js';
import { AnalyticsProjector } from '../src/services/analyticsService.js';
import { LeaderboardAggregator } from '../src/services/leaderboardService.js';
import { SessionManager, type SessionManagerOptions } from '../src/services/sessionManager.js';
import { InMemoryGameStore } from './support/inMemoryGameStore.js';
import { ManualClock } from './support/manualClock.js';

function createManager(overrides: Partial<SessionManagerOptions> = {}, clock = new ManualClock()) {
  const store = new InMemoryGameStore();
  const sessions = new SessionManager({
    store,
    clock,
    logger: pino({ level: 'silent' }),
    ...overrides
  });
  return { store, clock, sessions };
}

test('SessionManager: 10秒ちょうどで止めると満点が記録される', async () => {
  const { store, clock, sessions } = createManager();
  const recorded: ScoreRecord[] = [];
  sessions.onScoreRecorded((record) => {
    recorded.push(record);
  });

  const started = await sessions.startSession('alice');
  assert.equal(started.targetMs, 10000);
  assert.equal(started.startedAt, '2025-01-01T00:00:00.000Z');
  assert.equal(sessions.activeCount(), 1);

  clock.advance(10000);
  const { outcome, record, session } = await sessions.stopSession(started.sessionId, 'alice');
  assert.deepEqual(outcome, { elapsedMs: 10000, deviationMs: 0, score: 1000, accuracy: 100, grade: 'A+' });
  assert.deepEqual(record, {
    sessionId: started.sessionId,
    userId: 'alice',
    elapsedMs: 10000,
    deviationMs: 0,
    score: 1000,
    startedAt: '2025-01-01T00:00:00.000Z',
    recordedAt: '2025-01-01T00:00:10.000Z'
  });
  assert.equal(session.status, 'stopped');
  assert.equal(sessions.activeCount(), 0);
  assert.equal(await sessions.getActiveSession('alice'), null);
  assert.deepEqual(store.scores.get(started.sessionId), record);
  assert.equal(store.sessions.get(started.sessionId)?.status, 'stopped');
  assert.deepEqual(recorded, [record]);
});

test('SessionManager: 少し早く止めた場合', async () => {
  const { clock, sessions } = createManager();
  const started = await sessions.startSession('bob');
  clock.advance(9850);
  const { outcome } = await sessions.stopSession(started.sessionId, 'bob');
  assert.equal(outcome.deviationMs, 150);
  assert.equal(outcome.score, 985);
  assert.equal(outcome.grade, 'B');
});

test('SessionManager: 計測中に再度開始すると ConflictError', async () => {
  const { sessions } = createManager();
  await sessions.startSession('alice');
  await assert.rejects(sessions.startSession('alice'), ConflictError);
  assert.equal(sessions.activeCount(), 1);
});

test('SessionManager: 同時に開始しても成功するのは1件だけ', async () => {
  const { sessions } = createManager();
  const results = await Promise.allSettled([
    sessions.startSession('alice'),
    sessions.startSession('alice'),
    sessions.startSession('alice')
  ]);
  const fulfilled = results.filter((result) => result.status === 'fulfilled');
  const rejected = results.filter((result) => result.status === 'rejected');
  assert.equal(fulfilled.length, 1);
  assert.equal(rejected.length, 2);
  for (const result of rejected) {
    assert.ok(result.reason instanceof ConflictError);
  }
  assert.equal(sessions.activeCount(), 1);
});

test('SessionManager: 別ユーザーは並行して計測できる', async () => {
  const { sessions } = createManager();
  await Promise.all([sessions.startSession('alice'), sessions.startSession('bob')]);
  assert.equal(sessions.activeCount(), 2);
});

test('SessionManager: 停止済みセッションの二重停止は InvalidStateError', async () => {
  const { clock, sessions } = createManager();
  const started = await sessions.startSession('alice');
  clock.advance(9000);
  await sessions.stopSession(started.sessionId, 'alice');
  await assert.rejects(sessions.stopSession(started.sessionId, 'alice'), (error: unknown) => {
    assert.ok(error instanceof InvalidStateError);
    assert.equal(error.message, 'セッションはすでに停止されています。');
    return true;
  });
});

test('SessionManager: 同時に停止しても採点は1回だけ', async () => {
  const { store, clock, sessions } = createManager();
  const started = await sessions.startSession('alice');
  clock.advance(10000);
  const results = await Promise.allSettled([
    sessions.stopSession(started.sessionId, 'alice'),
    sessions.stopSession(started.sessionId, 'alice')
  ]);
  assert.equal(results[0].status, 'fulfilled');
  assert.equal(results[1].status, 'rejected');
  if (results[1].status === 'rejected') {
    assert.ok(results[1].reason instanceof InvalidStateError);
  }
  assert.equal(store.scores.size, 1);
});

test('SessionManager: 他人のセッションは停止できない', async () => {
  const { clock, sessions } = createManager();
  const started = await sessions.startSession('alice');
  clock.advance(10000);
  await assert.rejects(sessions.stopSession(started.sessionId, 'mallory'), ForbiddenError);
  const active = await sessions.getActiveSession('alice');
  assert.equal(active?.id, started.sessionId);
});

test('SessionManager: 確定済みの他人のセッションも Forbidden', async () => {
  const { clock, sessions } = createManager();
  const started = await sessions.startSession('alice');
  clock.advance(10000);
  await sessions.stopSession(started.sessionId, 'alice');
  await assert.rejects(sessions.stopSession(started.sessionId, 'mallory'), ForbiddenError);
});

test('SessionManager: 存在しないセッションは NotFoundError', async () => {
  const { sessions } = createManager();
  await assert.rejects(sessions.stopSession('missing', 'alice'), NotFoundError);
  await assert.rejects(sessions.expireSession('missing'), NotFoundError);
});

test('SessionManager: 保存に失敗したセッションは計測中のまま残る', async () => {
  const { store, clock, sessions } = createManager();
  const recorded: ScoreRecord[] = [];
  sessions.onScoreRecorded((record) => {
    recorded.push(record);
  });
  const started = await sessions.startSession('alice');
  clock.advance(10000);
  store.failNextSave = new Error('db down');
  await assert.rejects(sessions.stopSession(started.sessionId, 'alice'), /db down/);
  assert.equal(sessions.activeCount(), 1);
  assert.equal(store.scores.size, 0);
  assert.deepEqual(recorded, []);

  clock.advance(500);
  const { outcome } = await sessions.stopSession(started.sessionId, 'alice');
  assert.equal(outcome.elapsedMs, 10500);
  assert.equal(sessions.activeCount(), 0);
});

test('SessionManager: 時計が巻き戻った停止は内部不整合として拒否する', async () => {
  const { store, clock, sessions } = createManager();
  clock.advance(1000);
  const started = await sessions.startSession('alice');
  clock.rewind(10);
  await assert.rejects(sessions.stopSession(started.sessionId, 'alice'), InternalInconsistencyError);
  assert.equal(sessions.activeCount(), 1);
  assert.equal(store.scores.size, 0);
});

test('SessionManager: 壁時計が巻き戻っても終了時刻は開始時刻 + 経過時間', async () => {
  const { store, clock, sessions } = createManager({}, new ManualClock('2025-01-01T01:00:00.000Z'));
  const started = await sessions.startSession('alice');
  clock.advance(10000);
  clock.shiftWall(-60 * 60 * 1000);

  const { record } = await sessions.stopSession(started.sessionId, 'alice');
  assert.equal(record.elapsedMs, 10000);
  assert.equal(record.recordedAt, '2025-01-01T01:00:10.000Z');
  assert.deepEqual(store.sessions.get(started.sessionId), {
    id: started.sessionId,
    userId: 'alice',
    status: 'stopped',
    startedAt: '2025-01-01T01:00:00.000Z',
    endedAt: '2025-01-01T01:00:10.000Z'
  });
});

test('SessionManager: 壁時計が巻き戻っても期限切れの保存は失敗しない', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 }, new ManualClock('2025-01-01T01:00:00.000Z'));
  const started = await sessions.startSession('alice');
  clock.advance(1500);
  clock.shiftWall(-60 * 60 * 1000);

  assert.deepEqual(await sessions.sweepExpired(), { expired: 1, skipped: 0, failed: 0 });
  assert.equal(store.sessions.get(started.sessionId)?.endedAt, '2025-01-01T01:00:01.500Z');
  const next = await sessions.startSession('alice');
  assert.equal(next.startedAt, '2025-01-01T00:00:01.500Z');
});

test('SessionManager: 上限時間を過ぎた停止はセッションを期限切れにする', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 });
  const started = await sessions.startSession('alice');
  clock.advance(1001);
  await assert.rejects(sessions.stopSession(started.sessionId, 'alice'), (error: unknown) => {
    assert.ok(error instanceof InvalidStateError);
    assert.equal(error.message, 'セッションは期限切れです。');
    return true;
  });
  assert.equal(store.sessions.get(started.sessionId)?.status, 'expired');
  assert.equal(store.scores.size, 0);
  assert.equal(sessions.activeCount(), 0);
  await assert.rejects(sessions.stopSession(started.sessionId, 'alice'), InvalidStateError);
});

test('SessionManager: 期限切れのセッションがあっても新しく開始できる', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 });
  const first = await sessions.startSession('alice');
  clock.advance(1001);
  const second = await sessions.startSession('alice');
  assert.notEqual(second.sessionId, first.sessionId);
  assert.equal(store.sessions.get(first.sessionId)?.status, 'expired');
  const active = await sessions.getActiveSession('alice');
  assert.equal(active?.id, second.sessionId);
});

test('SessionManager: 期限切れの計測中セッションは照会時に片付く', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 });
  const started = await sessions.startSession('alice');
  clock.advance(2000);
  assert.equal(await sessions.getActiveSession('alice'), null);
  assert.equal(store.sessions.get(started.sessionId)?.status, 'expired');
  assert.equal(sessions.activeCount(), 0);
});

test('SessionManager: sweepExpired は上限を過ぎたものだけを期限切れにする', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 });
  const a = await sessions.startSession('a');
  const b = await sessions.startSession('b');
  clock.advance(600);
  const c = await sessions.startSession('c');
  clock.advance(500);

  assert.deepEqual(await sessions.sweepExpired(), { expired: 2, skipped: 0, failed: 0 });
  assert.equal(store.sessions.get(a.sessionId)?.status, 'expired');
  assert.equal(store.sessions.get(b.sessionId)?.status, 'expired');
  assert.equal(store.sessions.has(c.sessionId), false);
  assert.equal(sessions.activeCount(), 1);
  assert.deepEqual(await sessions.sweepExpired(), { expired: 0, skipped: 0, failed: 0 });
});

test('SessionManager: 掃除中の個別の失敗は他のセッションに波及しない', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 });
  await sessions.startSession('a');
  await sessions.startSession('b');
  clock.advance(1001);
  store.failNextSave = new Error('db down');
  assert.deepEqual(await sessions.sweepExpired(), { expired: 1, skipped: 0, failed: 1 });
  assert.equal(sessions.activeCount(), 1);
  assert.deepEqual(await sessions.sweepExpired(), { expired: 1, skipped: 0, failed: 0 });
  assert.equal(sessions.activeCount(), 0);
});

test('SessionManager: 掃除と停止が競合しても二重に確定しない', async () => {
  const { store, clock, sessions } = createManager({ maxSessionDurationMs: 1000 });
  const started = await sessions.startSession('a');
  clock.advance(1001);
  const [sweep, stop] = await Promise.allSettled([
    sessions.sweepExpired(),
    sessions.stopSession(started.sessionId, 'a')
  ]);
  assert.equal(stop.status, 'rejected');
  assert.equal(sweep.status, 'fulfilled');
  if (sweep.status === 'fulfilled') {
    assert.equal(sweep.value.expired + sweep.value.skipped, 1);
  }
  assert.equal(store.sessions.size, 1);
  assert.equal(store.sessions.get(started.sessionId)?.status, 'expired');
});

test('SessionManager: リスナーの失敗は停止結果に影響しない', async () => {
  const { clock, sessions } = createManager();
  const received: string[] = [];
  sessions.onScoreRecorded(() => {
    throw new Error('listener failed');
  });
  const unsubscribe = sessions.onScoreRecorded((record) => {
    received.push(record.sessionId);
  });
  const first = await sessions.startSession('alice');
  clock.advance(10000);
  await sessions.stopSession(first.sessionId, 'alice');
  assert.deepEqual(received, [first.sessionId]);

  unsubscribe();
  const second = await sessions.startSession('alice');
  clock.advance(10000);
  await sessions.stopSession(second.sessionId, 'alice');
  assert.deepEqual(received, [first.sessionId]);
});

test('SessionManager: 採点設定を差し替えられる', async () => {
  const { clock, sessions } = createManager({ scoring: { targetMs: 5000 } });
  assert.equal(sessions.targetMs, 5000);
  assert.deepEqual(sessions.scoring, { targetMs: 5000, cutoffMs: 5000, maxScore: 1000 });
  const started = await sessions.startSession('alice');
  assert.equal(started.targetMs, 5000);
  clock.advance(6000);
  const { outcome } = await sessions.stopSession(started.sessionId, 'alice');
  assert.equal(outcome.deviationMs, 1000);
  assert.equal(outcome.score, 800);
});

test('SessionManager: ID の重複は内部不整合として検出する', async () => {
  const { sessions } = createManager({ generateId: () => 'fixed-id' });
  await sessions.startSession('alice');
  await assert.rejects(sessions.startSession('bob'), InternalInconsistencyError);
  assert.equal(sessions.activeCount(), 1);
});

function createScoredManager() {
  const context = createManager();
  const leaderboard = new LeaderboardAggregator(context.store);
  context.sessions.onScoreRecorded((record) => leaderboard.record(record));
  return { ...context, leaderboard };
}

async function play(
  { sessions, clock }: { sessions: SessionManager; clock: ManualClock },
  userId: string,
  elapsed: number
): Promise<void> {
  const started = await sessions.startSession(userId);
  clock.advance(elapsed);
  await sessions.stopSession(started.sessionId, userId);
}

test('リーダーボード: 10秒ちょうどの A が 12秒の B より上位', async () => {
  const context = createScoredManager();
  await play(context, 'A', 10000);
  await play(context, 'B', 12000);

  const page = await context.leaderboard.rank(2, 0);
  assert.equal(page.total, 2);
  assert.deepEqual(
    page.entries.map(({ rank, userId, meanDeviationMs }) => ({ rank, userId, meanDeviationMs })),
    [
      { rank: 1, userId: 'A', meanDeviationMs: 0 },
      { rank: 2, userId: 'B', meanDeviationMs: 2000 }
    ]
  );
});

test('リーダーボード: 最良の1回より平均の誤差が優先される', async () => {
  const context = createScoredManager();
  await play(context, 'A', 10000);
  await play(context, 'A', 14000);
  await play(context, 'B', 11000);

  const page = await context.leaderboard.rank(10, 0);
  assert.deepEqual(page.entries.map((entry) => entry.userId), ['B', 'A']);
  const a = await context.leaderboard.entryFor('A');
  assert.equal(a?.bestDeviationMs, 0);
  assert.equal(a?.meanDeviationMs, 2000);
  assert.equal((await context.leaderboard.entryFor('B'))?.meanDeviationMs, 1000);
});

test('リーダーボード: 期限切れのセッションは集計に入らない', async () => {
  const context = createScoredManager();
  const { sessions, clock, store, leaderboard } = context;
  await play(context, 'A', 10500);
  const abandoned = await sessions.startSession('A');
  clock.advance(30 * 60 * 1000 + 1);
  assert.deepEqual(await sessions.sweepExpired(), { expired: 1, skipped: 0, failed: 0 });
  assert.equal(store.sessions.get(abandoned.sessionId)?.status, 'expired');

  const entry = await leaderboard.entryFor('A');
  assert.equal(entry?.gamesPlayed, 1);
  assert.equal(entry?.meanDeviationMs, 500);

  const summary = await new AnalyticsProjector(store).summarize('A');
  assert.equal(summary.stats?.gamesPlayed, 1);
  assert.deepEqual(summary.games, { totalGames: 2, completedGames: 1, expiredGames: 1 });
});
