/**
 * 個人の成績サマリー。順位付けは行わず、リーダーボードと同じ集計プリミティブで記述統計だけを出す。
 */
import { accumulate, emptyAggregate, meanDeviation } from './leaderboard.js';
import { accuracyFor, DEFAULT_TARGET_MS, type ScoreRecord } from './scoring.js';

const MAX_TREND_WINDOW = 5;

export interface UserStats {
  gamesPlayed: number;
  meanDeviationMs: number;
  bestDeviationMs: number;
  averageScore: number;
  bestScore: number;
  accuracy: number;
}

/** 確定したセッションの状態別件数。採点記録を持たない期限切れもここに数える。 */
export interface SessionTally {
  stopped: number;
  expired: number;
}

export interface GameCounts {
  totalGames: number;
  completedGames: number;
  expiredGames: number;
}

export type TrendDirection = 'improving' | 'declining' | 'steady';

export interface Trend {
  window: number;
  recentMeanDeviationMs: number;
  previousMeanDeviationMs: number;
  direction: TrendDirection;
}

export interface AnalyticsSummary {
  userId: string;
  stats: UserStats | null;
  games: GameCounts;
  history: ScoreHistory;
  trend: Trend | null;
}

const compareChronologically = (a: ScoreRecord, b: ScoreRecord): number => {
  if (a.startedAt !== b.startedAt) return a.startedAt < b.startedAt ? -1 : 1;
  if (a.sessionId === b.sessionId) return 0;
  return a.sessionId < b.sessionId ? -1 : 1;
};

/**
 * 開始時刻順の採点履歴。反復のたびに新しいジェネレーターを返すので何度でも走査できる。
 */
export class ScoreHistory implements Iterable<ScoreRecord> {
  readonly #records: readonly ScoreRecord[];

  constructor(records: Iterable<ScoreRecord>) {
    this.#records = [...records].sort(compareChronologically);
  }

  get size(): number {
    return this.#records.length;
  }

  *[Symbol.iterator](): Generator<ScoreRecord> {
    for (const record of this.#records) {
      yield record;
    }
  }

  *slice(offset: number, limit: number): Generator<ScoreRecord> {
    const end = Math.min(this.#records.length, offset + limit);
    for (let i = Math.max(0, offset); i < end; i += 1) {
      yield this.#records[i];
    }
  }

  /** 直近 limit 件（古い順）。 */
  latest(limit: number): Generator<ScoreRecord> {
    return this.slice(Math.max(0, this.#records.length - limit), limit);
  }
}

export function computeStats(records: Iterable<ScoreRecord>, userId: string, targetMs = DEFAULT_TARGET_MS): UserStats | null {
  let aggregate = emptyAggregate(userId);
  for (const record of records) {
    aggregate = accumulate(aggregate, record);
  }
  if (aggregate.gamesPlayed === 0) {
    return null;
  }
  const mean = meanDeviation(aggregate);
  return {
    gamesPlayed: aggregate.gamesPlayed,
    meanDeviationMs: mean,
    bestDeviationMs: aggregate.bestDeviationMs,
    averageScore: aggregate.totalScore / aggregate.gamesPlayed,
    bestScore: aggregate.bestScore,
    accuracy: accuracyFor(mean, targetMs)
  };
}

function windowMean(history: ScoreHistory, offset: number, size: number): number {
  let total = 0;
  for (const record of history.slice(offset, size)) {
    total += record.deviationMs;
  }
  return total / size;
}

export function computeTrend(history: ScoreHistory): Trend | null {
  const window = Math.min(MAX_TREND_WINDOW, Math.floor(history.size / 2));
  if (window === 0) {
    return null;
  }
  const recentMeanDeviationMs = windowMean(history, history.size - window, window);
  const previousMeanDeviationMs = windowMean(history, history.size - window * 2, window);
  let direction: TrendDirection = 'steady';
  if (recentMeanDeviationMs < previousMeanDeviationMs) direction = 'improving';
  if (recentMeanDeviationMs > previousMeanDeviationMs) direction = 'declining';
  return { window, recentMeanDeviationMs, previousMeanDeviationMs, direction };
}

export function countGames(tally: SessionTally): GameCounts {
  return {
    totalGames: tally.stopped + tally.expired,
    completedGames: tally.stopped,
    expiredGames: tally.expired
  };
}

/** tally を省略した場合は採点記録の件数だけを完了数として数える。 */
export function projectSummary(
  userId: string,
  records: Iterable<ScoreRecord>,
  targetMs = DEFAULT_TARGET_MS,
  tally?: SessionTally
): AnalyticsSummary {
  const history = new ScoreHistory([...records].filter((record) => record.userId === userId));
  return {
    userId,
    stats: computeStats(history, userId, targetMs),
    games: countGames(tally ?? { stopped: history.size, expired: 0 }),
    history,
    trend: computeTrend(history)
  };
}
