/**
 * リーダーボードの集計と順位計算ロジック。
 * 集計プリミティブ（accumulate など）は個人分析でも共有する。
 */
import { ValidationError } from './errors.js';
import { accuracyFor, DEFAULT_TARGET_MS, type ScoreRecord } from './scoring.js';

export interface UserAggregate {
  userId: string;
  gamesPlayed: number;
  totalDeviationMs: number;
  bestDeviationMs: number;
  totalScore: number;
  bestScore: number;
}

export interface LeaderboardEntry {
  rank: number;
  userId: string;
  gamesPlayed: number;
  meanDeviationMs: number;
  bestDeviationMs: number;
  bestScore: number;
  accuracy: number;
}

export interface LeaderboardPage {
  entries: LeaderboardEntry[];
  total: number;
}

export function emptyAggregate(userId: string): UserAggregate {
  return {
    userId,
    gamesPlayed: 0,
    totalDeviationMs: 0,
    bestDeviationMs: Number.POSITIVE_INFINITY,
    totalScore: 0,
    bestScore: 0
  };
}

export function accumulate(aggregate: UserAggregate, record: ScoreRecord): UserAggregate {
  return {
    userId: aggregate.userId,
    gamesPlayed: aggregate.gamesPlayed + 1,
    totalDeviationMs: aggregate.totalDeviationMs + record.deviationMs,
    bestDeviationMs: Math.min(aggregate.bestDeviationMs, record.deviationMs),
    totalScore: aggregate.totalScore + record.score,
    bestScore: Math.max(aggregate.bestScore, record.score)
  };
}

export function aggregateByUser(records: Iterable<ScoreRecord>): Map<string, UserAggregate> {
  const aggregates = new Map<string, UserAggregate>();
  for (const record of records) {
    const current = aggregates.get(record.userId) ?? emptyAggregate(record.userId);
    aggregates.set(record.userId, accumulate(current, record));
  }
  return aggregates;
}

export function meanDeviation(aggregate: UserAggregate): number {
  return aggregate.totalDeviationMs / aggregate.gamesPlayed;
}

/**
 * 平均乖離の昇順。同値なら試行回数の多い順、最良乖離の小さい順、userId の昇順。
 * 平均は割り算せずに交差乗算で比較する。
 */
export const compareAggregates = (a: UserAggregate, b: UserAggregate): number => {
  const left = a.totalDeviationMs * b.gamesPlayed;
  const right = b.totalDeviationMs * a.gamesPlayed;
  if (left !== right) return left - right;
  if (a.gamesPlayed !== b.gamesPlayed) return b.gamesPlayed - a.gamesPlayed;
  if (a.bestDeviationMs !== b.bestDeviationMs) return a.bestDeviationMs - b.bestDeviationMs;
  if (a.userId < b.userId) return -1;
  if (a.userId > b.userId) return 1;
  return 0;
};

export function toLeaderboardEntry(aggregate: UserAggregate, rank: number, targetMs = DEFAULT_TARGET_MS): LeaderboardEntry {
  const mean = meanDeviation(aggregate);
  return {
    rank,
    userId: aggregate.userId,
    gamesPlayed: aggregate.gamesPlayed,
    meanDeviationMs: mean,
    bestDeviationMs: aggregate.bestDeviationMs,
    bestScore: aggregate.bestScore,
    accuracy: accuracyFor(mean, targetMs)
  };
}

export function rankAggregates(aggregates: Iterable<UserAggregate>, targetMs = DEFAULT_TARGET_MS): LeaderboardEntry[] {
  return [...aggregates]
    .filter((aggregate) => aggregate.gamesPlayed > 0)
    .sort(compareAggregates)
    .map((aggregate, index) => toLeaderboardEntry(aggregate, index + 1, targetMs));
}

export function buildLeaderboard(records: Iterable<ScoreRecord>, targetMs = DEFAULT_TARGET_MS): LeaderboardEntry[] {
  return rankAggregates(aggregateByUser(records).values(), targetMs);
}

export function paginate<T>(items: readonly T[], limit: number, offset: number): T[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit は1以上の整数である必要があります。');
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError('offset は0以上の整数である必要があります。');
  }
  return items.slice(offset, offset + limit);
}

export function extractPersonalRank(ranked: readonly LeaderboardEntry[], userId: string): LeaderboardEntry | null {
  return ranked.find((item) => item.userId === userId) ?? null;
}
