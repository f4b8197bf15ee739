/**
 * 経過時間から乖離とスコアを求める純粋関数群。
 * 同じ経過時間には常に同じ結果を返す（リーダーボードの再計算で値が変わらないこと）。
 */
import { InternalInconsistencyError, ValidationError } from './errors.js';

export const DEFAULT_TARGET_MS = 10000;
export const DEFAULT_MAX_SCORE = 1000;

export type Grade = 'A+' | 'A' | 'B' | 'C' | 'D' | 'F';

export interface ScoringOptions {
  targetMs: number;
  cutoffMs: number;
  maxScore: number;
}

export interface ScoreOutcome {
  elapsedMs: number;
  deviationMs: number;
  score: number;
  accuracy: number;
  grade: Grade;
}

/** 停止されたセッション1件につき1件だけ作られる採点結果。 */
export interface ScoreRecord {
  sessionId: string;
  userId: string;
  elapsedMs: number;
  deviationMs: number;
  score: number;
  startedAt: string;
  recordedAt: string;
}

const DEFAULT_OPTIONS: ScoringOptions = {
  targetMs: DEFAULT_TARGET_MS,
  cutoffMs: DEFAULT_TARGET_MS,
  maxScore: DEFAULT_MAX_SCORE
};

export function resolveScoringOptions(overrides: Partial<ScoringOptions> = {}): ScoringOptions {
  const targetMs = overrides.targetMs ?? DEFAULT_OPTIONS.targetMs;
  const options: ScoringOptions = {
    targetMs,
    cutoffMs: overrides.cutoffMs ?? targetMs,
    maxScore: overrides.maxScore ?? DEFAULT_OPTIONS.maxScore
  };
  if (!Number.isInteger(options.targetMs) || options.targetMs <= 0) {
    throw new ValidationError('targetMs は正の整数である必要があります。');
  }
  if (!Number.isInteger(options.cutoffMs) || options.cutoffMs <= 0) {
    throw new ValidationError('cutoffMs は正の整数である必要があります。');
  }
  if (!Number.isInteger(options.maxScore) || options.maxScore < 0) {
    throw new ValidationError('maxScore は0以上の整数である必要があります。');
  }
  return options;
}

export function gradeFor(deviationMs: number): Grade {
  if (deviationMs === 0) return 'A+';
  if (deviationMs < 100) return 'A';
  if (deviationMs < 500) return 'B';
  if (deviationMs < 1000) return 'C';
  if (deviationMs < 2000) return 'D';
  return 'F';
}

export function accuracyFor(deviationMs: number, targetMs: number): number {
  const accuracy = Math.max(0, 100 * (1 - deviationMs / targetMs));
  return Math.round(accuracy * 100) / 100;
}

export function scoreElapsed(elapsedMs: number, options: ScoringOptions = DEFAULT_OPTIONS): ScoreOutcome {
  if (!Number.isInteger(elapsedMs) || elapsedMs < 0) {
    throw new InternalInconsistencyError(`経過時間が不正です（${elapsedMs}ms）。`);
  }
  const deviationMs = Math.abs(elapsedMs - options.targetMs);
  const remaining = options.cutoffMs - Math.min(deviationMs, options.cutoffMs);
  const score = Math.floor((remaining * options.maxScore) / options.cutoffMs);
  return {
    elapsedMs,
    deviationMs,
    score,
    accuracy: accuracyFor(deviationMs, options.targetMs),
    grade: gradeFor(deviationMs)
  };
}

export function describeOutcome(outcome: ScoreOutcome, targetMs: number): string {
  const targetSec = targetMs / 1000;
  switch (outcome.grade) {
    case 'A+':
      return `パーフェクト！ぴったり${targetSec}秒です。`;
    case 'A':
      return `素晴らしい！誤差は${outcome.deviationMs}msです。`;
    case 'B':
      return `いいタイミングです。誤差は${outcome.deviationMs}msでした。`;
    default:
      return `目標から${outcome.deviationMs}msずれました。もう一度挑戦しましょう。`;
  }
}
