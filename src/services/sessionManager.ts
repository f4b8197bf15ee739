import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

import type { Clock } from '../domain/clock.js';
import {
  ConflictError,
  ForbiddenError,
  InternalInconsistencyError,
  InvalidStateError,
  NotFoundError
} from '../domain/errors.js';
import { resolveScoringOptions, scoreElapsed, type ScoreOutcome, type ScoreRecord, type ScoringOptions } from '../domain/scoring.js';
import {
  createGameSession,
  elapsedMs,
  type ExpiredSession,
  expireGameSession,
  type GameSession,
  isOverdue,
  type RunningSession,
  startGameSession,
  stopGameSession,
  type StoppedSession
} from '../domain/session.js';
import type { SessionRecordStore } from './gameStore.js';
import { KeyedLock } from './keyedLock.js';

export const DEFAULT_MAX_SESSION_DURATION_MS = 30 * 60 * 1000;

export type ScoreListener = (record: ScoreRecord) => void | Promise<void>;

export interface SessionManagerOptions {
  store: SessionRecordStore;
  clock: Clock;
  logger: Logger;
  scoring?: Partial<ScoringOptions>;
  maxSessionDurationMs?: number;
  generateId?: () => string;
}

export interface StartSessionResult {
  sessionId: string;
  startedAt: string;
  targetMs: number;
}

export interface StopSessionResult {
  session: StoppedSession;
  record: ScoreRecord;
  outcome: ScoreOutcome;
}

export interface SweepResult {
  expired: number;
  skipped: number;
  failed: number;
}

/**
 * 計測中セッションの管理。
 * ユーザーごとのロックの内側でのみアリーナ（sessionId → セッション）と
 * アクティブインデックス（userId → sessionId）を書き換える。
 */
export class SessionManager {
  readonly #sessions = new Map<string, GameSession>();
  readonly #activeByUser = new Map<string, string>();
  readonly #locks = new KeyedLock();
  readonly #listeners: ScoreListener[] = [];
  readonly #store: SessionRecordStore;
  readonly #clock: Clock;
  readonly #logger: Logger;
  readonly #scoring: ScoringOptions;
  readonly #maxSessionDurationMs: number;
  readonly #generateId: () => string;

  constructor(options: SessionManagerOptions) {
    this.#store = options.store;
    this.#clock = options.clock;
    this.#logger = options.logger;
    this.#scoring = resolveScoringOptions(options.scoring);
    this.#maxSessionDurationMs = options.maxSessionDurationMs ?? DEFAULT_MAX_SESSION_DURATION_MS;
    this.#generateId = options.generateId ?? randomUUID;
  }

  get targetMs(): number {
    return this.#scoring.targetMs;
  }

  get scoring(): ScoringOptions {
    return { ...this.#scoring };
  }

  onScoreRecorded(listener: ScoreListener): () => void {
    this.#listeners.push(listener);
    return () => {
      const index = this.#listeners.indexOf(listener);
      if (index >= 0) this.#listeners.splice(index, 1);
    };
  }

  activeCount(): number {
    return this.#activeByUser.size;
  }

  async startSession(userId: string): Promise<StartSessionResult> {
    return this.#guard(undefined, () => this.#locks.run(userId, async () => {
      const existing = this.#activeSessionOf(userId);
      if (existing) {
        if (!isOverdue(existing, this.#clock.now(), this.#maxSessionDurationMs)) {
          throw new ConflictError('すでに計測中のセッションがあります。');
        }
        await this.#expireLocked(existing);
      }
      const created = createGameSession(this.#generateId(), userId);
      if (this.#sessions.has(created.id)) {
        throw new InternalInconsistencyError(`セッションIDが重複しています: ${created.id}`);
      }
      const running = startGameSession(created, this.#clock);
      this.#sessions.set(running.id, running);
      this.#activeByUser.set(userId, running.id);
      this.#logger.debug({ msg: 'session started', sessionId: running.id, userId });
      return {
        sessionId: running.id,
        startedAt: running.startedAt,
        targetMs: this.#scoring.targetMs
      } satisfies StartSessionResult;
    }));
  }

  async stopSession(sessionId: string, userId: string): Promise<StopSessionResult> {
    const owner = this.#sessions.get(sessionId)?.userId;
    if (owner === undefined) {
      return this.#rejectFinalized(sessionId, userId);
    }
    if (owner !== userId) {
      throw new ForbiddenError('このセッションを操作する権限がありません。');
    }
    const result = await this.#guard(sessionId, () => this.#locks.run(owner, async () => {
      const session = this.#sessions.get(sessionId);
      if (!session) {
        return this.#rejectFinalized(sessionId, userId);
      }
      if (session.status !== 'running') {
        throw new InternalInconsistencyError(`アリーナに計測中でないセッションがあります: ${sessionId}`);
      }
      if (isOverdue(session, this.#clock.now(), this.#maxSessionDurationMs)) {
        await this.#expireLocked(session);
        throw new InvalidStateError('セッションは期限切れです。');
      }
      const stopped = stopGameSession(session, this.#clock);
      const outcome = scoreElapsed(elapsedMs(stopped), this.#scoring);
      const record: ScoreRecord = {
        sessionId: stopped.id,
        userId: stopped.userId,
        elapsedMs: outcome.elapsedMs,
        deviationMs: outcome.deviationMs,
        score: outcome.score,
        startedAt: stopped.startedAt,
        recordedAt: stopped.endedAt
      };
      await this.#store.saveSessionAndScore(stopped, record);
      this.#release(session);
      this.#logger.debug({
        msg: 'session stopped',
        sessionId,
        userId,
        elapsedMs: outcome.elapsedMs,
        deviationMs: outcome.deviationMs
      });
      return { session: stopped, record, outcome } satisfies StopSessionResult;
    }));
    await this.#notify(result.record);
    return result;
  }

  async expireSession(sessionId: string): Promise<ExpiredSession> {
    const owner = this.#sessions.get(sessionId)?.userId;
    if (owner === undefined) {
      throw new NotFoundError('計測中のセッションが見つかりません。');
    }
    return this.#guard(sessionId, () => this.#locks.run(owner, async () => {
      const session = this.#sessions.get(sessionId);
      if (!session || session.status !== 'running') {
        throw new InvalidStateError('セッションはすでに確定しています。');
      }
      return this.#expireLocked(session);
    }));
  }

  async sweepExpired(): Promise<SweepResult> {
    const now = this.#clock.now();
    const overdue: string[] = [];
    for (const session of this.#sessions.values()) {
      if (session.status === 'running' && isOverdue(session, now, this.#maxSessionDurationMs)) {
        overdue.push(session.id);
      }
    }
    const result: SweepResult = { expired: 0, skipped: 0, failed: 0 };
    for (const sessionId of overdue) {
      try {
        await this.expireSession(sessionId);
        result.expired += 1;
      } catch (error) {
        if (error instanceof InvalidStateError || error instanceof NotFoundError) {
          result.skipped += 1;
          continue;
        }
        result.failed += 1;
        this.#logger.warn({
          msg: 'sweep: failed to expire session',
          sessionId,
          cause: error instanceof Error ? error.message : error
        });
      }
    }
    if (result.expired > 0 || result.failed > 0) {
      this.#logger.info({ msg: 'sweep finished', ...result });
    }
    return result;
  }

  async getActiveSession(userId: string): Promise<RunningSession | null> {
    if (!this.#activeByUser.has(userId)) {
      return null;
    }
    return this.#guard(undefined, () => this.#locks.run(userId, async () => {
      const session = this.#activeSessionOf(userId);
      if (!session) return null;
      if (isOverdue(session, this.#clock.now(), this.#maxSessionDurationMs)) {
        await this.#expireLocked(session);
        return null;
      }
      return session;
    }));
  }

  #activeSessionOf(userId: string): RunningSession | null {
    const sessionId = this.#activeByUser.get(userId);
    if (sessionId === undefined) return null;
    const session = this.#sessions.get(sessionId);
    if (!session || session.status !== 'running') {
      throw new InternalInconsistencyError(`アクティブインデックスとアリーナが一致しません: ${userId}`);
    }
    return session;
  }

  async #expireLocked(session: RunningSession): Promise<ExpiredSession> {
    const expired = expireGameSession(session, this.#clock);
    await this.#store.saveExpiredSession(expired);
    this.#release(session);
    this.#logger.debug({ msg: 'session expired', sessionId: session.id, userId: session.userId });
    return expired;
  }

  /** 確定したセッションをアリーナとインデックスから外す。version が一致しなければ他者が先に遷移させている。 */
  #release(expected: RunningSession): void {
    const current = this.#sessions.get(expected.id);
    if (!current || current.version !== expected.version) {
      throw new InternalInconsistencyError(`セッションが並行して更新されました: ${expected.id}`);
    }
    if (this.#activeByUser.get(expected.userId) !== expected.id) {
      throw new InternalInconsistencyError(`アクティブインデックスが別のセッションを指しています: ${expected.userId}`);
    }
    this.#sessions.delete(expected.id);
    this.#activeByUser.delete(expected.userId);
  }

  async #rejectFinalized(sessionId: string, userId: string): Promise<never> {
    const record = await this.#store.findSession(sessionId);
    if (!record) {
      throw new NotFoundError('セッションが見つかりません。');
    }
    if (record.userId !== userId) {
      throw new ForbiddenError('このセッションを操作する権限がありません。');
    }
    throw new InvalidStateError(
      record.status === 'expired' ? 'セッションは期限切れです。' : 'セッションはすでに停止されています。'
    );
  }

  async #notify(record: ScoreRecord): Promise<void> {
    for (const listener of this.#listeners) {
      try {
        await listener(record);
      } catch (error) {
        this.#logger.warn({
          msg: 'score listener failed',
          sessionId: record.sessionId,
          cause: error instanceof Error ? error.message : error
        });
      }
    }
  }

  async #guard<T>(sessionId: string | undefined, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof InternalInconsistencyError) {
        this.#logger.error({ msg: 'internal inconsistency detected', sessionId, cause: error.message });
      }
      throw error;
    }
  }
}
