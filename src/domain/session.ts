/**
 * ゲームセッションの状態遷移。
 * created → running → stopped | expired の一方向のみ。遷移関数は新しいオブジェクトを返し、入力は変更しない。
 */
import type { Clock } from './clock.js';
import { InternalInconsistencyError, InvalidStateError } from './errors.js';

export type SessionStatus = 'created' | 'running' | 'stopped' | 'expired';

interface SessionBase {
  readonly id: string;
  readonly userId: string;
  readonly version: number;
}

export interface CreatedSession extends SessionBase {
  readonly status: 'created';
}

export interface RunningSession extends SessionBase {
  readonly status: 'running';
  readonly startTick: number;
  readonly startedAt: string;
}

export interface StoppedSession extends SessionBase {
  readonly status: 'stopped';
  readonly startTick: number;
  readonly startedAt: string;
  readonly stopTick: number;
  readonly endedAt: string;
}

export interface ExpiredSession extends SessionBase {
  readonly status: 'expired';
  readonly startTick: number;
  readonly startedAt: string;
  readonly endedAt: string;
}

export type GameSession = CreatedSession | RunningSession | StoppedSession | ExpiredSession;

export type FinalizedSession = StoppedSession | ExpiredSession;

/** 永続化される形。単調時計の値はプロセスをまたいで意味を持たないため保存しない。 */
export interface FinalizedSessionRecord {
  id: string;
  userId: string;
  status: FinalizedSession['status'];
  startedAt: string;
  endedAt: string;
}

function describeState(session: GameSession): string {
  switch (session.status) {
    case 'created':
      return 'まだ開始されていません';
    case 'running':
      return '計測中です';
    case 'stopped':
      return 'すでに停止されています';
    case 'expired':
      return '期限切れです';
  }
}

/** 終了時刻は開始時刻に単調時計の経過分を足して求める。壁時計が巻き戻っても開始より前にはならない。 */
function endedAtFrom(startedAt: string, deltaMs: number): string {
  return new Date(Date.parse(startedAt) + Math.max(0, Math.round(deltaMs))).toISOString();
}

export function createGameSession(id: string, userId: string): CreatedSession {
  return { id, userId, status: 'created', version: 0 };
}

export function startGameSession(session: GameSession, clock: Clock): RunningSession {
  if (session.status !== 'created') {
    throw new InvalidStateError(`セッションを開始できません（${describeState(session)}）。`);
  }
  return {
    id: session.id,
    userId: session.userId,
    status: 'running',
    version: session.version + 1,
    startTick: clock.now(),
    startedAt: clock.wallTime().toISOString()
  };
}

export function stopGameSession(session: GameSession, clock: Clock): StoppedSession {
  if (session.status !== 'running') {
    throw new InvalidStateError(`セッションを停止できません（${describeState(session)}）。`);
  }
  const stopTick = clock.now();
  if (stopTick < session.startTick) {
    throw new InternalInconsistencyError(
      `停止時刻が開始時刻より前です（start=${session.startTick}, stop=${stopTick}）。`
    );
  }
  return {
    ...session,
    status: 'stopped',
    version: session.version + 1,
    stopTick,
    endedAt: endedAtFrom(session.startedAt, stopTick - session.startTick)
  };
}

export function expireGameSession(session: GameSession, clock: Clock): ExpiredSession {
  if (session.status !== 'running') {
    throw new InvalidStateError(`セッションを期限切れにできません（${describeState(session)}）。`);
  }
  return {
    ...session,
    status: 'expired',
    version: session.version + 1,
    endedAt: endedAtFrom(session.startedAt, clock.now() - session.startTick)
  };
}

export function elapsedMs(session: StoppedSession): number {
  return Math.round(session.stopTick - session.startTick);
}

export function isOverdue(session: RunningSession, nowTick: number, maxDurationMs: number): boolean {
  return nowTick - session.startTick > maxDurationMs;
}

export function toFinalizedRecord(session: FinalizedSession): FinalizedSessionRecord {
  return {
    id: session.id,
    userId: session.userId,
    status: session.status,
    startedAt: session.startedAt,
    endedAt: session.endedAt
  };
}
