import { randomUUID } from 'node:crypto';
import { DatabaseError } from 'pg';

import { type DatabasePool, withTransaction } from '../db/client.js';
import { ConflictError } from '../domain/errors.js';
import type { SessionTally } from '../domain/analytics.js';
import type { ScoreRecord } from '../domain/scoring.js';
import {
  type ExpiredSession,
  type FinalizedSessionRecord,
  type StoppedSession,
  toFinalizedRecord
} from '../domain/session.js';

export type UserRole = 'user' | 'admin';

export interface UserRecord {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  createdAt: Date;
}

export interface CreateUserInput {
  id?: string;
  username: string;
  email: string;
  passwordHash: string;
  role?: UserRole;
}

export interface SessionHistoryItem extends FinalizedSessionRecord {
  elapsedMs: number | null;
  deviationMs: number | null;
  score: number | null;
}

/**
 * セッション管理・集計が必要とする永続化の窓口。
 * saveSessionAndScore はセッションと採点結果を1トランザクションで書き込み、片方だけが残ることはない。
 */
export interface SessionRecordStore {
  saveSessionAndScore(session: StoppedSession, record: ScoreRecord): Promise<void>;
  saveExpiredSession(session: ExpiredSession): Promise<void>;
  findSession(sessionId: string): Promise<FinalizedSessionRecord | null>;
  loadScoreRecords(userId?: string): Promise<ScoreRecord[]>;
  countSessions(userId: string): Promise<SessionTally>;
}

export interface GameStore extends SessionRecordStore {
  createUser(input: CreateUserInput): Promise<UserRecord>;
  findUserByEmail(email: string): Promise<UserRecord | null>;
  findUserByUsername(username: string): Promise<UserRecord | null>;
  findUserById(id: string): Promise<UserRecord | null>;
  findUsernames(ids: readonly string[]): Promise<Map<string, string>>;
  listSessions(userId: string, limit: number): Promise<SessionHistoryItem[]>;
}

type UserRow = {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  role: string;
  created_at: Date;
};

type SessionRow = {
  id: string;
  user_id: string;
  status: string;
  started_at: Date;
  ended_at: Date;
};

type SessionHistoryRow = SessionRow & {
  elapsed_ms: number | null;
  deviation_ms: number | null;
  score: number | null;
};

type ScoreRow = {
  session_id: string;
  user_id: string;
  elapsed_ms: number;
  deviation_ms: number;
  score: number;
  started_at: Date;
  recorded_at: Date;
};

function toUserRole(value: string): UserRole {
  return value === 'admin' ? 'admin' : 'user';
}

function toFinalizedStatus(value: string): FinalizedSessionRecord['status'] {
  if (value === 'stopped' || value === 'expired') return value;
  throw new Error(`未知のセッション状態です: ${value}`);
}

function mapUser(row: UserRow): UserRecord {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    role: toUserRole(row.role),
    createdAt: row.created_at
  };
}

function mapSession(row: SessionRow): FinalizedSessionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    status: toFinalizedStatus(row.status),
    startedAt: row.started_at.toISOString(),
    endedAt: row.ended_at.toISOString()
  };
}

function mapScore(row: ScoreRow): ScoreRecord {
  return {
    sessionId: row.session_id,
    userId: row.user_id,
    elapsedMs: row.elapsed_ms,
    deviationMs: row.deviation_ms,
    score: row.score,
    startedAt: row.started_at.toISOString(),
    recordedAt: row.recorded_at.toISOString()
  };
}

const USER_COLUMNS = 'id, username, email, password_hash, role, created_at';
const INSERT_SESSION = `INSERT INTO game_sessions (id, user_id, status, started_at, ended_at)
  VALUES ($1, $2, $3, $4, $5)`;

export class PgGameStore implements GameStore {
  constructor(private readonly pool: DatabasePool) {}

  async createUser(input: CreateUserInput): Promise<UserRecord> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (id, username, email, password_hash, role)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [input.id ?? randomUUID(), input.username, input.email, input.passwordHash, input.role ?? 'user']
      );
      return mapUser(result.rows[0]);
    } catch (error) {
      // 23505: unique_violation
      if (error instanceof DatabaseError && error.code === '23505') {
        throw new ConflictError('指定されたメールアドレスまたはユーザー名は既に使用されています。');
      }
      throw error;
    }
  }

  async findUserByEmail(email: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE email = $1`, [email]);
    const row = result.rows[0];
    return row ? mapUser(row) : null;
  }

  async findUserByUsername(username: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE username = $1`, [username]);
    const row = result.rows[0];
    return row ? mapUser(row) : null;
  }

  async findUserById(id: string): Promise<UserRecord | null> {
    const result = await this.pool.query<UserRow>(`SELECT ${USER_COLUMNS} FROM users WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? mapUser(row) : null;
  }

  async findUsernames(ids: readonly string[]): Promise<Map<string, string>> {
    if (ids.length === 0) {
      return new Map();
    }
    const result = await this.pool.query<{ id: string; username: string }>(
      'SELECT id, username FROM users WHERE id = ANY($1::uuid[])',
      [[...ids]]
    );
    return new Map(result.rows.map((row) => [row.id, row.username] as const));
  }

  async saveSessionAndScore(session: StoppedSession, record: ScoreRecord): Promise<void> {
    const finalized = toFinalizedRecord(session);
    await withTransaction(this.pool, async (client) => {
      await client.query(INSERT_SESSION, [
        finalized.id,
        finalized.userId,
        finalized.status,
        finalized.startedAt,
        finalized.endedAt
      ]);
      await client.query(
        `INSERT INTO score_records (session_id, user_id, elapsed_ms, deviation_ms, score, started_at, recorded_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          record.sessionId,
          record.userId,
          record.elapsedMs,
          record.deviationMs,
          record.score,
          record.startedAt,
          record.recordedAt
        ]
      );
    });
  }

  async saveExpiredSession(session: ExpiredSession): Promise<void> {
    const finalized = toFinalizedRecord(session);
    await this.pool.query(INSERT_SESSION, [
      finalized.id,
      finalized.userId,
      finalized.status,
      finalized.startedAt,
      finalized.endedAt
    ]);
  }

  async findSession(sessionId: string): Promise<FinalizedSessionRecord | null> {
    const result = await this.pool.query<SessionRow>(
      'SELECT id, user_id, status, started_at, ended_at FROM game_sessions WHERE id = $1',
      [sessionId]
    );
    const row = result.rows[0];
    return row ? mapSession(row) : null;
  }

  async loadScoreRecords(userId?: string): Promise<ScoreRecord[]> {
    const columns = 'session_id, user_id, elapsed_ms, deviation_ms, score, started_at, recorded_at';
    const result = userId === undefined
      ? await this.pool.query<ScoreRow>(`SELECT ${columns} FROM score_records ORDER BY started_at ASC, session_id ASC`)
      : await this.pool.query<ScoreRow>(
        `SELECT ${columns} FROM score_records WHERE user_id = $1 ORDER BY started_at ASC, session_id ASC`,
        [userId]
      );
    return result.rows.map(mapScore);
  }

  async countSessions(userId: string): Promise<SessionTally> {
    const result = await this.pool.query<{ status: string; count: number }>(
      'SELECT status, COUNT(*)::int AS count FROM game_sessions WHERE user_id = $1 GROUP BY status',
      [userId]
    );
    const tally: SessionTally = { stopped: 0, expired: 0 };
    for (const row of result.rows) {
      if (row.status === 'stopped' || row.status === 'expired') {
        tally[row.status] = row.count;
      }
    }
    return tally;
  }

  async listSessions(userId: string, limit: number): Promise<SessionHistoryItem[]> {
    const result = await this.pool.query<SessionHistoryRow>(
      `SELECT s.id, s.user_id, s.status, s.started_at, s.ended_at,
              r.elapsed_ms, r.deviation_ms, r.score
         FROM game_sessions s
         LEFT JOIN score_records r ON r.session_id = s.id
        WHERE s.user_id = $1
        ORDER BY s.started_at DESC, s.id DESC
        LIMIT $2`,
      [userId, limit]
    );
    return result.rows.map((row) => ({
      ...mapSession(row),
      elapsedMs: row.elapsed_ms,
      deviationMs: row.deviation_ms,
      score: row.score
    }));
  }
}
