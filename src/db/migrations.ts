import bcrypt from 'bcryptjs';
import { z } from 'zod/v4';

import { type DatabaseClient, type DatabasePool, withTransaction } from './client.js';

const DEFAULT_ADMIN_USERNAME = 'admin';
const DEFAULT_ADMIN_EMAIL = 'admin@example.com';
const DEFAULT_ADMIN_PASSWORD = 'change-me';
const BCRYPT_ROUNDS = 12;

const adminSeedSchema = z.object({
  ADMIN_USERNAME: z.string().min(1).optional(),
  ADMIN_EMAIL: z.string().email().optional(),
  ADMIN_PASSWORD: z.string().min(8).optional()
});

interface AdminSeedConfig {
  username: string;
  email: string;
  password: string;
}

function resolveAdminSeedConfig(): AdminSeedConfig {
  const parsed = adminSeedSchema.parse(process.env);
  return {
    username: parsed.ADMIN_USERNAME ?? DEFAULT_ADMIN_USERNAME,
    email: parsed.ADMIN_EMAIL ?? DEFAULT_ADMIN_EMAIL,
    password: parsed.ADMIN_PASSWORD ?? DEFAULT_ADMIN_PASSWORD
  } satisfies AdminSeedConfig;
}

// 計測中のセッションはメモリ上のインデックスだけが持つ。ここに入るのは確定済み（stopped / expired）のみ。
const schemaStatements = [
  `CREATE TABLE IF NOT EXISTS users (
    id UUID PRIMARY KEY,
    username TEXT UNIQUE NOT NULL,
    email TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL,
    role TEXT NOT NULL DEFAULT 'user' CHECK (role IN ('user','admin')),
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS refresh_tokens (
    id BIGSERIAL PRIMARY KEY,
    user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    token_hash TEXT UNIQUE NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS game_sessions (
    id UUID PRIMARY KEY,
    user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    status TEXT NOT NULL CHECK (status IN ('stopped','expired')),
    started_at TIMESTAMPTZ NOT NULL,
    ended_at TIMESTAMPTZ NOT NULL,
    CHECK (ended_at >= started_at)
  )`,
  `CREATE TABLE IF NOT EXISTS score_records (
    session_id UUID PRIMARY KEY REFERENCES game_sessions(id) ON DELETE CASCADE,
    user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
    elapsed_ms INTEGER NOT NULL CHECK (elapsed_ms >= 0),
    deviation_ms INTEGER NOT NULL CHECK (deviation_ms >= 0),
    score INTEGER NOT NULL CHECK (score >= 0),
    started_at TIMESTAMPTZ NOT NULL,
    recorded_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS game_sessions_user_started_idx ON game_sessions (user_id, started_at DESC)`,
  `CREATE INDEX IF NOT EXISTS score_records_user_started_idx ON score_records (user_id, started_at, session_id)`,
  `CREATE INDEX IF NOT EXISTS refresh_tokens_user_idx ON refresh_tokens (user_id)`
];

async function runStatements(client: DatabaseClient): Promise<void> {
  for (const statement of schemaStatements) {
    await client.query(statement);
  }
}

async function ensureAdminUser(client: DatabaseClient): Promise<void> {
  const existingAdmin = await client.query<{ id: string }>(
    `SELECT id FROM users WHERE role = 'admin' LIMIT 1`
  );
  if (existingAdmin.rows.length > 0) {
    return;
  }

  const { username, email, password } = resolveAdminSeedConfig();
  const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);

  const existingUser = await client.query<{ id: string }>(
    `SELECT id FROM users WHERE username = $1 OR email = $2 LIMIT 1`,
    [username, email]
  );
  const user = existingUser.rows[0];
  if (user) {
    await client.query(
      `UPDATE users SET role = 'admin', password_hash = $2 WHERE id = $1`,
      [user.id, passwordHash]
    );
    return;
  }

  await client.query(
    `INSERT INTO users (id, username, email, password_hash, role)
     VALUES (gen_random_uuid(), $1, $2, $3, 'admin')`,
    [username, email, passwordHash]
  );
}

export async function applyMigrations(pool: DatabasePool): Promise<void> {
  await withTransaction(pool, async (client) => {
    await runStatements(client);
    await ensureAdminUser(client);
  });
}
