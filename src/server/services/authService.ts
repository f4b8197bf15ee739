import { createHash, randomBytes } from 'node:crypto';
import bcrypt from 'bcryptjs';

import type { DatabasePool } from '../../db/client.js';

type HashFn = (token: string) => string;

const DEFAULT_TOKEN_TTL_SECONDS = 60 * 60 * 24 * 14; // 14日
const BCRYPT_ROUNDS = 12;

function sha256(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

export interface RefreshTokenIssueResult {
  token: string;
  expiresAt: Date;
}

export interface RefreshTokenRotation {
  userId: string;
  newToken: string;
  expiresAt: Date;
}

/** ルートが依存する認証操作。 */
export interface AuthGateway {
  hashPassword(password: string): Promise<string>;
  verifyPassword(password: string, passwordHash: string): Promise<boolean>;
  issueRefreshToken(userId: string): Promise<RefreshTokenIssueResult>;
  rotateRefreshToken(token: string): Promise<RefreshTokenRotation | null>;
  revokeRefreshToken(token: string): Promise<void>;
  revokeAll(userId: string): Promise<void>;
}

export class AuthService implements AuthGateway {
  private readonly hashToken: HashFn;

  constructor(
    private readonly pool: DatabasePool,
    private readonly refreshTokenTtlSeconds: number = DEFAULT_TOKEN_TTL_SECONDS,
    hashFn: HashFn = sha256
  ) {
    this.hashToken = hashFn;
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_ROUNDS);
  }

  async verifyPassword(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }

  async issueRefreshToken(userId: string): Promise<RefreshTokenIssueResult> {
    const token = randomBytes(48).toString('base64url');
    const expiresAt = new Date(Date.now() + this.refreshTokenTtlSeconds * 1000);
    await this.pool.query(
      'INSERT INTO refresh_tokens (user_id, token_hash, expires_at) VALUES ($1, $2, $3)',
      [userId, this.hashToken(token), expiresAt]
    );
    return { token, expiresAt };
  }

  async rotateRefreshToken(token: string): Promise<RefreshTokenRotation | null> {
    // DELETE ... RETURNING で同じトークンの二重ローテーションを防ぐ
    const deleted = await this.pool.query<{ user_id: string; expires_at: Date }>(
      'DELETE FROM refresh_tokens WHERE token_hash = $1 RETURNING user_id, expires_at',
      [this.hashToken(token)]
    );
    const existing = deleted.rows[0];
    if (!existing) return null;
    if (existing.expires_at.getTime() < Date.now()) {
      return null;
    }
    const issued = await this.issueRefreshToken(existing.user_id);
    return { userId: existing.user_id, newToken: issued.token, expiresAt: issued.expiresAt };
  }

  async revokeRefreshToken(token: string): Promise<void> {
    await this.pool.query('DELETE FROM refresh_tokens WHERE token_hash = $1', [this.hashToken(token)]);
  }

  async revokeAll(userId: string): Promise<void> {
    await this.pool.query('DELETE FROM refresh_tokens WHERE user_id = $1', [userId]);
  }
}
