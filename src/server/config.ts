import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET は16文字以上である必要があります。'),
  REFRESH_TOKEN_TTL_SEC: z.coerce.number().positive().optional(),
  CORS_ORIGIN: z.string().optional(),
  SOCKET_CORS_ORIGIN: z.string().optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  TARGET_TIME_MS: z.coerce.number().int().positive().default(10000),
  SCORE_CUTOFF_MS: z.coerce.number().int().positive().optional(),
  SCORE_MAX: z.coerce.number().int().nonnegative().default(1000),
  SESSION_MAX_DURATION_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  EXPIRY_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
  LEADERBOARD_TOP_COUNT: z.coerce.number().int().min(1).max(100).default(10)
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface GameSettings {
  targetMs: number;
  cutoffMs: number;
  maxScore: number;
  maxSessionDurationMs: number;
  sweepIntervalMs: number;
  leaderboardTopCount: number;
}

export interface ServerConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  host: string;
  jwtSecret: string;
  refreshTokenTtlSec: number;
  corsOrigins: string[] | undefined;
  socketCorsOrigins: string[] | undefined;
  logLevel: LogLevel;
  game: GameSettings;
}

function parseOrigins(value?: string): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}

export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,
    jwtSecret: parsed.JWT_SECRET,
    refreshTokenTtlSec: parsed.REFRESH_TOKEN_TTL_SEC ?? 60 * 60 * 24 * 14,
    corsOrigins: parseOrigins(parsed.CORS_ORIGIN),
    socketCorsOrigins: parseOrigins(parsed.SOCKET_CORS_ORIGIN ?? parsed.CORS_ORIGIN),
    logLevel: parsed.LOG_LEVEL,
    game: {
      targetMs: parsed.TARGET_TIME_MS,
      cutoffMs: parsed.SCORE_CUTOFF_MS ?? parsed.TARGET_TIME_MS,
      maxScore: parsed.SCORE_MAX,
      maxSessionDurationMs: parsed.SESSION_MAX_DURATION_MS,
      sweepIntervalMs: parsed.EXPIRY_SWEEP_INTERVAL_MS,
      leaderboardTopCount: parsed.LEADERBOARD_TOP_COUNT
    }
  };
}
