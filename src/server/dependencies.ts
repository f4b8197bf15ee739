import { type Logger, pino } from 'pino';

import { createPool, type DatabasePool } from '../db/client.js';
import { type Clock, createMonotonicClock } from '../domain/clock.js';
import { AnalyticsProjector } from '../services/analyticsService.js';
import { ExpirySweeper } from '../services/expirySweeper.js';
import { type GameStore, PgGameStore } from '../services/gameStore.js';
import { LeaderboardAggregator } from '../services/leaderboardService.js';
import { SessionManager } from '../services/sessionManager.js';
import type { GameSettings, ServerConfig } from './config.js';
import { type AuthGateway, AuthService } from './services/authService.js';

export interface ServerDependencies {
  pool: Pick<DatabasePool, 'end'>;
  logger: Logger;
  store: GameStore;
  auth: AuthGateway;
  sessions: SessionManager;
  leaderboard: LeaderboardAggregator;
  analytics: AnalyticsProjector;
  sweeper: ExpirySweeper;
}

export interface GameServicesOptions {
  store: GameStore;
  logger: Logger;
  settings: GameSettings;
  clock?: Clock;
}

export type GameServices = Pick<ServerDependencies, 'sessions' | 'leaderboard' | 'analytics' | 'sweeper'>;

/** ストアから上のゲームコア一式を組み立てる。採点結果はリーダーボードへ逐次反映される。 */
export function createGameServices({ store, logger, settings, clock = createMonotonicClock() }: GameServicesOptions): GameServices {
  const sessions = new SessionManager({
    store,
    clock,
    logger: logger.child({ component: 'sessions' }),
    scoring: {
      targetMs: settings.targetMs,
      cutoffMs: settings.cutoffMs,
      maxScore: settings.maxScore
    },
    maxSessionDurationMs: settings.maxSessionDurationMs
  });
  const leaderboard = new LeaderboardAggregator(store, settings.targetMs);
  sessions.onScoreRecorded((record) => leaderboard.record(record));
  const analytics = new AnalyticsProjector(store, settings.targetMs);
  const sweeper = new ExpirySweeper({
    sessions,
    intervalMs: settings.sweepIntervalMs,
    logger: logger.child({ component: 'expiry-sweeper' })
  });
  return { sessions, leaderboard, analytics, sweeper };
}

export function createDependencies(config: ServerConfig): ServerDependencies {
  const logger = pino({ level: config.logLevel, enabled: config.env !== 'test' });
  const pool = createPool();
  const store = new PgGameStore(pool);
  const auth = new AuthService(pool, config.refreshTokenTtlSec);
  return {
    pool,
    logger,
    store,
    auth,
    ...createGameServices({ store, logger, settings: config.game })
  };
}
