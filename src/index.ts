export type {
  DatabaseClient,
  DatabasePool,
  ResolvedDatabaseConfig
} from './db/client.js';
export {
  createPool,
  resolveDatabaseConfig,
  withTransaction
} from './db/client.js';
export { applyMigrations } from './db/migrations.js';
export type {
  AnalyticsSummary,
  GameCounts,
  SessionTally,
  Trend,
  UserStats
} from './domain/analytics.js';
export {
  computeStats,
  countGames,
  computeTrend,
  projectSummary,
  ScoreHistory
} from './domain/analytics.js';
export type { Clock } from './domain/clock.js';
export { createMonotonicClock } from './domain/clock.js';
export {
  ConflictError,
  ForbiddenError,
  InternalInconsistencyError,
  InvalidStateError,
  NotFoundError,
  ValidationError
} from './domain/errors.js';
export type {
  LeaderboardEntry,
  LeaderboardPage,
  UserAggregate
} from './domain/leaderboard.js';
export {
  aggregateByUser,
  buildLeaderboard,
  extractPersonalRank,
  paginate,
  rankAggregates
} from './domain/leaderboard.js';
export type {
  Grade,
  ScoreOutcome,
  ScoreRecord,
  ScoringOptions
} from './domain/scoring.js';
export {
  DEFAULT_MAX_SCORE,
  DEFAULT_TARGET_MS,
  describeOutcome,
  resolveScoringOptions,
  scoreElapsed
} from './domain/scoring.js';
export type {
  CreatedSession,
  ExpiredSession,
  FinalizedSession,
  FinalizedSessionRecord,
  GameSession,
  RunningSession,
  SessionStatus,
  StoppedSession
} from './domain/session.js';
export {
  createGameSession,
  expireGameSession,
  startGameSession,
  stopGameSession
} from './domain/session.js';
export { buildServer } from './server/buildServer.js';
export { getServerConfig } from './server/config.js';
export { createDependencies, createGameServices } from './server/dependencies.js';
export { AnalyticsProjector } from './services/analyticsService.js';
export { ExpirySweeper } from './services/expirySweeper.js';
export type {
  CreateUserInput,
  GameStore,
  SessionHistoryItem,
  SessionRecordStore,
  UserRecord
} from './services/gameStore.js';
export { PgGameStore } from './services/gameStore.js';
export { KeyedLock } from './services/keyedLock.js';
export { LeaderboardAggregator } from './services/leaderboardService.js';
export type {
  ScoreListener,
  SessionManagerOptions,
  StartSessionResult,
  StopSessionResult,
  SweepResult
} from './services/sessionManager.js';
export { SessionManager } from './services/sessionManager.js';
