import type {
  FastifyBaseLogger,
  FastifyInstance,
  FastifyPluginAsync,
  FastifyPluginOptions,
  RawReplyDefaultExpression,
  RawRequestDefaultExpression,
  RawServerDefault
} from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { Server as SocketIOServer } from 'socket.io';

import type { LeaderboardEntry } from '../domain/leaderboard.js';

export type FastifyZodPlugin<Options extends FastifyPluginOptions = Record<never, never>> =
  FastifyPluginAsync<Options, RawServerDefault, ZodTypeProvider>;

export type FastifyZodInstance = FastifyInstance<
  RawServerDefault,
  RawRequestDefaultExpression<RawServerDefault>,
  RawReplyDefaultExpression<RawServerDefault>,
  FastifyBaseLogger,
  ZodTypeProvider
>;

/** 停止のたびに leaderboard ルームへ配信される順位表。me は停止したユーザーの順位（参加直後は null）。 */
export interface LeaderboardUpdate {
  top: LeaderboardEntry[];
  total: number;
  me: LeaderboardEntry | null;
}

export interface ServerToClientEvents {
  'leaderboard:update': (update: LeaderboardUpdate) => void;
}

export interface ClientToServerEvents {
  'leaderboard:join': () => void;
  'leaderboard:leave': () => void;
}

export type GameSocketServer = SocketIOServer<ClientToServerEvents, ServerToClientEvents>;
