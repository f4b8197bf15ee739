import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import { describeOutcome } from '../../domain/scoring.js';
import { ensureJwtUser } from '../auth/jwtUser.js';
import type { FastifyZodInstance, FastifyZodPlugin } from '../fastifyTypes.js';
import { domainErrorResponses, handleDomainError, messageResponseSchema } from '../httpErrors.js';

export const LEADERBOARD_ROOM = 'leaderboard';

const startGameResponseSchema = z.object({
  sessionId: z.string().uuid(),
  startedAt: z.string(),
  targetMs: z.number().int().positive()
});

const stopGameResponseSchema = z.object({
  sessionId: z.string().uuid(),
  elapsedMs: z.number().int().nonnegative(),
  deviationMs: z.number().int().nonnegative(),
  score: z.number().int().nonnegative(),
  accuracy: z.number(),
  grade: z.enum(['A+', 'A', 'B', 'C', 'D', 'F']),
  message: z.string()
});

const activeGameResponseSchema = z.object({
  sessionId: z.string().uuid(),
  startedAt: z.string(),
  targetMs: z.number().int().positive()
});

const historyItemSchema = z.object({
  sessionId: z.string().uuid(),
  status: z.enum(['stopped', 'expired']),
  startedAt: z.string(),
  endedAt: z.string(),
  elapsedMs: z.number().int().nullable(),
  deviationMs: z.number().int().nullable(),
  score: z.number().int().nullable()
});

const sessionIdParamSchema = z.object({ sessionId: z.string().uuid() });
const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

/** 停止後に購読中のクライアントへ最新の順位表を配信する。 */
async function broadcastLeaderboard(fastify: FastifyZodInstance, userId: string): Promise<void> {
  const { leaderboard } = fastify.deps;
  const page = await leaderboard.rank(fastify.config.game.leaderboardTopCount, 0);
  const me = await leaderboard.entryFor(userId);
  fastify.io.to(LEADERBOARD_ROOM).emit('leaderboard:update', {
    top: page.entries,
    total: page.total,
    me
  });
}

export const registerGameRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post('/games/start', {
    preHandler: fastify.authenticate,
    schema: {
      response: {
        201: startGameResponseSchema,
        ...domainErrorResponses
      }
    }
  }, async (request, reply) => {
    const currentUser = await ensureJwtUser(request, reply, 'ユーザー情報の取得に失敗しました。');
    if (!currentUser) {
      return reply;
    }
    try {
      const result = await fastify.deps.sessions.startSession(currentUser.userId);
      return reply.code(201).send(result);
    } catch (error) {
      const handled = handleDomainError(error);
      if (handled) {
        return reply.code(handled.status).send({ message: handled.message });
      }
      throw error;
    }
  });

  app.post('/games/:sessionId/stop', {
    preHandler: fastify.authenticate,
    schema: {
      params: sessionIdParamSchema,
      response: {
        200: stopGameResponseSchema,
        ...domainErrorResponses
      }
    }
  }, async (request, reply) => {
    const { sessionId } = request.params;
    const currentUser = await ensureJwtUser(request, reply, 'ユーザー情報の取得に失敗しました。');
    if (!currentUser) {
      return reply;
    }
    const { sessions } = fastify.deps;
    try {
      const { outcome } = await sessions.stopSession(sessionId, currentUser.userId);
      try {
        await broadcastLeaderboard(fastify, currentUser.userId);
      } catch (broadcastError) {
        request.log.warn({
          msg: 'leaderboard broadcast failed',
          cause: broadcastError instanceof Error ? broadcastError.message : broadcastError
        });
      }
      return reply.send({
        sessionId,
        elapsedMs: outcome.elapsedMs,
        deviationMs: outcome.deviationMs,
        score: outcome.score,
        accuracy: outcome.accuracy,
        grade: outcome.grade,
        message: describeOutcome(outcome, sessions.targetMs)
      });
    } catch (error) {
      const handled = handleDomainError(error);
      if (handled) {
        return reply.code(handled.status).send({ message: handled.message });
      }
      throw error;
    }
  });

  app.get('/games/active', {
    preHandler: fastify.authenticate,
    schema: {
      response: {
        200: activeGameResponseSchema,
        404: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const currentUser = await ensureJwtUser(request, reply, 'ユーザー情報の取得に失敗しました。');
    if (!currentUser) {
      return reply;
    }
    const { sessions } = fastify.deps;
    const session = await sessions.getActiveSession(currentUser.userId);
    if (!session) {
      return reply.code(404).send({ message: '計測中のセッションはありません。' });
    }
    return reply.send({
      sessionId: session.id,
      startedAt: session.startedAt,
      targetMs: sessions.targetMs
    });
  });

  app.get('/games/history', {
    preHandler: fastify.authenticate,
    schema: {
      querystring: historyQuerySchema,
      response: {
        200: z.object({ items: z.array(historyItemSchema) })
      }
    }
  }, async (request, reply) => {
    const currentUser = await ensureJwtUser(request, reply, 'ユーザー情報の取得に失敗しました。');
    if (!currentUser) {
      return reply;
    }
    const items = await fastify.deps.store.listSessions(currentUser.userId, request.query.limit);
    return reply.send({
      items: items.map((item) => ({
        sessionId: item.id,
        status: item.status,
        startedAt: item.startedAt,
        endedAt: item.endedAt,
        elapsedMs: item.elapsedMs,
        deviationMs: item.deviationMs,
        score: item.score
      }))
    });
  });
};
