import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod/v4';

import type { AnalyticsSummary } from '../../domain/analytics.js';
import { ensureJwtUser, type JwtUser } from '../auth/jwtUser.js';
import type { FastifyZodPlugin } from '../fastifyTypes.js';
import { messageResponseSchema } from '../httpErrors.js';

const statsSchema = z.object({
  gamesPlayed: z.number().int().positive(),
  meanDeviationMs: z.number().nonnegative(),
  bestDeviationMs: z.number().int().nonnegative(),
  averageScore: z.number().nonnegative(),
  bestScore: z.number().int().nonnegative(),
  accuracy: z.number()
});

const trendSchema = z.object({
  window: z.number().int().positive(),
  recentMeanDeviationMs: z.number(),
  previousMeanDeviationMs: z.number(),
  direction: z.enum(['improving', 'declining', 'steady'])
});

const gamesSchema = z.object({
  totalGames: z.number().int().nonnegative(),
  completedGames: z.number().int().nonnegative(),
  expiredGames: z.number().int().nonnegative()
});

const historyRecordSchema = z.object({
  sessionId: z.string(),
  elapsedMs: z.number().int().nonnegative(),
  deviationMs: z.number().int().nonnegative(),
  score: z.number().int().nonnegative(),
  startedAt: z.string(),
  recordedAt: z.string()
});

const analyticsResponseSchema = z.object({
  userId: z.string(),
  username: z.string(),
  stats: statsSchema.nullable(),
  games: gamesSchema,
  trend: trendSchema.nullable(),
  history: z.array(historyRecordSchema)
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20)
});

const userIdParamSchema = z.object({ userId: z.string().uuid() });

type AnalyticsResponse = z.infer<typeof analyticsResponseSchema>;

function toResponse(summary: AnalyticsSummary, username: string, limit: number): AnalyticsResponse {
  return {
    userId: summary.userId,
    username,
    stats: summary.stats,
    games: summary.games,
    trend: summary.trend,
    history: Array.from(summary.history.latest(limit), (record) => ({
      sessionId: record.sessionId,
      elapsedMs: record.elapsedMs,
      deviationMs: record.deviationMs,
      score: record.score,
      startedAt: record.startedAt,
      recordedAt: record.recordedAt
    }))
  };
}

function canView(viewer: JwtUser, userId: string): boolean {
  return viewer.role === 'admin' || viewer.userId === userId;
}

export const registerAnalyticsRoutes: FastifyZodPlugin = async (fastify) => {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get('/analytics/me', {
    preHandler: fastify.authenticate,
    schema: {
      querystring: historyQuerySchema,
      response: {
        200: analyticsResponseSchema,
        404: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const currentUser = await ensureJwtUser(request, reply);
    if (!currentUser) {
      return reply;
    }
    const { store, analytics } = fastify.deps;
    const user = await store.findUserById(currentUser.userId);
    if (!user) {
      return reply.code(404).send({ message: 'ユーザーが見つかりません。' });
    }
    const summary = await analytics.summarize(user.id);
    return reply.send(toResponse(summary, user.username, request.query.limit));
  });

  app.get('/analytics/users/:userId', {
    preHandler: fastify.authenticate,
    schema: {
      params: userIdParamSchema,
      querystring: historyQuerySchema,
      response: {
        200: analyticsResponseSchema,
        403: messageResponseSchema,
        404: messageResponseSchema
      }
    }
  }, async (request, reply) => {
    const currentUser = await ensureJwtUser(request, reply);
    if (!currentUser) {
      return reply;
    }
    const { userId } = request.params;
    if (!canView(currentUser, userId)) {
      return reply.code(403).send({ message: '他のユーザーの成績は閲覧できません。' });
    }
    const { store, analytics } = fastify.deps;
    const user = await store.findUserById(userId);
    if (!user) {
      return reply.code(404).send({ message: 'ユーザーが見つかりません。' });
    }
    const summary = await analytics.summarize(user.id);
    return reply.send(toResponse(summary, user.username, request.query.limit));
  });
};
